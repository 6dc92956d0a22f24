import type OpenAI from "openai";
import type { IChatModel, IChatPrompt } from "../../interfaces";

export class OpenAIChatModel implements IChatModel {
  private openai: OpenAI;
  private model: string;
  private temperature: number;

  constructor(openai: OpenAI, model: string, temperature: number) {
    this.openai = openai;
    this.model = model;
    this.temperature = temperature;
  }

  async complete(prompt: IChatPrompt): Promise<string | null> {
    const completion = await this.openai.chat.completions.create({
      model: this.model,
      temperature: this.temperature,
      messages: [
        { role: "system", content: prompt.system },
        { role: "user", content: prompt.user },
      ],
    });
    return completion.choices[0]?.message.content ?? null;
  }
}
