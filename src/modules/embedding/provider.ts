import type OpenAI from "openai";
import { EmbeddingProviderError } from "../../errors";
import type { IEmbeddingProvider } from "../../interfaces";

/**
 * Thin adapter over `openai.embeddings.create`. No pacing and no retries
 * happen here; SDK errors reach the caller unchanged.
 */
export class OpenAIEmbeddingProvider implements IEmbeddingProvider {
  private openai: OpenAI;
  private model: string;

  constructor(openai: OpenAI, model: string) {
    this.openai = openai;
    this.model = model;
  }

  async embedOne(text: string): Promise<number[]> {
    const response = await this.openai.embeddings.create({
      model: this.model,
      input: text,
      encoding_format: "float",
    });
    const first = response.data[0];
    if (!first) {
      throw new EmbeddingProviderError(
        `Embedding model ${this.model} returned no vector`,
      );
    }
    return first.embedding;
  }

  async embedMany(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];

    const response = await this.openai.embeddings.create({
      model: this.model,
      input: texts,
      encoding_format: "float",
    });
    return [...response.data]
      .sort((a, b) => a.index - b.index)
      .map((d) => d.embedding);
  }
}
