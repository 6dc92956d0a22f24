export { OpenAIChatModel } from "./chat-model";
