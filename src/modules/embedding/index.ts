export { OpenAIEmbeddingProvider } from "./provider";
