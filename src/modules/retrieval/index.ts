export { DEFAULT_TOP_K, VectorRetriever } from "./retriever";
