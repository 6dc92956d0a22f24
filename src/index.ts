export {
  RagPace,
  NO_ANSWER,
  NO_CONTEXT_ANSWER,
  buildAnswerPrompt,
} from "./RagPace";
export type {
  DirectoryIngestionResult,
  RagPaceOptions,
} from "./RagPace";

export * from "./config";
export * from "./errors";

export {
  SqliteVectorIndex,
  INDEX_FILE_NAME,
  cosineSimilarity,
} from "./db/sqlite-index";

export {
  Chunker,
  DEFAULT_CHUNKER_CONFIG,
  FixedSizeStrategy,
  RecursiveStrategy,
} from "./modules/chunker";

export { DirectorySource, PdfLoader, TextLoader } from "./modules/loaders";
export { OpenAIEmbeddingProvider } from "./modules/embedding";
export { OpenAIChatModel } from "./modules/chat";

export {
  BatchIngestionDriver,
  DIMENSION_PROBE_TEXT,
  IndexCompatibilityGuard,
  RateGovernor,
  partitionIntoBatches,
} from "./modules/ingestion";
export type { BatchIngestionDeps, Sleep } from "./modules/ingestion";

export { VectorRetriever } from "./modules/retrieval";

export { createApp } from "./api/app";

export * from "./interfaces";
