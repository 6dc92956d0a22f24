import type { ILoadedDocument } from "./loader";

export type ChunkingStrategyType = "fixed" | "recursive";

export interface IChunk {
  content: string;
  index: number;
  startPos: number;
  endPos: number;
  tokenCount: number;
  charCount: number;
  /** Path of the file the chunk was cut from. */
  source: string;
  page?: number;
}

/** A chunk before provenance is attached. */
export type ITextSpan = Omit<IChunk, "source" | "page">;

export interface IChunkerConfig {
  strategy: ChunkingStrategyType;
  chunkSize: number;
  chunkOverlap: number;
  separators?: string[];
  trimWhitespace?: boolean;
}

export interface IChunkingStrategy {
  chunk(text: string, config: IChunkerConfig): ITextSpan[];
}

export interface IChunker {
  chunk(text: string): ITextSpan[];
  chunkDocuments(documents: readonly ILoadedDocument[]): IChunk[];
  getConfig(): IChunkerConfig;
  setConfig(config: Partial<IChunkerConfig>): void;
}
