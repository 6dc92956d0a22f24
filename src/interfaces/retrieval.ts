import type { IChunkMetadata } from "./database";

export interface IRetrievalChunk {
  id: string;
  content: string;
  similarity: number;
  metadata: IChunkMetadata;
}

export interface IRetrievalOptions {
  topK?: number;
  threshold?: number;
}

export interface IRetriever {
  retrieve(query: string, options?: IRetrievalOptions): Promise<IRetrievalChunk[]>;
}

export interface IAnswer {
  answer: string;
  sources: string[];
  chunks: IRetrievalChunk[];
}

export interface IChatPrompt {
  system: string;
  user: string;
}

export interface IChatModel {
  complete(prompt: IChatPrompt): Promise<string | null>;
}
