import type { IChunk } from "./chunker";

export type CompatibilityAction =
  | "created"
  | "reused"
  | "unverified"
  | "discarded";

export interface ICompatibilityReport {
  action: CompatibilityAction;
  targetDimension: number;
  existingDimension: number | null;
}

export interface IBatchProgress {
  batchIndex: number;
  batchCount: number;
  itemCount: number;
  estimatedTokens: number;
  /** Wait before the next batch; 0 after the last one. */
  delayMs: number;
}

export type IngestionProgressCallback = (progress: IBatchProgress) => void;

export interface IIngestionResult {
  chunkCount: number;
  batchCount: number;
  dimension: number;
  compatibility: ICompatibilityReport;
  processingTimeMs: number;
}

export interface IIngestionDriver {
  ingest(
    chunks: readonly IChunk[],
    onProgress?: IngestionProgressCallback,
  ): Promise<IIngestionResult>;
}
