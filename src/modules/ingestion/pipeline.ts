import crypto from "node:crypto";
import { setTimeout as delay } from "node:timers/promises";
import { EmbeddingProviderError, EmptyInputError } from "../../errors";
import type {
  IChunk,
  IEmbeddingProvider,
  IIngestionDriver,
  IIngestionResult,
  ILogger,
  IVectorIndex,
  IVectorIndexWriter,
  IVectorRecord,
  IngestionProgressCallback,
} from "../../interfaces";
import { IndexCompatibilityGuard } from "./compatibility-guard";
import type { RateGovernor } from "./rate-governor";

export type Sleep = (ms: number) => Promise<void>;

export interface BatchIngestionDeps {
  store: IVectorIndex;
  embeddings: IEmbeddingProvider;
  governor: RateGovernor;
  guard?: IndexCompatibilityGuard;
  logger?: ILogger;
  sleep?: Sleep;
  generateId?: () => string;
}

type DriverState =
  | { status: "uninitialized" }
  | { status: "active"; writer: IVectorIndexWriter };

export function partitionIntoBatches<T>(
  items: readonly T[],
  size: number,
): T[][] {
  const step = Math.max(1, Math.floor(size));
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += step) {
    batches.push(items.slice(i, i + step));
  }
  return batches;
}

function toRecord(chunk: IChunk, embedding: number[], id: string): IVectorRecord {
  return {
    id,
    content: chunk.content,
    embedding,
    metadata: {
      source: chunk.source,
      ...(chunk.page !== undefined ? { page: chunk.page } : {}),
      chunkIndex: chunk.index,
      startPos: chunk.startPos,
      endPos: chunk.endPos,
    },
  };
}

/**
 * Drives a chunk sequence into the persisted index one governed batch at a
 * time. Batches run strictly in sequence; a failed embedding or write aborts
 * the run and leaves every earlier batch committed.
 */
export class BatchIngestionDriver implements IIngestionDriver {
  private store: IVectorIndex;
  private embeddings: IEmbeddingProvider;
  private governor: RateGovernor;
  private guard: IndexCompatibilityGuard;
  private logger: ILogger;
  private sleep: Sleep;
  private generateId: () => string;

  constructor(deps: BatchIngestionDeps) {
    this.store = deps.store;
    this.embeddings = deps.embeddings;
    this.governor = deps.governor;
    this.logger = deps.logger ?? console;
    this.guard =
      deps.guard ??
      new IndexCompatibilityGuard(deps.store, deps.embeddings, this.logger);
    this.sleep = deps.sleep ?? ((ms) => delay(ms));
    this.generateId = deps.generateId ?? (() => crypto.randomUUID());
  }

  async ingest(
    chunks: readonly IChunk[],
    onProgress?: IngestionProgressCallback,
  ): Promise<IIngestionResult> {
    const startTime = Date.now();

    if (chunks.length === 0) {
      throw new EmptyInputError();
    }

    const compatibility = await this.guard.ensureCompatible();
    const dimension = compatibility.targetDimension;

    const budget = this.governor.checkDailyBudget(chunks.length);
    if (budget.exceeded) {
      this.logger.warn(
        `Estimated ${budget.estimatedRequests} embedding requests exceed the daily quota of ${budget.requestsPerDay}; continuing, the provider may reject later batches`,
      );
    }

    const batches = partitionIntoBatches(chunks, this.governor.maxBatchSize);
    this.logger.info(
      `Ingesting ${chunks.length} chunks in ${batches.length} batch(es) of up to ${this.governor.maxBatchSize}`,
    );

    let state: DriverState = { status: "uninitialized" };

    try {
      for (const [batchIndex, batch] of batches.entries()) {
        const texts = batch.map((chunk) => chunk.content);
        const estimatedTokens = this.governor.estimateTokens(texts);
        const vectors = await this.embeddings.embedMany(texts);
        this.assertBatchShape(vectors, batch.length, dimension, batchIndex);

        const records = batch.map((chunk, i) =>
          toRecord(chunk, vectors[i] ?? [], this.generateId()),
        );

        if (state.status === "uninitialized") {
          state = { status: "active", writer: await this.store.open(dimension) };
        }
        await state.writer.add(records);

        const isLast = batchIndex === batches.length - 1;
        const delayMs = isLast ? 0 : this.governor.delayMs(estimatedTokens);

        this.logger.info(
          `Batch ${batchIndex + 1}/${batches.length}: ${batch.length} chunk(s), ~${estimatedTokens} tokens`,
        );
        onProgress?.({
          batchIndex,
          batchCount: batches.length,
          itemCount: batch.length,
          estimatedTokens,
          delayMs,
        });

        if (!isLast) {
          await this.sleep(delayMs);
        }
      }
    } finally {
      if (state.status === "active") {
        await state.writer.close();
      }
    }

    return {
      chunkCount: chunks.length,
      batchCount: batches.length,
      dimension,
      compatibility,
      processingTimeMs: Date.now() - startTime,
    };
  }

  private assertBatchShape(
    vectors: number[][],
    expectedCount: number,
    dimension: number,
    batchIndex: number,
  ): void {
    if (vectors.length !== expectedCount) {
      throw new EmbeddingProviderError(
        `Batch ${batchIndex + 1}: expected ${expectedCount} embeddings, got ${vectors.length}`,
      );
    }
    const wrong = vectors.findIndex((v) => v.length !== dimension);
    if (wrong !== -1) {
      throw new EmbeddingProviderError(
        `Batch ${batchIndex + 1}: embedding ${wrong} has ${vectors[wrong]?.length} dimensions, expected ${dimension}`,
      );
    }
  }
}
