import { EmbeddingProviderError, errorMessage } from "../../errors";
import type {
  ICompatibilityReport,
  IEmbeddingProvider,
  ILogger,
  IVectorIndex,
} from "../../interfaces";

export const DIMENSION_PROBE_TEXT = "dimension probe";

/**
 * Keeps vectors of different lengths out of one index. When the configured
 * embedding model no longer matches the dimensionality recorded in an
 * existing index, the index is deleted outright. There is no backup and no
 * migration.
 */
export class IndexCompatibilityGuard {
  private store: IVectorIndex;
  private embeddings: IEmbeddingProvider;
  private logger: ILogger;

  constructor(
    store: IVectorIndex,
    embeddings: IEmbeddingProvider,
    logger: ILogger = console,
  ) {
    this.store = store;
    this.embeddings = embeddings;
    this.logger = logger;
  }

  async probeDimension(): Promise<number> {
    const vector = await this.embeddings.embedOne(DIMENSION_PROBE_TEXT);
    if (vector.length === 0) {
      throw new EmbeddingProviderError(
        "Embedding provider returned an empty vector for the dimension probe",
      );
    }
    return vector.length;
  }

  /** null when there is no index, or when its metadata cannot be read. */
  async readExistingDimension(): Promise<number | null> {
    if (!(await this.store.exists())) return null;

    try {
      const dimension = await this.store.readDimension();
      if (dimension === null) {
        this.logger.warn(
          `No dimension recorded in ${this.store.location}; treating it as unknown`,
        );
      }
      return dimension;
    } catch (error) {
      this.logger.warn(
        `Could not read index metadata at ${this.store.location}: ${errorMessage(error)}`,
      );
      return null;
    }
  }

  async ensureCompatible(): Promise<ICompatibilityReport> {
    const targetDimension = await this.probeDimension();

    if (!(await this.store.exists())) {
      return { action: "created", targetDimension, existingDimension: null };
    }

    const existingDimension = await this.readExistingDimension();

    if (existingDimension === null) {
      this.logger.warn(
        `Reusing ${this.store.location} without a dimension check`,
      );
      return { action: "unverified", targetDimension, existingDimension };
    }

    if (existingDimension !== targetDimension) {
      this.logger.warn(
        `Index at ${this.store.location} holds ${existingDimension}-dimensional vectors but the embedding model produces ${targetDimension}; deleting it`,
      );
      await this.store.destroy();
      return { action: "discarded", targetDimension, existingDimension };
    }

    this.logger.info(
      `Reusing index at ${this.store.location} (${existingDimension} dimensions)`,
    );
    return { action: "reused", targetDimension, existingDimension };
  }
}
