import path from "node:path";
import OpenAI from "openai";
import {
  DEFAULT_DATA_DIRECTORY,
  RagPaceConfigSchema,
  type RagPaceConfigWithClient,
  type ResolvedModelConfig,
  resolveModelConfig,
  resolveRateLimits,
} from "./config";
import { SqliteVectorIndex } from "./db/sqlite-index";
import {
  ConfigurationError,
  DirectoryOutsideDataRootError,
  EmptyInputError,
  errorMessage,
} from "./errors";
import type {
  IAnswer,
  IChatModel,
  IChunk,
  IChunkerConfig,
  IDocumentLoader,
  IEmbeddingProvider,
  IIngestionResult,
  ILoadReport,
  ILogger,
  IVectorIndex,
  IVectorIndexStats,
  IngestionProgressCallback,
} from "./interfaces";
import { OpenAIChatModel } from "./modules/chat";
import { Chunker } from "./modules/chunker";
import { OpenAIEmbeddingProvider } from "./modules/embedding";
import {
  BatchIngestionDriver,
  RateGovernor,
  type Sleep,
} from "./modules/ingestion";
import { DirectorySource, defaultLoaders } from "./modules/loaders";
import { VectorRetriever } from "./modules/retrieval";

export const NO_CONTEXT_ANSWER = "I couldn't find any relevant information.";
export const NO_ANSWER = "No answer generated.";

export interface RagPaceOptions {
  logger?: ILogger;
  sleep?: Sleep;
  loaders?: IDocumentLoader[];
  embeddings?: IEmbeddingProvider;
  chat?: IChatModel;
  store?: IVectorIndex;
}

const ANSWER_SYSTEM_PROMPT = `Answer the question accurately and in detail using only the information below.
If the information does not contain the answer, reply "The provided information does not contain an answer."`;

export function buildAnswerPrompt(query: string, context: string): string {
  return `Information:
${context}

Question: ${query}

Answer:`;
}

export interface DirectoryIngestionResult {
  load: ILoadReport;
  ingestion: IIngestionResult;
}

export class RagPace {
  private config: Readonly<ResolvedModelConfig>;
  private dataDirectory: string;
  private store: IVectorIndex;
  private embeddings: IEmbeddingProvider;
  private chat: IChatModel;
  private chunker: Chunker;
  private source: DirectorySource;
  private driver: BatchIngestionDriver;
  private retriever: VectorRetriever;
  private logger: ILogger;

  constructor(config: RagPaceConfigWithClient, options: RagPaceOptions = {}) {
    const parsed = RagPaceConfigSchema.safeParse(config);
    if (!parsed.success) {
      throw new ConfigurationError(
        `Invalid configuration: ${parsed.error.issues
          .map((i) => `${i.path.join(".")}: ${i.message}`)
          .join("; ")}`,
      );
    }
    const validConfig = parsed.data;
    this.config = resolveModelConfig(validConfig.models);
    this.logger = options.logger ?? console;

    let openai: OpenAI;
    if (config.openaiClient) {
      openai = config.openaiClient;
    } else {
      const apiKey = validConfig.openaiApiKey || process.env.OPENAI_API_KEY;
      if (!apiKey) {
        throw new ConfigurationError(
          "OpenAI API key is required: set OPENAI_API_KEY or pass openaiApiKey",
        );
      }
      openai = new OpenAI({
        apiKey,
        baseURL: validConfig.openaiBaseURL,
        maxRetries: this.config.maxRetries,
      });
    }

    this.dataDirectory = validConfig.dataDirectory ?? DEFAULT_DATA_DIRECTORY;
    this.store = options.store ?? new SqliteVectorIndex(validConfig.storage);
    this.embeddings =
      options.embeddings ??
      new OpenAIEmbeddingProvider(openai, this.config.embeddingModel);
    this.chat =
      options.chat ??
      new OpenAIChatModel(openai, this.config.chatModel, this.config.temperature);
    this.chunker = new Chunker(validConfig.chunker);
    this.source = new DirectorySource(
      options.loaders ?? defaultLoaders(),
      this.logger,
    );
    this.driver = new BatchIngestionDriver({
      store: this.store,
      embeddings: this.embeddings,
      governor: new RateGovernor(resolveRateLimits(validConfig.rateLimits)),
      logger: this.logger,
      sleep: options.sleep,
    });
    this.retriever = new VectorRetriever(this.store, this.embeddings);
  }

  /**
   * Loads, chunks and ingests every supported file in `directory`.
   * Files that fail to load are reported in `load.failed` and skipped.
   */
  async ingestDirectory(
    directory: string = this.dataDirectory,
    onProgress?: IngestionProgressCallback,
  ): Promise<DirectoryIngestionResult> {
    const load = await this.source.load(directory);
    if (load.documents.length === 0) {
      throw new EmptyInputError(
        `Nothing to ingest: no documents could be loaded from ${directory}`,
      );
    }

    const chunks = this.chunker.chunkDocuments(load.documents);
    this.logger.info(
      `Split ${load.documents.length} document(s) into ${chunks.length} chunk(s)`,
    );

    const ingestion = await this.ingestChunks(chunks, onProgress);
    return { load, ingestion };
  }

  async ingestChunks(
    chunks: readonly IChunk[],
    onProgress?: IngestionProgressCallback,
  ): Promise<IIngestionResult> {
    const result = await this.driver.ingest(chunks, onProgress);
    this.logger.info(
      `Ingested ${result.chunkCount} chunk(s) into ${this.store.location} in ${result.processingTimeMs}ms`,
    );
    return result;
  }

  async ask(query: string): Promise<IAnswer> {
    const chunks = await this.retriever.retrieve(query);
    const sources = [
      ...new Set(chunks.map((c) => path.basename(c.metadata.source))),
    ];

    if (chunks.length === 0) {
      return { answer: NO_CONTEXT_ANSWER, sources, chunks };
    }

    const context = chunks.map((c) => c.content).join("\n---\n");
    const answer = await this.chat.complete({
      system: ANSWER_SYSTEM_PROMPT,
      user: buildAnswerPrompt(query, context),
    });

    return { answer: answer || NO_ANSWER, sources, chunks };
  }

  async getStats(): Promise<IVectorIndexStats> {
    const exists = await this.store.exists();
    if (!exists) return { recordCount: 0, dimension: null };
    try {
      return {
        recordCount: await this.store.count(),
        dimension: await this.store.readDimension(),
      };
    } catch (error) {
      this.logger.warn(
        `Could not read index at ${this.store.location}: ${errorMessage(error)}`,
      );
      return { recordCount: 0, dimension: null };
    }
  }

  getConfig(): ResolvedModelConfig {
    return { ...this.config };
  }

  getDataDirectory(): string {
    return this.dataDirectory;
  }

  /**
   * Resolves `directory` against the data directory and rejects anything
   * that lands outside it.
   */
  resolveDataPath(directory = "."): string {
    const root = path.resolve(this.dataDirectory);
    const target = path.resolve(root, directory);
    const relative = path.relative(root, target);
    if (
      relative === ".." ||
      relative.startsWith(`..${path.sep}`) ||
      path.isAbsolute(relative)
    ) {
      throw new DirectoryOutsideDataRootError(directory, root);
    }
    return target;
  }

  setChunkerConfig(config: Partial<IChunkerConfig>): void {
    this.chunker.setConfig(config);
  }
}
