import type OpenAI from "openai";
import { z } from "zod";

export const StorageConfigSchema = z.object({
  directory: z.string().min(1),
  collectionName: z.string().min(1).optional(),
});

export const ModelConfigSchema = z.object({
  chatModel: z.string().optional(),
  embeddingModel: z.string().optional(),
  temperature: z.number().min(0).max(2).optional(),
  maxRetries: z.number().int().min(0).optional(),
});

export const RateLimitsSchema = z.object({
  requestsPerMinute: z.number().positive().optional(),
  tokensPerMinute: z.number().positive().optional(),
  requestsPerDay: z.number().positive().optional(),
  estimatedTokensPerItem: z.number().positive().optional(),
  maxBatchSize: z.number().int().min(1).optional(),
});

export const ChunkerConfigSchema = z.object({
  strategy: z.enum(["fixed", "recursive"]).optional(),
  chunkSize: z.number().int().positive().optional(),
  chunkOverlap: z.number().int().min(0).optional(),
  separators: z.array(z.string()).optional(),
  trimWhitespace: z.boolean().optional(),
});

export const RagPaceConfigSchema = z.object({
  storage: StorageConfigSchema,
  dataDirectory: z.string().optional(),
  openaiApiKey: z.string().optional(),
  openaiBaseURL: z.string().url().optional(),
  models: ModelConfigSchema.optional(),
  rateLimits: RateLimitsSchema.optional(),
  chunker: ChunkerConfigSchema.optional(),
});

export type StorageConfig = z.infer<typeof StorageConfigSchema>;
export type ModelConfigInput = z.infer<typeof ModelConfigSchema>;
export type RateLimitsInput = z.infer<typeof RateLimitsSchema>;
export type RagPaceConfig = z.infer<typeof RagPaceConfigSchema>;

export interface RagPaceConfigWithClient extends RagPaceConfig {
  openaiClient?: OpenAI;
}

export interface ResolvedModelConfig {
  chatModel: string;
  embeddingModel: string;
  temperature: number;
  maxRetries: number;
}

/**
 * Provider quotas the ingestion pacing is derived from.
 * `maxBatchSize` is a ceiling; the effective size also depends on TPM.
 */
export interface RateLimits {
  requestsPerMinute: number;
  tokensPerMinute: number;
  requestsPerDay: number;
  estimatedTokensPerItem: number;
  maxBatchSize: number;
}

export const DEFAULT_MODEL_CONFIG: ResolvedModelConfig = {
  chatModel: "gpt-4o",
  embeddingModel: "text-embedding-3-small",
  temperature: 0.7,
  maxRetries: 0,
};

export const DEFAULT_RATE_LIMITS: RateLimits = {
  requestsPerMinute: 100,
  tokensPerMinute: 30_000,
  requestsPerDay: 1_000,
  estimatedTokensPerItem: 1_000,
  maxBatchSize: 5,
};

export const DEFAULT_COLLECTION_NAME = "documents";
export const DEFAULT_DATA_DIRECTORY = "./data";
export const DEFAULT_STORAGE_DIRECTORY = "./vectordb";

export function resolveModelConfig(
  input: ModelConfigInput = {},
): Readonly<ResolvedModelConfig> {
  return Object.freeze({
    chatModel: input.chatModel ?? DEFAULT_MODEL_CONFIG.chatModel,
    embeddingModel: input.embeddingModel ?? DEFAULT_MODEL_CONFIG.embeddingModel,
    temperature: input.temperature ?? DEFAULT_MODEL_CONFIG.temperature,
    maxRetries: input.maxRetries ?? DEFAULT_MODEL_CONFIG.maxRetries,
  });
}

export function resolveRateLimits(
  input: RateLimitsInput = {},
): Readonly<RateLimits> {
  return Object.freeze({
    requestsPerMinute:
      input.requestsPerMinute ?? DEFAULT_RATE_LIMITS.requestsPerMinute,
    tokensPerMinute: input.tokensPerMinute ?? DEFAULT_RATE_LIMITS.tokensPerMinute,
    requestsPerDay: input.requestsPerDay ?? DEFAULT_RATE_LIMITS.requestsPerDay,
    estimatedTokensPerItem:
      input.estimatedTokensPerItem ?? DEFAULT_RATE_LIMITS.estimatedTokensPerItem,
    maxBatchSize: input.maxBatchSize ?? DEFAULT_RATE_LIMITS.maxBatchSize,
  });
}

const EnvSchema = z.object({
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_BASE_URL: z.string().optional(),
  CHAT_MODEL: z.string().optional(),
  EMBEDDING_MODEL: z.string().optional(),
  VECTOR_DB_DIR: z.string().default(DEFAULT_STORAGE_DIRECTORY),
  DATA_DIR: z.string().default(DEFAULT_DATA_DIRECTORY),
  RATE_RPM: z.coerce.number().optional(),
  RATE_TPM: z.coerce.number().optional(),
  RATE_RPD: z.coerce.number().optional(),
  RATE_TOKENS_PER_ITEM: z.coerce.number().optional(),
  RATE_MAX_BATCH: z.coerce.number().optional(),
  PORT: z.coerce.number().int().positive().default(3000),
});

export function configFromEnv(
  env: NodeJS.ProcessEnv = process.env,
): RagPaceConfig & { port: number } {
  const parsed = EnvSchema.parse(env);
  return {
    port: parsed.PORT,
    storage: { directory: parsed.VECTOR_DB_DIR },
    dataDirectory: parsed.DATA_DIR,
    openaiApiKey: parsed.OPENAI_API_KEY || undefined,
    openaiBaseURL: parsed.OPENAI_BASE_URL || undefined,
    models: {
      chatModel: parsed.CHAT_MODEL,
      embeddingModel: parsed.EMBEDDING_MODEL,
    },
    rateLimits: {
      requestsPerMinute: parsed.RATE_RPM,
      tokensPerMinute: parsed.RATE_TPM,
      requestsPerDay: parsed.RATE_RPD,
      estimatedTokensPerItem: parsed.RATE_TOKENS_PER_ITEM,
      maxBatchSize: parsed.RATE_MAX_BATCH,
    },
  };
}
