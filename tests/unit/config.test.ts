import { describe, expect, it } from "vitest";
import {
  DEFAULT_MODEL_CONFIG,
  DEFAULT_RATE_LIMITS,
  RagPaceConfigSchema,
  RateLimitsSchema,
  StorageConfigSchema,
  configFromEnv,
  resolveModelConfig,
  resolveRateLimits,
} from "../../src/config";

describe("Configuration Schemas", () => {
  describe("StorageConfigSchema", () => {
    it("should accept a directory", () => {
      const result = StorageConfigSchema.parse({ directory: "./vectordb" });
      expect(result.directory).toBe("./vectordb");
      expect(result.collectionName).toBeUndefined();
    });

    it("should reject an empty directory", () => {
      expect(() => StorageConfigSchema.parse({ directory: "" })).toThrow();
    });
  });

  describe("RateLimitsSchema", () => {
    it("should reject non-positive quotas", () => {
      expect(() => RateLimitsSchema.parse({ requestsPerMinute: 0 })).toThrow();
      expect(() => RateLimitsSchema.parse({ tokensPerMinute: -1 })).toThrow();
    });

    it("should reject a fractional batch ceiling", () => {
      expect(() => RateLimitsSchema.parse({ maxBatchSize: 2.5 })).toThrow();
    });
  });

  describe("RagPaceConfigSchema", () => {
    it("should require storage", () => {
      expect(RagPaceConfigSchema.safeParse({}).success).toBe(false);
    });

    it("should reject a malformed base URL", () => {
      const result = RagPaceConfigSchema.safeParse({
        storage: { directory: "./vectordb" },
        openaiBaseURL: "not a url",
      });
      expect(result.success).toBe(false);
    });

    it("should accept a full config", () => {
      const result = RagPaceConfigSchema.safeParse({
        storage: { directory: "./vectordb", collectionName: "handbook" },
        dataDirectory: "./data",
        openaiApiKey: "test-key",
        openaiBaseURL: "https://example.test/v1",
        models: { chatModel: "chat-model", temperature: 0 },
        rateLimits: { requestsPerMinute: 10 },
        chunker: { strategy: "fixed", chunkSize: 300 },
      });
      expect(result.success).toBe(true);
    });
  });
});

describe("resolveModelConfig", () => {
  it("should return defaults when nothing is given", () => {
    expect(resolveModelConfig()).toEqual({
      chatModel: "gpt-4o",
      embeddingModel: "text-embedding-3-small",
      temperature: 0.7,
      maxRetries: 0,
    });
  });

  it("should keep an explicit zero temperature", () => {
    const config = resolveModelConfig({ temperature: 0 });
    expect(config.temperature).toBe(0);
    expect(config.chatModel).toBe(DEFAULT_MODEL_CONFIG.chatModel);
  });

  it("should freeze the result", () => {
    expect(Object.isFrozen(resolveModelConfig())).toBe(true);
  });
});

describe("resolveRateLimits", () => {
  it("should fill unset fields from the defaults", () => {
    expect(resolveRateLimits({ tokensPerMinute: 3_000 })).toEqual({
      ...DEFAULT_RATE_LIMITS,
      tokensPerMinute: 3_000,
    });
  });

  it("should freeze the result", () => {
    expect(Object.isFrozen(resolveRateLimits())).toBe(true);
  });
});

describe("configFromEnv", () => {
  it("should apply defaults to an empty environment", () => {
    const config = configFromEnv({});
    expect(config.port).toBe(3000);
    expect(config.storage).toEqual({ directory: "./vectordb" });
    expect(config.dataDirectory).toBe("./data");
    expect(config.openaiApiKey).toBeUndefined();
    expect(resolveRateLimits(config.rateLimits)).toEqual(DEFAULT_RATE_LIMITS);
  });

  it("should read models, quotas and paths", () => {
    const config = configFromEnv({
      OPENAI_API_KEY: "test-key",
      EMBEDDING_MODEL: "embed-small",
      VECTOR_DB_DIR: "/tmp/index",
      DATA_DIR: "/tmp/docs",
      RATE_RPM: "15",
      RATE_TPM: "1000000",
      RATE_MAX_BATCH: "10",
      PORT: "8080",
    });
    expect(config.port).toBe(8080);
    expect(config.openaiApiKey).toBe("test-key");
    expect(config.models?.embeddingModel).toBe("embed-small");
    expect(config.storage.directory).toBe("/tmp/index");
    expect(config.dataDirectory).toBe("/tmp/docs");
    expect(config.rateLimits).toEqual({
      requestsPerMinute: 15,
      tokensPerMinute: 1_000_000,
      requestsPerDay: undefined,
      estimatedTokensPerItem: undefined,
      maxBatchSize: 10,
    });
  });

  it("should treat an empty API key as unset", () => {
    expect(configFromEnv({ OPENAI_API_KEY: "" }).openaiApiKey).toBeUndefined();
  });

  it("should reject a non-numeric port", () => {
    expect(() => configFromEnv({ PORT: "abc" })).toThrow();
  });
});
