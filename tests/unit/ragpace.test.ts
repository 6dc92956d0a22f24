import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  NO_ANSWER,
  NO_CONTEXT_ANSWER,
  RagPace,
  buildAnswerPrompt,
} from "../../src/RagPace";
import { INDEX_FILE_NAME } from "../../src/db/sqlite-index";
import {
  ConfigurationError,
  DirectoryOutsideDataRootError,
  EmptyInputError,
} from "../../src/errors";
import type { IBatchProgress } from "../../src/interfaces";
import {
  FakeChatModel,
  FakeEmbeddingProvider,
  createSilentLogger,
  createSleepRecorder,
  createTempDir,
} from "../mocks";

describe("RagPace", () => {
  let dir: string;
  let cleanup: () => Promise<void>;
  let docsDir: string;
  let embeddings: FakeEmbeddingProvider;
  let chat: FakeChatModel;
  let logger: ReturnType<typeof createSilentLogger>;
  let recorder: ReturnType<typeof createSleepRecorder>;

  const createRag = (overrides: { rateLimits?: { maxBatchSize: number } } = {}) =>
    new RagPace(
      {
        storage: { directory: path.join(dir, "vectordb") },
        dataDirectory: docsDir,
        openaiApiKey: "test-key",
        ...overrides,
      },
      { embeddings, chat, logger, sleep: recorder.sleep },
    );

  beforeEach(async () => {
    ({ dir, cleanup } = await createTempDir());
    docsDir = path.join(dir, "docs");
    await mkdir(docsDir);
    embeddings = new FakeEmbeddingProvider();
    chat = new FakeChatModel();
    logger = createSilentLogger();
    recorder = createSleepRecorder();
  });

  afterEach(async () => {
    vi.unstubAllEnvs();
    await cleanup();
  });

  describe("constructor", () => {
    it("should reject an invalid config", () => {
      expect(
        () =>
          new RagPace(
            { storage: { directory: "" }, openaiApiKey: "test-key" },
            { logger },
          ),
      ).toThrow(ConfigurationError);
    });

    it("should require an API key", () => {
      vi.stubEnv("OPENAI_API_KEY", "");
      expect(
        () => new RagPace({ storage: { directory: path.join(dir, "db") } }),
      ).toThrow(ConfigurationError);
    });

    it("should expose the resolved model config", () => {
      const rag = new RagPace(
        {
          storage: { directory: path.join(dir, "vectordb") },
          openaiApiKey: "test-key",
          models: { chatModel: "chat-small" },
        },
        { logger },
      );
      expect(rag.getConfig()).toEqual({
        chatModel: "chat-small",
        embeddingModel: "text-embedding-3-small",
        temperature: 0.7,
        maxRetries: 0,
      });
      expect(rag.getDataDirectory()).toBe("./data");
    });
  });

  describe("ingestDirectory", () => {
    it("should ingest loadable files and report the rest", async () => {
      await writeFile(path.join(docsDir, "alpha.txt"), "Alpha policy text.");
      await writeFile(path.join(docsDir, "beta.md"), "Beta notes.");
      await writeFile(path.join(docsDir, "gamma.pdf"), "not a real pdf");
      await writeFile(path.join(docsDir, "delta.csv"), "a,b");

      const { load, ingestion } = await createRag().ingestDirectory();

      expect(load.loaded).toEqual([
        path.join(docsDir, "alpha.txt"),
        path.join(docsDir, "beta.md"),
      ]);
      expect(load.failed.map((f) => f.path)).toEqual([
        path.join(docsDir, "gamma.pdf"),
      ]);
      expect(load.skipped).toEqual([path.join(docsDir, "delta.csv")]);
      expect(ingestion.chunkCount).toBe(2);
      expect(ingestion.batchCount).toBe(1);
      expect(ingestion.dimension).toBe(4);
      expect(ingestion.compatibility.action).toBe("created");
      expect(recorder.delays).toEqual([]);
    });

    it("should pace batches and report progress", async () => {
      for (const name of ["a.txt", "b.txt", "c.txt"]) {
        await writeFile(path.join(docsDir, name), `Contents of ${name}`);
      }
      const progress: IBatchProgress[] = [];

      const { ingestion } = await createRag({
        rateLimits: { maxBatchSize: 2 },
      }).ingestDirectory(docsDir, (p) => progress.push(p));

      expect(ingestion.batchCount).toBe(2);
      expect(progress.map((p) => p.itemCount)).toEqual([2, 1]);
      expect(recorder.delays).toHaveLength(1);
      expect(recorder.delays[0]).toBeCloseTo(600, 6);
    });

    it("should fail when nothing could be loaded", async () => {
      await writeFile(path.join(docsDir, "only.csv"), "a,b");
      const rag = createRag();

      await expect(rag.ingestDirectory()).rejects.toBeInstanceOf(
        EmptyInputError,
      );
      expect(embeddings.embedOneCalls).toEqual([]);
      expect(await rag.getStats()).toEqual({ recordCount: 0, dimension: null });
    });

    it("should append on a second run", async () => {
      await writeFile(path.join(docsDir, "alpha.txt"), "Alpha policy text.");
      const rag = createRag();

      await rag.ingestDirectory();
      const { ingestion } = await rag.ingestDirectory();

      expect(ingestion.compatibility.action).toBe("reused");
      expect(await rag.getStats()).toEqual({ recordCount: 2, dimension: 4 });
    });
  });

  describe("resolveDataPath", () => {
    it("should resolve paths inside the data directory", () => {
      const rag = createRag();
      expect(rag.resolveDataPath()).toBe(docsDir);
      expect(rag.resolveDataPath("team")).toBe(path.join(docsDir, "team"));
      expect(rag.resolveDataPath(path.join(docsDir, "a", ".."))).toBe(docsDir);
      expect(rag.resolveDataPath("..docs")).toBe(path.join(docsDir, "..docs"));
    });

    it("should reject paths that escape the data directory", () => {
      const rag = createRag();
      for (const directory of ["..", "../other", "team/../../other", dir]) {
        expect(() => rag.resolveDataPath(directory)).toThrow(
          DirectoryOutsideDataRootError,
        );
      }
    });
  });

  describe("getStats", () => {
    it("should report an unreadable index as empty and unknown", async () => {
      const location = path.join(dir, "vectordb");
      await mkdir(location);
      await writeFile(path.join(location, INDEX_FILE_NAME), "not a database");

      expect(await createRag().getStats()).toEqual({
        recordCount: 0,
        dimension: null,
      });
      expect(logger.warn).toHaveBeenCalledTimes(1);
    });
  });

  describe("ask", () => {
    it("should answer from retrieved chunks", async () => {
      await writeFile(path.join(docsDir, "alpha.txt"), "Alpha policy text.");
      await writeFile(path.join(docsDir, "beta.md"), "Beta notes.");
      const rag = createRag();
      await rag.ingestDirectory();

      const result = await rag.ask("What is the policy?");

      expect(result.answer).toBe("Fake answer");
      expect([...result.sources].sort()).toEqual(["alpha.txt", "beta.md"]);
      expect(result.chunks).toHaveLength(2);
      expect(chat.prompts).toHaveLength(1);
      const context = result.chunks.map((c) => c.content).join("\n---\n");
      expect(chat.prompts[0]?.user).toBe(
        buildAnswerPrompt("What is the policy?", context),
      );
    });

    it("should not call the chat model when nothing is indexed", async () => {
      const result = await createRag().ask("Anything?");

      expect(result).toEqual({
        answer: NO_CONTEXT_ANSWER,
        sources: [],
        chunks: [],
      });
      expect(chat.prompts).toEqual([]);
    });

    it("should fall back when the model returns no content", async () => {
      await writeFile(path.join(docsDir, "alpha.txt"), "Alpha policy text.");
      chat = new FakeChatModel(null);
      const rag = createRag();
      await rag.ingestDirectory();

      expect((await rag.ask("policy?")).answer).toBe(NO_ANSWER);
    });
  });

  it("should build the answer prompt around the context", () => {
    expect(buildAnswerPrompt("Why?", "Because.")).toBe(
      "Information:\nBecause.\n\nQuestion: Why?\n\nAnswer:",
    );
  });
});
