import type {
  ChunkingStrategyType,
  IChunk,
  IChunker,
  IChunkerConfig,
  IChunkingStrategy,
  ILoadedDocument,
  ITextSpan,
} from "../../interfaces";
import {
  FixedSizeStrategy,
  RecursiveStrategy,
  estimateTokens,
} from "./strategies";

export const DEFAULT_CHUNKER_CONFIG: IChunkerConfig = {
  strategy: "recursive",
  chunkSize: 1000,
  chunkOverlap: 200,
  separators: ["\n\n", "\n", "。", "、", ". ", " ", ""],
  trimWhitespace: true,
};

export class Chunker implements IChunker {
  private config: IChunkerConfig;
  private strategies: Map<ChunkingStrategyType, IChunkingStrategy>;

  constructor(config: Partial<IChunkerConfig> = {}) {
    this.config = { ...DEFAULT_CHUNKER_CONFIG, ...config };
    this.strategies = new Map<ChunkingStrategyType, IChunkingStrategy>([
      ["fixed", new FixedSizeStrategy()],
      ["recursive", new RecursiveStrategy()],
    ]);
  }

  chunk(text: string): ITextSpan[] {
    if (!text || text.trim().length === 0) {
      return [];
    }

    const strategy =
      this.strategies.get(this.config.strategy) ?? new RecursiveStrategy();
    return this.postProcess(strategy.chunk(text, this.config));
  }

  /**
   * Chunks every document in order and stamps each chunk with its
   * document's source and page. `index` runs across the whole sequence.
   */
  chunkDocuments(documents: readonly ILoadedDocument[]): IChunk[] {
    const chunks: IChunk[] = [];

    for (const doc of documents) {
      for (const span of this.chunk(doc.content)) {
        chunks.push({
          ...span,
          index: chunks.length,
          source: doc.source,
          ...(doc.page !== undefined ? { page: doc.page } : {}),
        });
      }
    }

    return chunks;
  }

  private postProcess(spans: ITextSpan[]): ITextSpan[] {
    let result = spans;

    if (this.config.trimWhitespace) {
      result = result.map((span) => {
        const leading = span.content.length - span.content.trimStart().length;
        const content = span.content.trim();
        const startPos = span.startPos + leading;
        return {
          ...span,
          content,
          startPos,
          endPos: startPos + content.length,
          charCount: content.length,
          tokenCount: estimateTokens(content),
        };
      });
    }

    return result
      .filter((span) => span.content.length > 0)
      .map((span, index) => ({ ...span, index }));
  }

  getConfig(): IChunkerConfig {
    return { ...this.config };
  }

  setConfig(config: Partial<IChunkerConfig>): void {
    this.config = { ...this.config, ...config };
  }
}
