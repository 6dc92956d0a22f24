import type {
  IChunkerConfig,
  IChunkingStrategy,
  ITextSpan,
} from "../../interfaces";

export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

export function createSpan(
  content: string,
  index: number,
  startPos: number,
): ITextSpan {
  return {
    content,
    index,
    startPos,
    endPos: startPos + content.length,
    charCount: content.length,
    tokenCount: estimateTokens(content),
  };
}

export class FixedSizeStrategy implements IChunkingStrategy {
  chunk(text: string, config: IChunkerConfig): ITextSpan[] {
    return this.chunkAt(text, config, 0);
  }

  chunkAt(text: string, config: IChunkerConfig, offset: number): ITextSpan[] {
    const spans: ITextSpan[] = [];
    const { chunkSize, chunkOverlap } = config;
    const step = Math.max(1, chunkSize - chunkOverlap);

    for (let start = 0; start < text.length; start += step) {
      const end = Math.min(start + chunkSize, text.length);
      spans.push(createSpan(text.slice(start, end), spans.length, offset + start));
      if (end >= text.length) break;
    }

    return spans;
  }
}

interface Piece {
  start: number;
  end: number;
}

/**
 * Splits on the first separator present in the text, merges neighbouring
 * pieces up to `chunkSize`, and recurses with the remaining separators into
 * any piece that is still too long. Consecutive chunks share up to
 * `chunkOverlap` characters of whole pieces.
 */
export class RecursiveStrategy implements IChunkingStrategy {
  private fixed = new FixedSizeStrategy();

  chunk(text: string, config: IChunkerConfig): ITextSpan[] {
    return this.split(text, config.separators ?? [""], config, 0).map(
      (span, index) => ({ ...span, index }),
    );
  }

  private split(
    text: string,
    separators: string[],
    config: IChunkerConfig,
    offset: number,
  ): ITextSpan[] {
    const { chunkSize, chunkOverlap } = config;

    if (text.length <= chunkSize) {
      return [createSpan(text, 0, offset)];
    }

    const sepIndex = separators.findIndex(
      (sep) => sep === "" || text.includes(sep),
    );
    const separator = separators[sepIndex];
    if (sepIndex === -1 || separator === undefined || separator === "") {
      return this.fixed.chunkAt(text, config, offset);
    }
    const remaining = separators.slice(sepIndex + 1);

    const pieces: Piece[] = [];
    let cursor = 0;
    for (const part of text.split(separator)) {
      if (part.length > 0) {
        pieces.push({ start: cursor, end: cursor + part.length });
      }
      cursor += part.length + separator.length;
    }

    const spans: ITextSpan[] = [];
    let window: Piece[] = [];
    const windowStart = () => window[0]?.start ?? 0;
    const windowEnd = () => window[window.length - 1]?.end ?? 0;
    const flush = () => {
      const start = windowStart();
      spans.push(
        createSpan(text.slice(start, windowEnd()), spans.length, offset + start),
      );
    };

    for (const piece of pieces) {
      if (piece.end - piece.start > chunkSize) {
        if (window.length > 0) flush();
        window = [];
        spans.push(
          ...this.split(
            text.slice(piece.start, piece.end),
            remaining,
            config,
            offset + piece.start,
          ),
        );
        continue;
      }

      if (window.length > 0 && piece.end - windowStart() > chunkSize) {
        flush();
        while (
          window.length > 0 &&
          (windowEnd() - windowStart() > chunkOverlap ||
            piece.end - windowStart() > chunkSize)
        ) {
          window.shift();
        }
      }
      window.push(piece);
    }

    if (window.length > 0) flush();
    return spans;
  }
}
