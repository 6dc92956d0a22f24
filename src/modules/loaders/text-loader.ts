import { readFile } from "node:fs/promises";
import type { IDocumentLoader, ILoadedDocument } from "../../interfaces";

export class TextLoader implements IDocumentLoader {
  readonly extensions = [".txt", ".md"] as const;

  private decoder = new TextDecoder("utf-8", { fatal: true });

  async load(filePath: string): Promise<ILoadedDocument[]> {
    const bytes = await readFile(filePath);
    // Throws on malformed UTF-8 rather than substituting U+FFFD.
    const content = this.decoder.decode(bytes);
    return [{ content, source: filePath }];
  }
}
