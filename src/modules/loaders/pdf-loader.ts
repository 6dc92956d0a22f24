import { readFile } from "node:fs/promises";
import { getDocument } from "pdfjs-dist/legacy/build/pdf.mjs";
import type { IDocumentLoader, ILoadedDocument } from "../../interfaces";

/**
 * One document per page, parsed straight from the file bytes with pdfjs-dist.
 * Pages with no extractable text are dropped.
 */
export class PdfLoader implements IDocumentLoader {
  readonly extensions = [".pdf"] as const;

  async load(filePath: string): Promise<ILoadedDocument[]> {
    const data = new Uint8Array(await readFile(filePath));
    const pdf = await getDocument({
      data,
      useSystemFonts: true,
      isEvalSupported: false,
    }).promise;

    try {
      const documents: ILoadedDocument[] = [];
      for (let pageNum = 1; pageNum <= pdf.numPages; pageNum++) {
        const page = await pdf.getPage(pageNum);
        const textContent = await page.getTextContent();
        const content = textContent.items
          .map((item) => ("str" in item ? item.str : ""))
          .join(" ")
          .trim();
        if (content.length > 0) {
          documents.push({ content, source: filePath, page: pageNum });
        }
      }
      return documents;
    } finally {
      await pdf.destroy();
    }
  }
}
