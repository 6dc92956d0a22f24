import { readdir, stat } from "node:fs/promises";
import path from "node:path";
import { SourceDirectoryError, errorMessage } from "../../errors";
import type {
  IDocumentLoader,
  ILoadReport,
  ILogger,
} from "../../interfaces";
import { PdfLoader } from "./pdf-loader";
import { TextLoader } from "./text-loader";

export function defaultLoaders(): IDocumentLoader[] {
  return [new TextLoader(), new PdfLoader()];
}

/**
 * Loads every supported file directly inside a directory. A file that fails
 * to load is logged and reported, never thrown.
 */
export class DirectorySource {
  private loaders: Map<string, IDocumentLoader>;
  private logger: ILogger;

  constructor(loaders: IDocumentLoader[] = defaultLoaders(), logger: ILogger = console) {
    this.loaders = new Map();
    for (const loader of loaders) {
      for (const ext of loader.extensions) {
        this.loaders.set(ext.toLowerCase(), loader);
      }
    }
    this.logger = logger;
  }

  supportedExtensions(): string[] {
    return [...this.loaders.keys()];
  }

  async load(directory: string): Promise<ILoadReport> {
    const exists = await stat(directory).then(
      (s) => s.isDirectory(),
      () => false,
    );
    if (!exists) {
      throw new SourceDirectoryError(directory);
    }

    const entries = await readdir(directory, { withFileTypes: true });
    const files = entries
      .filter((entry) => entry.isFile())
      .map((entry) => entry.name)
      .sort();

    const report: ILoadReport = {
      documents: [],
      loaded: [],
      skipped: [],
      failed: [],
    };

    for (const name of files) {
      const filePath = path.join(directory, name);
      const loader = this.loaders.get(path.extname(name).toLowerCase());

      if (!loader) {
        this.logger.info(`Skipping unsupported file: ${filePath}`);
        report.skipped.push(filePath);
        continue;
      }

      try {
        const documents = await loader.load(filePath);
        report.documents.push(...documents);
        report.loaded.push(filePath);
        this.logger.info(`Loaded ${filePath} (${documents.length} document(s))`);
      } catch (error) {
        const cause = errorMessage(error);
        this.logger.error(`Failed to load ${filePath}: ${cause}`);
        report.failed.push({ path: filePath, error: cause });
      }
    }

    this.logger.info(
      `Loaded ${report.loaded.length} of ${files.length} file(s): ${report.documents.length} document(s), ${report.failed.length} failed, ${report.skipped.length} skipped`,
    );
    return report;
  }
}
