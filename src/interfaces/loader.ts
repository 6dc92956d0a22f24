export interface ILoadedDocument {
  content: string;
  source: string;
  /** 1-based page number for paged formats. */
  page?: number;
}

export interface IDocumentLoader {
  readonly extensions: readonly string[];
  load(filePath: string): Promise<ILoadedDocument[]>;
}

export interface ILoadFailure {
  path: string;
  error: string;
}

export interface ILoadReport {
  documents: ILoadedDocument[];
  loaded: string[];
  skipped: string[];
  failed: ILoadFailure[];
}
