export interface IChunkMetadata {
  source: string;
  page?: number;
  chunkIndex: number;
  startPos: number;
  endPos: number;
}

export interface IVectorRecord {
  id: string;
  content: string;
  embedding: number[];
  metadata: IChunkMetadata;
}

export interface IVectorSearchResult extends IVectorRecord {
  similarity: number;
}

export interface IVectorIndexStats {
  recordCount: number;
  dimension: number | null;
}

export interface IVectorIndexWriter {
  add(records: IVectorRecord[]): Promise<void>;
  close(): Promise<void>;
}

/**
 * A persisted vector index living at one storage location.
 * Every record in it shares a single dimensionality.
 */
export interface IVectorIndex {
  readonly location: string;
  exists(): Promise<boolean>;
  /**
   * The dimensionality recorded in the index metadata, or null when the
   * collection has no recorded dimension yet. Throws when the metadata store
   * cannot be read.
   */
  readDimension(): Promise<number | null>;
  /** Creates the index if absent, or reopens it for appending. */
  open(dimension: number): Promise<IVectorIndexWriter>;
  /** Removes the whole storage location. */
  destroy(): Promise<void>;
  count(): Promise<number>;
  search(
    embedding: number[],
    limit?: number,
    threshold?: number,
  ): Promise<IVectorSearchResult[]>;
}
