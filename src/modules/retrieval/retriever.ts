import type {
  IEmbeddingProvider,
  IRetrievalChunk,
  IRetrievalOptions,
  IRetriever,
  IVectorIndex,
} from "../../interfaces";

export const DEFAULT_TOP_K = 5;

export class VectorRetriever implements IRetriever {
  private store: IVectorIndex;
  private embeddings: IEmbeddingProvider;

  constructor(store: IVectorIndex, embeddings: IEmbeddingProvider) {
    this.store = store;
    this.embeddings = embeddings;
  }

  async retrieve(
    query: string,
    options?: IRetrievalOptions,
  ): Promise<IRetrievalChunk[]> {
    const topK = options?.topK ?? DEFAULT_TOP_K;
    const threshold = options?.threshold ?? 0;

    const embedding = await this.embeddings.embedOne(query);
    const results = await this.store.search(embedding, topK, threshold);

    return results.map((r) => ({
      id: r.id,
      content: r.content,
      similarity: r.similarity,
      metadata: r.metadata,
    }));
  }
}
