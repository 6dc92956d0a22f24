export interface IEmbeddingProvider {
  embedOne(text: string): Promise<number[]>;
  embedMany(texts: string[]): Promise<number[][]>;
}
