/**
 * A raw embedding backend. One call per batch; `result[i]` belongs to `texts[i]`.
 * Implementations throw RateLimitError on throttling and any other error on failure.
 */
export interface EmbeddingProvider {
  embed(texts: string[]): Promise<number[][]>;
}

export type EmbeddingProviderFactory = (apiKey: string) => EmbeddingProvider;

export interface EmbeddingService {
  isAvailable(): boolean;
  getDimensions(): number;
  embed(text: string): Promise<number[]>;
  embedBatch(texts: string[]): Promise<number[][]>;
}
