// Concurrency ceiling around an embedding provider
import type { EmbeddingProvider } from '@strata-rag/shared';
import pLimit, { type LimitFunction } from 'p-limit';

export class RateLimitedEmbeddingProvider implements EmbeddingProvider {
  private readonly limit: LimitFunction;

  constructor(
    private readonly inner: EmbeddingProvider,
    maxAsync: number,
  ) {
    this.limit = pLimit(maxAsync);
  }

  embed(text: string): Promise<number[]> {
    return this.limit(() => this.inner.embed(text));
  }

  embedBatch(texts: string[]): Promise<number[][]> {
    return this.limit(() => this.inner.embedBatch(texts));
  }
}
