// Concurrency ceiling around a completion provider
import type { LLMCompletionOptions, LLMProvider } from '@strata-rag/shared';
import pLimit, { type LimitFunction } from 'p-limit';

/**
 * At most `maxAsync` completions in flight; the rest queue in call order
 */
export class RateLimitedLLMProvider implements LLMProvider {
  private readonly limit: LimitFunction;

  constructor(
    private readonly inner: LLMProvider,
    maxAsync: number,
  ) {
    this.limit = pLimit(maxAsync);
  }

  get activeCount(): number {
    return this.limit.activeCount;
  }

  get pendingCount(): number {
    return this.limit.pendingCount;
  }

  complete(options: LLMCompletionOptions): Promise<string> {
    return this.limit(() => this.inner.complete(options));
  }
}
