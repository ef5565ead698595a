import type { LLMCompletionOptions } from '@strata-rag/shared';
import { describe, expect, it, vi } from 'vitest';
import { RateLimitedLLMProvider } from './rate-limited.js';

describe('RateLimitedLLMProvider', () => {
  it('should keep at most maxAsync completions in flight', async () => {
    const resolvers: ((value: string) => void)[] = [];
    const inner = {
      complete: vi.fn(
        (_options: LLMCompletionOptions) =>
          new Promise<string>((resolve) => {
            resolvers.push(resolve);
          }),
      ),
    };
    const limited = new RateLimitedLLMProvider(inner, 2);

    const results = Promise.all([
      limited.complete({ prompt: 'a' }),
      limited.complete({ prompt: 'b' }),
      limited.complete({ prompt: 'c' }),
    ]);

    await vi.waitFor(() => expect(inner.complete).toHaveBeenCalledTimes(2));
    expect(limited.activeCount).toBe(2);
    expect(limited.pendingCount).toBe(1);

    resolvers[0]('A');
    await vi.waitFor(() => expect(inner.complete).toHaveBeenCalledTimes(3));
    resolvers[1]('B');
    resolvers[2]('C');

    await expect(results).resolves.toEqual(['A', 'B', 'C']);
    expect(inner.complete.mock.calls.map(([options]) => options.prompt)).toEqual(['a', 'b', 'c']);
  });

  it('should propagate failures', async () => {
    const failure = new Error('upstream unavailable');
    const limited = new RateLimitedLLMProvider(
      { complete: vi.fn().mockRejectedValue(failure) },
      1,
    );
    await expect(limited.complete({ prompt: 'a' })).rejects.toBe(failure);
  });
});
