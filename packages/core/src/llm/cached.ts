// Response cache for deterministic re-runs of the same prompt
import type { LLMCompletionOptions, LLMProvider } from '@strata-rag/shared';
import { createLogger, type Logger } from '../logger.js';
import type { KVStorage } from '../storage/interface.js';
import { computeMdhashId } from '../utils/hash.js';

export interface CachedResponse {
  model: string;
  response: string;
}

/**
 * Cache key covering everything the model sees
 */
export function completionCacheKey(model: string, options: LLMCompletionOptions): string {
  return computeMdhashId(
    JSON.stringify([
      model,
      options.systemPrompt ?? null,
      options.history ?? [],
      options.prompt,
      options.responseFormat ?? 'text',
    ]),
  );
}

export class CachedLLMProvider implements LLMProvider {
  private readonly logger: Logger;

  constructor(
    private readonly inner: LLMProvider,
    private readonly model: string,
    private readonly cache: KVStorage<CachedResponse>,
    logger?: Logger,
  ) {
    this.logger = logger ?? createLogger('llm-cache');
  }

  async complete(options: LLMCompletionOptions): Promise<string> {
    const key = completionCacheKey(this.model, options);
    const hit = await this.cache.getById(key);
    if (hit) {
      this.logger.debug('Completion cache hit', { model: this.model, key });
      return hit.response;
    }

    const response = await this.inner.complete(options);
    await this.cache.upsert({ [key]: { model: this.model, response } });
    return response;
  }
}
