// Completion providers and wrappers
import type { LLMConfig, LLMProvider } from '@strata-rag/shared';
import type { KVStorage } from '../storage/interface.js';
import { CachedLLMProvider, type CachedResponse } from './cached.js';
import { AuthenticationError } from './errors.js';
import { OpenAIProvider } from './openai.js';
import { RateLimitedLLMProvider } from './rate-limited.js';

export { CachedLLMProvider, type CachedResponse, completionCacheKey } from './cached.js';
export {
  AuthenticationError,
  ContentFilterError,
  ContextLengthError,
  isLLMError,
  LLMError,
  LLMValidationError,
  ModelError,
  PermissionError,
  RateLimitError,
  ServerError,
} from './errors.js';
export { buildMessages, OpenAIProvider, type OpenAIProviderOptions } from './openai.js';
export { RateLimitedLLMProvider } from './rate-limited.js';

export type ModelTier = 'best' | 'cheap';

/**
 * Provider for one model tier: rate limited, and cached when enabled and
 * a cache store is given
 * @throws {AuthenticationError} When no API key is configured
 */
export function createLLMProvider(
  config: LLMConfig,
  tier: ModelTier,
  cache?: KVStorage<CachedResponse>,
): LLMProvider {
  if (!config.apiKey) {
    throw new AuthenticationError('OpenAI API key required');
  }
  const model = tier === 'best' ? config.bestModel : config.cheapModel;
  const provider = new RateLimitedLLMProvider(
    new OpenAIProvider(config.apiKey, model, {
      timeoutMs: config.timeoutMs,
      maxRetries: config.maxRetries,
    }),
    config.maxAsync,
  );
  return config.enableCache && cache ? new CachedLLMProvider(provider, model, cache) : provider;
}
