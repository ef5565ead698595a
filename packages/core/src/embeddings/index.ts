// Embedding providers
import type { EmbeddingProvider, EmbeddingsConfig } from '@strata-rag/shared';
import { EmbeddingAuthError } from './errors.js';
import { OpenAIEmbeddings } from './openai.js';
import { RateLimitedEmbeddingProvider } from './rate-limited.js';

export {
  EmbeddingAuthError,
  EmbeddingCountError,
  EmbeddingError,
  EmbeddingInputError,
  EmbeddingModelError,
  EmbeddingPermissionError,
  EmbeddingRateLimitError,
  EmbeddingServerError,
  isEmbeddingError,
} from './errors.js';
export { OpenAIEmbeddings, type OpenAIEmbeddingsOptions } from './openai.js';
export { RateLimitedEmbeddingProvider } from './rate-limited.js';

/**
 * Rate-limited provider for the configured embedding model
 * @throws {EmbeddingAuthError} When no API key is given
 */
export function createEmbeddingProvider(
  config: EmbeddingsConfig,
  apiKey?: string,
): EmbeddingProvider {
  if (!apiKey) {
    throw new EmbeddingAuthError('OpenAI API key required for embeddings');
  }
  return new RateLimitedEmbeddingProvider(
    new OpenAIEmbeddings(apiKey, config.model, { dimensions: config.dimensions }),
    config.maxAsync,
  );
}
