// OpenAI embeddings provider
import type { EmbeddingProvider } from '@strata-rag/shared';
import OpenAI, { APIError } from 'openai';
import {
  EmbeddingAuthError,
  EmbeddingCountError,
  EmbeddingError,
  EmbeddingInputError,
  EmbeddingModelError,
  EmbeddingPermissionError,
  EmbeddingRateLimitError,
  EmbeddingServerError,
} from './errors.js';

export interface OpenAIEmbeddingsOptions {
  /** Output size for models that support shortening */
  dimensions?: number;
  timeoutMs?: number;
  maxRetries?: number;
}

export class OpenAIEmbeddings implements EmbeddingProvider {
  private client: OpenAI;
  private readonly dimensions?: number;

  constructor(
    apiKey: string,
    readonly model = 'text-embedding-3-small',
    options: OpenAIEmbeddingsOptions = {},
  ) {
    if (!apiKey) {
      throw new EmbeddingAuthError('OpenAI API key is required');
    }
    this.client = new OpenAI({
      apiKey,
      timeout: options.timeoutMs,
      maxRetries: options.maxRetries,
    });
    this.dimensions = options.dimensions;
  }

  async embed(text: string): Promise<number[]> {
    const [embedding] = await this.embedBatch([text]);
    return embedding;
  }

  /**
   * One request for the whole batch; vectors come back in input order
   */
  async embedBatch(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }
    const blank = texts.findIndex((text) => text.trim().length === 0);
    if (blank !== -1) {
      throw new EmbeddingInputError(`Text at index ${blank} is empty`, blank);
    }

    try {
      const response = await this.client.embeddings.create({
        model: this.model,
        input: texts,
        ...(this.dimensions ? { dimensions: this.dimensions } : {}),
      });
      if (response.data.length !== texts.length) {
        throw new EmbeddingCountError(texts.length, response.data.length);
      }
      return [...response.data]
        .sort((a, b) => a.index - b.index)
        .map((item) => item.embedding);
    } catch (error) {
      throw this.handleError(error);
    }
  }

  private handleError(error: unknown): EmbeddingError {
    if (error instanceof EmbeddingError) {
      return error;
    }

    if (error instanceof APIError) {
      const message = error.message || 'OpenAI API error';
      const status = error.status ?? 0;

      if (status === 401) {
        return new EmbeddingAuthError('Invalid OpenAI API key', error);
      }
      if (status === 403) {
        return new EmbeddingPermissionError(message, error);
      }
      if (status === 404) {
        return new EmbeddingModelError(
          `Embedding model not found: ${this.model}`,
          this.model,
          error,
        );
      }
      if (status === 429) {
        return new EmbeddingRateLimitError('OpenAI rate limit exceeded', error);
      }
      if (status === 400 && (message.includes('too long') || message.includes('maximum'))) {
        return new EmbeddingInputError(message, undefined, error);
      }
      if (status >= 500) {
        return new EmbeddingServerError(message, status, error);
      }
      return new EmbeddingError(message, error);
    }

    if (error instanceof Error) {
      return new EmbeddingError(error.message, error);
    }
    return new EmbeddingError(`Unknown error: ${String(error)}`);
  }
}
