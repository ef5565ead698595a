// OpenAI chat completion provider
import type { ChatMessage, LLMCompletionOptions, LLMProvider } from '@strata-rag/shared';
import OpenAI, { APIError } from 'openai';
import {
  AuthenticationError,
  ContentFilterError,
  ContextLengthError,
  LLMError,
  LLMValidationError,
  ModelError,
  PermissionError,
  RateLimitError,
  ServerError,
} from './errors.js';

type MessageParam = OpenAI.Chat.ChatCompletionMessageParam;

export interface OpenAIProviderOptions {
  /** Request timeout handed to the SDK */
  timeoutMs?: number;
  /** SDK-level retries for connection errors, 408, 409, 429 and 5xx */
  maxRetries?: number;
}

function toMessageParam(message: ChatMessage): MessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
  }
}

/**
 * System prompt, then prior turns, then the new user prompt
 */
export function buildMessages(options: LLMCompletionOptions): MessageParam[] {
  const messages: MessageParam[] = [];
  if (options.systemPrompt) {
    messages.push({ role: 'system', content: options.systemPrompt });
  }
  for (const message of options.history ?? []) {
    messages.push(toMessageParam(message));
  }
  messages.push({ role: 'user', content: options.prompt });
  return messages;
}

export class OpenAIProvider implements LLMProvider {
  private client: OpenAI;

  constructor(
    apiKey: string,
    readonly model = 'gpt-4o-mini',
    options: OpenAIProviderOptions = {},
  ) {
    if (!apiKey) {
      throw new AuthenticationError('OpenAI API key is required');
    }
    this.client = new OpenAI({
      apiKey,
      timeout: options.timeoutMs,
      maxRetries: options.maxRetries,
    });
  }

  async complete(options: LLMCompletionOptions): Promise<string> {
    this.validate(options);

    try {
      const response = await this.client.chat.completions.create({
        model: this.model,
        messages: buildMessages(options),
        max_tokens: options.maxTokens,
        temperature: options.temperature,
        response_format:
          options.responseFormat === 'json' ? { type: 'json_object' } : { type: 'text' },
      });

      const content = response.choices[0]?.message?.content;
      if (!content) {
        throw new LLMError('No content in response');
      }
      return content;
    } catch (error) {
      throw this.handleError(error);
    }
  }

  private validate(options: LLMCompletionOptions): void {
    if (options.prompt.trim().length === 0) {
      throw new LLMValidationError('Prompt cannot be empty', 'prompt');
    }
    if (
      options.maxTokens !== undefined &&
      (!Number.isInteger(options.maxTokens) || options.maxTokens <= 0)
    ) {
      throw new LLMValidationError('maxTokens must be a positive integer', 'maxTokens');
    }
  }

  private handleError(error: unknown): LLMError {
    if (error instanceof LLMError) {
      return error;
    }

    if (error instanceof APIError) {
      const message = error.message || 'OpenAI API error';
      const status = error.status ?? 0;

      if (status === 401) {
        return new AuthenticationError('Invalid OpenAI API key', error);
      }
      if (status === 403) {
        return new PermissionError(message, error);
      }
      if (status === 404) {
        return new ModelError(`Model not found: ${this.model}`, this.model, error);
      }
      if (status === 429) {
        return new RateLimitError(
          'OpenAI rate limit exceeded',
          this.parseRetryAfter(error),
          error,
        );
      }
      if (status === 400) {
        if (message.includes('context_length') || message.includes('maximum context')) {
          return new ContextLengthError(message, error);
        }
        if (message.includes('content_filter') || message.includes('safety')) {
          return new ContentFilterError(message, error);
        }
      }
      if (status >= 500) {
        return new ServerError(message, status, error);
      }
      return new LLMError(message, error);
    }

    if (error instanceof Error) {
      return new LLMError(error.message, error);
    }
    return new LLMError(`Unknown error: ${String(error)}`);
  }

  private parseRetryAfter(error: APIError): number | undefined {
    const value = error.headers?.['retry-after'];
    if (typeof value === 'string') {
      const seconds = Number.parseInt(value, 10);
      if (!Number.isNaN(seconds)) {
        return seconds * 1000;
      }
    }
    return undefined;
  }
}
