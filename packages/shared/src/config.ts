// Configuration types and validation
import type { ZodError } from 'zod';
import {
  type CommunityConfig,
  CommunityConfigSchema,
  type EmbeddingsConfig,
  EmbeddingsConfigSchema,
  type ExtractionConfig,
  ExtractionConfigSchema,
  type FalkorDBConfig,
  FalkorDBConfigSchema,
  type HTTPServerOptions,
  type LLMConfig,
  LLMConfigSchema,
  type QueryConfig,
  type RagConfig,
  RagConfigSchema,
  type StorageConfig,
} from './schemas.js';

// Re-export config types from schemas
export type {
  FalkorDBConfig,
  StorageConfig,
  LLMConfig,
  EmbeddingsConfig,
  ExtractionConfig,
  CommunityConfig,
  QueryConfig,
  RagConfig,
  HTTPServerOptions,
};

/**
 * Partial overrides, one level deep per config section
 */
export type ConfigOverrides = {
  [K in keyof RagConfig]?: Partial<RagConfig[K]>;
};

/**
 * Error thrown when configuration validation fails
 */
export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public readonly errors: ZodError['errors'],
  ) {
    super(message);
    this.name = 'ConfigValidationError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Get a formatted string of all validation errors
   */
  getFormattedErrors(): string {
    return this.errors
      .map((err) => `  - ${err.path.join('.')}: ${err.message}`)
      .join('\n');
  }
}

/**
 * Parse environment variable as a valid port number
 */
function parseEnvPort(envVar: string | undefined, defaultPort: number): number {
  if (!envVar) return defaultPort;
  const port = Number.parseInt(envVar, 10);
  if (Number.isNaN(port) || port < 1 || port > 65535) {
    return defaultPort;
  }
  return port;
}

/**
 * Parse environment variable as a non-negative integer
 */
function parseEnvInt(envVar: string | undefined, defaultValue: number): number {
  if (!envVar) return defaultValue;
  const value = Number.parseInt(envVar, 10);
  if (Number.isNaN(value) || value < 0) {
    return defaultValue;
  }
  return value;
}

function parseEnvBool(envVar: string | undefined, defaultValue: boolean): boolean {
  if (envVar === undefined || envVar === '') return defaultValue;
  return ['1', 'true', 'yes', 'on'].includes(envVar.toLowerCase());
}

/**
 * Build raw configuration from environment variables
 * This creates an unvalidated config object
 */
function buildRawConfig(): Record<string, unknown> {
  return {
    falkordb: {
      host: process.env.FALKORDB_HOST || 'localhost',
      port: parseEnvPort(process.env.FALKORDB_PORT, 6379),
      password: process.env.FALKORDB_PASSWORD,
      graphName: process.env.FALKORDB_GRAPH || 'strata',
    },
    storage: {
      graphBackend: process.env.GRAPH_BACKEND || 'memory',
      vectorCosineThreshold: 0.2,
    },
    llm: {
      provider: 'openai',
      bestModel: process.env.LLM_MODEL || 'gpt-4o-mini',
      cheapModel: process.env.LLM_CHEAP_MODEL || 'gpt-4o-mini',
      apiKey: process.env.OPENAI_API_KEY,
      bestModelMaxTokens: 12000,
      cheapModelMaxTokens: 8000,
      maxAsync: parseEnvInt(process.env.LLM_MAX_ASYNC, 16) || 16,
      enableCache: parseEnvBool(process.env.LLM_ENABLE_CACHE, true),
      timeoutMs: 60000,
      maxRetries: 2,
    },
    embeddings: {
      provider: 'openai',
      model: process.env.EMBEDDING_MODEL || 'text-embedding-3-small',
      dimensions: 1536,
      batchSize: 64,
      maxAsync: 16,
    },
    extraction: {
      maxGleaning: parseEnvInt(process.env.EXTRACTION_MAX_GLEANING, 1),
      summaryMaxTokens: 500,
      hierarchical: parseEnvBool(process.env.EXTRACTION_HIERARCHICAL, true),
      chunkTokenSize: 1200,
      chunkOverlapTokenSize: 100,
      tokenizerEncoding: 'o200k_base',
    },
    community: {
      forceSubCommunities: parseEnvBool(process.env.FORCE_SUB_COMMUNITIES, false),
      reportMaxTokens: process.env.REPORT_MAX_TOKENS
        ? parseEnvInt(process.env.REPORT_MAX_TOKENS, 12000) || undefined
        : undefined,
    },
    query: {
      enableNaiveRag: parseEnvBool(process.env.ENABLE_NAIVE_RAG, false),
    },
  };
}

/**
 * Default configuration (validated)
 */
export const DEFAULT_CONFIG: RagConfig = RagConfigSchema.parse(buildRawConfig());

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge configuration objects
 */
function deepMerge(
  base: Record<string, unknown>,
  overrides: Record<string, unknown> | undefined,
): Record<string, unknown> {
  if (!overrides) return base;

  const result: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(overrides)) {
    const current = result[key];
    if (isPlainObject(value) && isPlainObject(current)) {
      result[key] = deepMerge(current, value);
    } else if (value !== undefined) {
      result[key] = value;
    }
  }
  return result;
}

/**
 * Load and validate configuration
 * @throws {ConfigValidationError} When configuration is invalid
 */
export function loadConfig(overrides?: ConfigOverrides): RagConfig {
  const merged = deepMerge(buildRawConfig(), overrides);

  const result = RagConfigSchema.safeParse(merged);

  if (!result.success) {
    throw new ConfigValidationError(
      `Invalid configuration:\n${result.error.errors.map((e) => `  - ${e.path.join('.')}: ${e.message}`).join('\n')}`,
      result.error.errors,
    );
  }

  return result.data;
}

/**
 * Validate a partial FalkorDB config
 */
export function validateFalkorDBConfig(config: unknown): FalkorDBConfig {
  const result = FalkorDBConfigSchema.safeParse(config);
  if (!result.success) {
    throw new ConfigValidationError(
      `Invalid FalkorDB configuration: ${result.error.message}`,
      result.error.errors,
    );
  }
  return result.data;
}

/**
 * Validate a partial LLM config
 */
export function validateLLMConfig(config: unknown): LLMConfig {
  const result = LLMConfigSchema.safeParse(config);
  if (!result.success) {
    throw new ConfigValidationError(
      `Invalid LLM configuration: ${result.error.message}`,
      result.error.errors,
    );
  }
  return result.data;
}

/**
 * Validate a partial embeddings config
 */
export function validateEmbeddingsConfig(config: unknown): EmbeddingsConfig {
  const result = EmbeddingsConfigSchema.safeParse(config);
  if (!result.success) {
    throw new ConfigValidationError(
      `Invalid embeddings configuration: ${result.error.message}`,
      result.error.errors,
    );
  }
  return result.data;
}

export function validateExtractionConfig(config: unknown): ExtractionConfig {
  const result = ExtractionConfigSchema.safeParse(config);
  if (!result.success) {
    throw new ConfigValidationError(
      `Invalid extraction configuration: ${result.error.message}`,
      result.error.errors,
    );
  }
  return result.data;
}

export function validateCommunityConfig(config: unknown): CommunityConfig {
  const result = CommunityConfigSchema.safeParse(config);
  if (!result.success) {
    throw new ConfigValidationError(
      `Invalid community configuration: ${result.error.message}`,
      result.error.errors,
    );
  }
  return result.data;
}
