import { describe, expect, it } from 'vitest';
import {
  CommunityReportJsonSchema,
  ConfigValidationError,
  DEFAULT_CONFIG,
  EdgeRecordSchema,
  loadConfig,
  NodeRecordSchema,
  QueryInputSchema,
  QueryParamSchema,
  VERSION,
  validateCommunityConfig,
  validateEmbeddingsConfig,
  validateExtractionConfig,
  validateFalkorDBConfig,
  validateLLMConfig,
} from './index.js';

function withEnv(vars: Record<string, string | undefined>, fn: () => void) {
  const previous: Record<string, string | undefined> = {};
  for (const [key, value] of Object.entries(vars)) {
    previous[key] = process.env[key];
    if (value === undefined) {
      delete process.env[key];
    } else {
      process.env[key] = value;
    }
  }
  try {
    fn();
  } finally {
    for (const [key, value] of Object.entries(previous)) {
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
  }
}

describe('shared', () => {
  it('exports VERSION', () => {
    expect(VERSION).toBe('0.1.0');
  });

  it('exports DEFAULT_CONFIG', () => {
    expect(DEFAULT_CONFIG).toBeDefined();
    expect(DEFAULT_CONFIG.falkordb).toBeDefined();
    expect(DEFAULT_CONFIG.extraction.chunkTokenSize).toBe(1200);
  });
});

describe('config validation', () => {
  describe('loadConfig', () => {
    it('should return valid default config', () => {
      withEnv(
        {
          FALKORDB_HOST: undefined,
          FALKORDB_PORT: undefined,
          GRAPH_BACKEND: undefined,
          EXTRACTION_MAX_GLEANING: undefined,
          ENABLE_NAIVE_RAG: undefined,
        },
        () => {
          const config = loadConfig();
          expect(config.falkordb.host).toBe('localhost');
          expect(config.falkordb.port).toBe(6379);
          expect(config.storage.graphBackend).toBe('memory');
          expect(config.llm.provider).toBe('openai');
          expect(config.extraction.maxGleaning).toBe(1);
          expect(config.extraction.chunkOverlapTokenSize).toBe(100);
          expect(config.query.enableNaiveRag).toBe(false);
        },
      );
    });

    it('should read gleaning rounds and naive toggle from env vars', () => {
      withEnv({ EXTRACTION_MAX_GLEANING: '3', ENABLE_NAIVE_RAG: 'true' }, () => {
        const config = loadConfig();
        expect(config.extraction.maxGleaning).toBe(3);
        expect(config.query.enableNaiveRag).toBe(true);
      });
    });

    it('should use default for invalid numeric env values', () => {
      withEnv({ EXTRACTION_MAX_GLEANING: '-2', FALKORDB_PORT: 'abc' }, () => {
        const config = loadConfig();
        expect(config.extraction.maxGleaning).toBe(1);
        expect(config.falkordb.port).toBe(6379);
      });
    });

    it('should leave reportMaxTokens unset unless configured', () => {
      withEnv({ REPORT_MAX_TOKENS: undefined }, () => {
        expect(loadConfig().community.reportMaxTokens).toBeUndefined();
      });
      withEnv({ REPORT_MAX_TOKENS: '4000' }, () => {
        expect(loadConfig().community.reportMaxTokens).toBe(4000);
      });
    });

    it('should merge partial overrides with defaults', () => {
      withEnv({ FALKORDB_PORT: undefined }, () => {
        const config = loadConfig({ falkordb: { host: 'custom-host' } });
        expect(config.falkordb.host).toBe('custom-host');
        expect(config.falkordb.port).toBe(6379);
      });
    });

    it('should throw ConfigValidationError for invalid port', () => {
      expect(() => loadConfig({ falkordb: { port: -1 } })).toThrow(
        ConfigValidationError,
      );
    });

    it('should reject overlap that is not smaller than the chunk size', () => {
      try {
        loadConfig({
          extraction: { chunkTokenSize: 100, chunkOverlapTokenSize: 100 },
        });
        expect.fail('expected loadConfig to throw');
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigValidationError);
        if (error instanceof ConfigValidationError) {
          expect(error.getFormattedErrors()).toBe(
            '  - extraction.chunkOverlapTokenSize: chunkOverlapTokenSize must be smaller than chunkTokenSize',
          );
        }
      }
    });
  });

  describe('validateFalkorDBConfig', () => {
    it('should validate valid config', () => {
      const config = validateFalkorDBConfig({
        host: 'localhost',
        port: 6379,
        graphName: 'test',
      });
      expect(config.host).toBe('localhost');
    });

    it('should throw for missing host', () => {
      expect(() =>
        validateFalkorDBConfig({ port: 6379, graphName: 'test' }),
      ).toThrow(ConfigValidationError);
    });
  });

  describe('validateLLMConfig', () => {
    const valid = {
      provider: 'openai',
      bestModel: 'gpt-4o',
      cheapModel: 'gpt-4o-mini',
      bestModelMaxTokens: 12000,
      cheapModelMaxTokens: 8000,
      maxAsync: 4,
      enableCache: false,
      timeoutMs: 1000,
      maxRetries: 0,
    };

    it('should validate valid config', () => {
      expect(validateLLMConfig(valid).bestModel).toBe('gpt-4o');
    });

    it('should throw for invalid provider', () => {
      expect(() => validateLLMConfig({ ...valid, provider: 'invalid' })).toThrow(
        ConfigValidationError,
      );
    });

    it('should throw for zero concurrency', () => {
      expect(() => validateLLMConfig({ ...valid, maxAsync: 0 })).toThrow(
        ConfigValidationError,
      );
    });
  });

  describe('validateEmbeddingsConfig', () => {
    it('should throw for invalid provider', () => {
      expect(() =>
        validateEmbeddingsConfig({
          provider: 'invalid',
          model: 'text-embedding-3-small',
          dimensions: 1536,
          batchSize: 64,
          maxAsync: 16,
        }),
      ).toThrow(ConfigValidationError);
    });
  });

  describe('validateExtractionConfig', () => {
    it('should accept zero gleaning rounds', () => {
      const config = validateExtractionConfig({
        maxGleaning: 0,
        summaryMaxTokens: 500,
        hierarchical: false,
        chunkTokenSize: 1200,
        chunkOverlapTokenSize: 100,
        tokenizerEncoding: 'cl100k_base',
      });
      expect(config.maxGleaning).toBe(0);
    });
  });

  describe('validateCommunityConfig', () => {
    it('should leave the report budget unset by default', () => {
      expect(validateCommunityConfig({ forceSubCommunities: true })).toEqual({
        forceSubCommunities: true,
      });
    });

    it('should reject a non-positive report budget', () => {
      expect(() =>
        validateCommunityConfig({ forceSubCommunities: false, reportMaxTokens: 0 }),
      ).toThrow(ConfigValidationError);
    });
  });
});

describe('schema validation', () => {
  describe('QueryParamSchema', () => {
    it('should fill every default', () => {
      expect(QueryParamSchema.parse({})).toEqual({
        mode: 'hierarchical-full',
        onlyNeedContext: false,
        responseType: 'Multiple Paragraphs',
        level: 2,
        topK: 20,
        topM: 10,
        naiveMaxTokenForTextUnit: 12000,
        maxTokenForTextUnit: 4000,
        maxTokenForLocalContext: 4000,
        maxTokenForBridgeKnowledge: 4000,
        maxTokenForCommunityReport: 3200,
        communitySingleOne: false,
      });
    });

    it('should reject an unknown mode', () => {
      expect(QueryParamSchema.safeParse({ mode: 'global' }).success).toBe(false);
    });
  });

  describe('record schemas', () => {
    it('should default missing node fields', () => {
      expect(NodeRecordSchema.parse({})).toEqual({
        entity_type: 'UNKNOWN',
        description: '',
        source_id: '',
      });
    });

    it('should coerce stored edge weights', () => {
      expect(EdgeRecordSchema.parse({ weight: '2.5' })).toEqual({
        weight: 2.5,
        description: '',
        source_id: '',
        order: 1,
      });
    });

    it('should drop malformed report fields instead of failing', () => {
      const report = CommunityReportJsonSchema.parse({
        title: 'Mergers',
        summary: 42,
        rating: 'high',
      });
      expect(report.title).toBe('Mergers');
      expect(report.summary).toBeUndefined();
      expect(report.rating).toBeUndefined();
    });

    it('should read numeric string ratings', () => {
      expect(CommunityReportJsonSchema.parse({ rating: '7' }).rating).toBe(7);
      expect(CommunityReportJsonSchema.parse({ rating: ' 6.5 ' }).rating).toBe(6.5);
      expect(CommunityReportJsonSchema.parse({ rating: '' }).rating).toBeUndefined();
      expect(CommunityReportJsonSchema.parse({ rating: null }).rating).toBeUndefined();
    });
  });

  describe('QueryInputSchema', () => {
    it('should accept a bare query', () => {
      expect(QueryInputSchema.parse({ query: 'who is bob?' })).toEqual({
        query: 'who is bob?',
      });
    });

    it('should reject an empty query', () => {
      expect(QueryInputSchema.safeParse({ query: '' }).success).toBe(false);
    });
  });
});
