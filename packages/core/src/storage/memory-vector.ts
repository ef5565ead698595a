// In-process vector index with cosine similarity
import type { EmbeddingProvider } from '@strata-rag/shared';
import { ValidationError } from './errors.js';
import type { VectorMatch, VectorRecord, VectorStorage } from './interface.js';

interface StoredVector {
  vector: number[];
  entityName?: string;
}

export interface MemoryVectorStorageOptions {
  embedder: EmbeddingProvider;
  /** Matches scoring below this are dropped */
  cosineThreshold?: number;
  batchSize?: number;
}

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw new ValidationError(
      `Vector dimensions differ: ${a.length} vs ${b.length}`,
      'vector',
    );
  }
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) {
    return 0;
  }
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

export class MemoryVectorStorage implements VectorStorage {
  private readonly vectors = new Map<string, StoredVector>();
  private readonly embedder: EmbeddingProvider;
  private readonly cosineThreshold: number;
  private readonly batchSize: number;

  constructor(options: MemoryVectorStorageOptions) {
    this.embedder = options.embedder;
    this.cosineThreshold = options.cosineThreshold ?? 0.2;
    this.batchSize = options.batchSize ?? 64;
  }

  async upsert(records: Record<string, VectorRecord>): Promise<void> {
    const entries = Object.entries(records);
    if (entries.length === 0) {
      return;
    }

    const batches: [string, VectorRecord][][] = [];
    for (let i = 0; i < entries.length; i += this.batchSize) {
      batches.push(entries.slice(i, i + this.batchSize));
    }
    const embedded = await Promise.all(
      batches.map((batch) =>
        this.embedder.embedBatch(batch.map(([, record]) => record.content)),
      ),
    );

    batches.forEach((batch, b) => {
      if (embedded[b].length !== batch.length) {
        throw new ValidationError(
          `Embedder returned ${embedded[b].length} vectors for ${batch.length} inputs`,
          'embeddings',
        );
      }
      batch.forEach(([id, record], i) => {
        this.vectors.set(id, {
          vector: embedded[b][i],
          entityName: record.entityName,
        });
      });
    });
  }

  async query(text: string, topK: number): Promise<VectorMatch[]> {
    if (this.vectors.size === 0 || topK <= 0) {
      return [];
    }
    const queryVector = await this.embedder.embed(text);

    const matches: VectorMatch[] = [];
    for (const [id, stored] of this.vectors) {
      const score = cosineSimilarity(queryVector, stored.vector);
      if (score >= this.cosineThreshold) {
        matches.push({ id, score, entityName: stored.entityName });
      }
    }
    return matches.sort((a, b) => b.score - a.score).slice(0, topK);
  }
}
