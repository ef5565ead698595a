// In-process stand-ins for model collaborators, used by tests only
import type { EmbeddingProvider } from '@strata-rag/shared';
import type { VectorMatch, VectorRecord, VectorStorage } from '../storage/interface.js';
import type { Tokenizer } from '../utils/tokenizer.js';

/**
 * One token per code point, so budgets in tests are character counts
 */
export class CharTokenizer implements Tokenizer {
  encode(text: string): number[] {
    return Array.from(text, (char) => char.codePointAt(0) ?? 0);
  }

  decode(tokens: number[]): string {
    return String.fromCodePoint(...tokens);
  }
}

/**
 * Bag-of-keywords embeddings: dimension i counts occurrences of keyword i
 */
export class KeywordEmbeddings implements EmbeddingProvider {
  readonly batches: string[][] = [];

  constructor(private readonly keywords: readonly string[]) {}

  async embed(text: string): Promise<number[]> {
    const lower = text.toLowerCase();
    return this.keywords.map((keyword) => lower.split(keyword.toLowerCase()).length - 1);
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    this.batches.push([...texts]);
    return Promise.all(texts.map((text) => this.embed(text)));
  }
}

/**
 * Vector storage that answers every query with a fixed ranking
 */
export class StubVectorStorage implements VectorStorage {
  readonly upserts: Record<string, VectorRecord>[] = [];

  constructor(private matches: VectorMatch[] = []) {}

  setMatches(matches: VectorMatch[]): void {
    this.matches = matches;
  }

  async upsert(records: Record<string, VectorRecord>): Promise<void> {
    this.upserts.push({ ...records });
  }

  async query(_text: string, topK: number): Promise<VectorMatch[]> {
    return this.matches.slice(0, topK);
  }
}

export function entityMatches(...names: string[]): VectorMatch[] {
  return names.map((name, i) => ({
    id: `ent-${name}`,
    score: 1 - i / 100,
    entityName: name,
  }));
}
