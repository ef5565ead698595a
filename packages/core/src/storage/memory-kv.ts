// In-process key-value storage
import type { KVStorage } from './interface.js';

export class MemoryKVStorage<T> implements KVStorage<T> {
  private readonly data = new Map<string, T>();

  constructor(readonly namespace: string) {}

  async allKeys(): Promise<string[]> {
    return [...this.data.keys()];
  }

  async getById(id: string): Promise<T | null> {
    return this.data.get(id) ?? null;
  }

  async getByIds(ids: readonly string[]): Promise<(T | null)[]> {
    return ids.map((id) => this.data.get(id) ?? null);
  }

  async filterKeys(ids: readonly string[]): Promise<Set<string>> {
    return new Set(ids.filter((id) => !this.data.has(id)));
  }

  async upsert(records: Record<string, T>): Promise<void> {
    for (const [id, value] of Object.entries(records)) {
      this.data.set(id, value);
    }
  }

  async drop(): Promise<void> {
    this.data.clear();
  }
}
