import { KVStore } from './kv.js';

/**
 * In-process KVStore. Iteration is sorted by key to match the ordering the
 * event log relies on for its sequence keys.
 */
export class MemoryStore implements KVStore {
  private readonly entries = new Map<string, Uint8Array>();

  async get(key: string): Promise<Uint8Array | undefined> {
    return this.entries.get(key);
  }

  async put(key: string, value: Uint8Array): Promise<void> {
    this.entries.set(key, value);
  }

  async del(key: string): Promise<void> {
    this.entries.delete(key);
  }

  async *iterator(prefix = ''): AsyncIterable<{ key: string; value: Uint8Array }> {
    const keys = [...this.entries.keys()].filter((key) => key.startsWith(prefix)).sort();
    for (const key of keys) {
      const value = this.entries.get(key);
      if (value !== undefined) {
        yield { key, value };
      }
    }
  }

  get size(): number {
    return this.entries.size;
  }
}
