import { NotFoundError } from '@fleetmon/shared';
import type { KeyValuePair, KeyValueStore } from './KeyValueStore.js';

export class MemoryKeyValueStore implements KeyValueStore {
  private data: Map<string, string> = new Map();

  async put(key: string, value: string): Promise<void> {
    this.data.set(key, value);
  }

  async get(key: string): Promise<string> {
    const value = this.data.get(key);
    if (value === undefined) {
      throw new NotFoundError(key);
    }
    return value;
  }

  async listByPrefix(prefix: string): Promise<KeyValuePair[]> {
    const pairs: KeyValuePair[] = [];
    for (const [key, value] of this.data) {
      if (key.startsWith(prefix)) {
        pairs.push({ key, value });
      }
    }
    return pairs.sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0));
  }

  async delete(key: string): Promise<void> {
    this.data.delete(key);
  }

  get size(): number {
    return this.data.size;
  }
}
