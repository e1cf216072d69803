export interface KeyValuePair {
  key: string;
  value: string;
}

/**
 * Durable key-value boundary the gateway persists through. get() rejects
 * with NotFoundError for an absent key; listByPrefix() returns pairs sorted
 * by key.
 */
export interface KeyValueStore {
  put(key: string, value: string): Promise<void>;
  get(key: string): Promise<string>;
  listByPrefix(prefix: string): Promise<KeyValuePair[]>;
  delete(key: string): Promise<void>;
  close?(): void;
}
