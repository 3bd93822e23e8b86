import type { ResultStore } from './types';

/**
 * In-memory store keyed by literal query text.
 * Entries live until deleted or cleared; there is no expiry or eviction.
 */
export class MemoryStore<V> implements ResultStore<V> {
  private readonly entries = new Map<string, V>();

  get(key: string): V | undefined {
    return this.entries.get(key);
  }

  set(key: string, value: V): void {
    this.entries.set(key, value);
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  /**
   * Remove all entries, returning the keys that were present
   */
  clear(): string[] {
    const keys = Array.from(this.entries.keys());
    this.entries.clear();
    return keys;
  }

  size(): number {
    return this.entries.size;
  }
}
