/**
 * Synchronous key/value store backing one result shape of the query cache
 */
export interface ResultStore<V> {
  get(key: string): V | undefined;
  set(key: string, value: V): void;
  has(key: string): boolean;
  delete(key: string): boolean;
  clear(): string[];
  size(): number;
}
