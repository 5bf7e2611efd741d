/**
 * Bounded LRU map backing the memo tables of the EV engine.
 * Map iteration order is insertion order, so the first key is the least recently used.
 */

export class LRUCache<K, V extends NonNullable<unknown>> {
  private cache = new Map<K, V>();

  constructor(private readonly maxSize = 1000) {
    if (!Number.isInteger(maxSize) || maxSize < 1) {
      throw new RangeError(`Invalid cache size: ${maxSize}`);
    }
  }

  get capacity(): number {
    return this.maxSize;
  }

  get(key: K): V | undefined {
    const value = this.cache.get(key);
    if (value === undefined) return undefined;

    this.cache.delete(key);
    this.cache.set(key, value);
    return value;
  }

  set(key: K, value: V): this {
    if (this.cache.size >= this.maxSize && !this.cache.has(key)) {
      const oldest = this.cache.keys().next();
      if (!oldest.done) this.cache.delete(oldest.value);
    }
    this.cache.delete(key);
    this.cache.set(key, value);
    return this;
  }

  /** Returns the cached value for `key`, computing and storing it on a miss. */
  getOrCompute(key: K, compute: () => V): V {
    const hit = this.get(key);
    if (hit !== undefined) return hit;

    const value = compute();
    this.set(key, value);
    return value;
  }

  clear(): void {
    this.cache.clear();
  }

  get size(): number {
    return this.cache.size;
  }

  has(key: K): boolean {
    return this.cache.has(key);
  }

  keys(): IterableIterator<K> {
    return this.cache.keys();
  }
}
