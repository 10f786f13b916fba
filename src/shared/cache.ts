/**
 * Bounded least-recently-used map. Reads refresh recency; inserting past
 * `maxEntries` evicts the oldest entry.
 *
 * Instances are owned by the pipeline or repository that creates them, so
 * two pipelines never share cached state.
 */
export class LruCache<K, V> {
  private readonly entries = new Map<K, { value: V }>();
  private readonly maxEntries: number;

  constructor(maxEntries = 1000) {
    if (maxEntries < 1) {
      throw new RangeError('maxEntries must be at least 1');
    }
    this.maxEntries = maxEntries;
  }

  get size(): number {
    return this.entries.size;
  }

  has(key: K): boolean {
    return this.lookup(key) !== undefined;
  }

  get(key: K): V | undefined {
    return this.lookup(key)?.value;
  }

  set(key: K, value: V): void {
    this.entries.delete(key);
    this.entries.set(key, { value });
    if (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (!oldest.done) {
        this.entries.delete(oldest.value);
      }
    }
  }

  delete(key: K): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  private lookup(key: K): { value: V } | undefined {
    const entry = this.entries.get(key);
    if (entry === undefined) {
      return undefined;
    }
    // Re-insert to mark as most recently used
    this.entries.delete(key);
    this.entries.set(key, entry);
    return entry;
  }
}
