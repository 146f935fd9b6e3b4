// ---------------------------------------------------------------------------
// Bounded LRU Cache
// ---------------------------------------------------------------------------
// Map iteration order doubles as the recency list: a hit re-inserts the key
// at the tail, eviction takes the head. Values are non-nullish so a miss is
// always `undefined`.

export class LruCache<K, V extends {}> {
  private readonly entries = new Map<K, V>();
  private readonly capacity: number;
  private readonly onEvict: ((key: K, value: V) => void) | undefined;

  constructor(capacity: number, onEvict?: (key: K, value: V) => void) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`LruCache capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
    this.onEvict = onEvict;
  }

  /** Get a value and mark it most recently used. */
  get(key: K): V | undefined {
    const value = this.entries.get(key);
    if (value === undefined) return undefined;
    this.entries.delete(key);
    this.entries.set(key, value);
    return value;
  }

  /** Check presence without touching recency. */
  has(key: K): boolean {
    return this.entries.has(key);
  }

  /**
   * Insert or replace a value. Evicts the least recently used entry first
   * when a new key would exceed capacity.
   */
  set(key: K, value: V): void {
    if (this.entries.has(key)) {
      this.entries.delete(key);
    } else if (this.entries.size >= this.capacity) {
      this.evictOldest();
    }
    this.entries.set(key, value);
  }

  delete(key: K): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }

  /** Keys from least to most recently used. */
  keys(): K[] {
    return Array.from(this.entries.keys());
  }

  private evictOldest(): void {
    const oldest = this.entries.entries().next();
    if (oldest.done) return;
    const [key, value] = oldest.value;
    this.entries.delete(key);
    this.onEvict?.(key, value);
  }
}
