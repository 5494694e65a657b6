/**
 * @fileoverview LRU (Least Recently Used) Map implementation.
 *
 * Extends the built-in Map with automatic eviction when a maximum size is
 * exceeded. Map's insertion order doubles as recency order.
 *
 * @module utils/lru-map
 */

/**
 * Configuration options for LRUMap.
 */
export interface LRUMapOptions<K, V> {
  /** Maximum number of entries before eviction */
  maxSize: number;
  /** Optional callback when an entry is evicted */
  onEvict?: (key: K, value: V) => void;
}

/**
 * A Map with automatic LRU eviction.
 *
 * When the map exceeds maxSize, the oldest entries are evicted.
 * Access via get() refreshes an entry's position (moves to most recent).
 *
 * @example
 * ```typescript
 * const cache = new LRUMap<string, string>({ maxSize: 2 });
 *
 * cache.set('a', 'first');
 * cache.set('b', 'second');
 * cache.get('a');            // 'b' is now the oldest
 * cache.set('c', 'third');   // evicts 'b'
 * ```
 */
export class LRUMap<K, V> extends Map<K, V> {
  private readonly maxSize: number;
  private readonly onEvict?: (key: K, value: V) => void;

  constructor(options: LRUMapOptions<K, V>) {
    super();
    if (!Number.isInteger(options.maxSize) || options.maxSize < 1) {
      throw new RangeError(`LRUMap maxSize must be a positive integer, got ${options.maxSize}`);
    }
    this.maxSize = options.maxSize;
    this.onEvict = options.onEvict;
  }

  /**
   * Set a key-value pair.
   * If key exists, updates value and refreshes position.
   * If adding new entry would exceed maxSize, evicts oldest entries.
   */
  override set(key: K, value: V): this {
    if (super.has(key)) {
      super.delete(key);
    }
    super.set(key, value);

    while (super.size > this.maxSize) {
      const oldest = super.entries().next();
      if (oldest.done) break;
      const [oldestKey, oldestValue] = oldest.value;
      super.delete(oldestKey);
      this.onEvict?.(oldestKey, oldestValue);
    }

    return this;
  }

  /**
   * Get a value and refresh its position (mark as most recently used).
   */
  override get(key: K): V | undefined {
    if (!super.has(key)) {
      return undefined;
    }
    const value = super.get(key);
    super.delete(key);
    if (value !== undefined) {
      super.set(key, value);
    }
    return value;
  }

  /**
   * Peek at a value WITHOUT refreshing its position.
   */
  peek(key: K): V | undefined {
    return super.get(key);
  }

  /**
   * Get the oldest entry (next to be evicted) without removing it.
   */
  oldest(): [K, V] | undefined {
    const first = super.entries().next();
    if (first.done) return undefined;
    return first.value;
  }

  /** Keys in order from oldest to newest. */
  keysInOrder(): K[] {
    return Array.from(super.keys());
  }

  /** Get the maximum size limit. */
  get maxEntries(): number {
    return this.maxSize;
  }
}

export default LRUMap;
