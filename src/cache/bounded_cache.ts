/**
 * @fileoverview Bounded LRU cache
 *
 * A dictionary-like container that holds at most `maxSize` entries and evicts
 * the least recently used one when a new key would exceed that bound.
 *
 * Recency is kept by the insertion order of a single `Map`: the first key is
 * the least recently used, the last key the most recently used. A hit or a
 * replacement deletes and re-inserts the key, so get, put and eviction are all
 * O(1).
 *
 * Not safe for concurrent use across async interleavings that expect a
 * consistent recency order; callers serialize access.
 *
 * @packageDocumentation
 */

import { InvalidArgumentError, KeyNotFoundError } from '../core/errors.js';

/**
 * Bounded cache configuration options.
 */
export interface BoundedCacheOptions<K, V> {
  /** Callback invoked when an entry is evicted to make room for a new key */
  onEvict?: (key: K, value: V) => void;
}

interface CacheEntry<V> {
  readonly value: V;
}

export class BoundedCache<K, V> {
  private readonly entries = new Map<K, CacheEntry<V>>();
  private readonly maxSize: number;
  private readonly onEvict?: (key: K, value: V) => void;

  constructor(maxSize: number, options: BoundedCacheOptions<K, V> = {}) {
    if (!Number.isInteger(maxSize) || maxSize < 0) {
      throw new InvalidArgumentError('maxSize', `expected a non-negative integer, got ${maxSize}`);
    }
    this.maxSize = maxSize;
    this.onEvict = options.onEvict;
  }

  get size(): number {
    return this.entries.size;
  }

  get capacity(): number {
    return this.maxSize;
  }

  /**
   * Look up a key, promoting it to most recently used on a hit.
   */
  tryGet(key: K): V | undefined {
    return this.touch(key)?.value;
  }

  /**
   * Insert or replace. A replacement counts as a fresh use.
   */
  put(key: K, value: V): void {
    if (this.entries.has(key)) {
      this.entries.delete(key);
    } else if (this.entries.size >= this.maxSize) {
      if (this.maxSize === 0) {
        return;
      }
      this.evictLeastRecent();
    }
    this.entries.set(key, { value });
  }

  /**
   * Indexer-style read.
   *
   * @throws KeyNotFoundError when the key is absent
   */
  get(key: K): V {
    const entry = this.touch(key);
    if (!entry) {
      throw new KeyNotFoundError(key);
    }
    return entry.value;
  }

  /** Indexer-style write; same as {@link put}. */
  set(key: K, value: V): void {
    this.put(key, value);
  }

  /** Presence check without promotion. */
  has(key: K): boolean {
    return this.entries.has(key);
  }

  delete(key: K): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  /** Keys from most to least recently used. */
  keys(): K[] {
    return Array.from(this.entries.keys()).reverse();
  }

  private touch(key: K): CacheEntry<V> | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      return undefined;
    }
    this.entries.delete(key);
    this.entries.set(key, entry);
    return entry;
  }

  private evictLeastRecent(): void {
    const oldest = this.entries.entries().next();
    if (oldest.done) {
      return;
    }
    const [key, entry] = oldest.value;
    this.entries.delete(key);
    this.onEvict?.(key, entry.value);
  }
}
