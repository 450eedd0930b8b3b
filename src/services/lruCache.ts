// =============================================================================
// LRU Cache — Bounded in-memory cache with least-recently-used eviction
// =============================================================================
// A capacity-limited key/value store that:
//   • Holds at most `capacity` distinct keys (positive integer, fixed)
//   • Moves a key to the most-recent end on every get hit and every put
//   • Evicts exactly one entry, the least-recently-used, when a new key
//     arrives at a full cache
//   • Is fully synchronous — no timers, no async, no expiry
//
// Two cooperating structures:
//   1. index        — Map<K, node> for O(1) lookup
//   2. recency list — doubly linked list of nodes, oldest → newest
// Both always hold the same key set.
// =============================================================================
import { RecencyList, RecencyNode } from '../utils/recencyList';
import { CacheConfigurationError } from '../utils/CacheConfigurationError';
import { formatKey } from '../utils/formatKey';
import logger from '../utils/logger';
import {
  CacheEntry,
  CacheLookup,
  CacheStats,
  EvictionListener,
  LRUCacheOptions,
} from '../types';

const MISS: CacheLookup<never> = Object.freeze({ hit: false });

export class LRUCache<K, V> implements Iterable<[K, V]> {
  private readonly maxSize: number;
  private readonly name: string;
  private readonly onEvict: EvictionListener<K, V> | undefined;
  private readonly index = new Map<K, RecencyNode<K, V>>();
  private readonly recency = new RecencyList<K, V>();

  private hits = 0;
  private misses = 0;
  private evictions = 0;

  /**
   * @param capacityOrOptions — Maximum number of entries, or full options
   * @throws CacheConfigurationError when capacity is not a positive integer
   */
  constructor(capacityOrOptions: number | LRUCacheOptions<K, V>) {
    const options =
      typeof capacityOrOptions === 'number' ? { capacity: capacityOrOptions } : capacityOrOptions;

    if (!Number.isInteger(options.capacity) || options.capacity < 1) {
      throw new CacheConfigurationError('capacity', options.capacity, 'a positive integer');
    }

    this.maxSize = options.capacity;
    this.name = options.name ?? 'LRUCache';
    this.onEvict = options.onEvict;
  }

  get capacity(): number {
    return this.maxSize;
  }

  /** Current number of live entries, between 0 and capacity. */
  get size(): number {
    return this.index.size;
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Core operations
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * Look up a key. On a hit the key becomes the most-recently-used.
   * A miss touches nothing but the miss counter.
   */
  get(key: K): CacheLookup<V> {
    const node = this.index.get(key);
    if (!node) {
      this.misses++;
      return MISS;
    }

    this.hits++;
    this.recency.moveToTail(node);
    return { hit: true, value: node.value };
  }

  /**
   * Insert or update a key, making it the most-recently-used.
   * A new key arriving at a full cache first evicts the oldest entry.
   */
  put(key: K, value: V): void {
    const existing = this.index.get(key);
    if (existing) {
      existing.value = value;
      this.recency.moveToTail(existing);
      return;
    }

    let evicted: RecencyNode<K, V> | null = null;
    if (this.recency.length >= this.maxSize) {
      evicted = this.recency.shift();
      if (evicted) {
        this.index.delete(evicted.key);
        this.evictions++;
      }
    }

    this.index.set(key, this.recency.append(key, value));

    if (evicted) {
      logger.debug('LRU eviction', {
        cache: this.name,
        key: formatKey(evicted.key),
        capacity: this.maxSize,
      });
      // Listener runs last so a throw cannot leave the cache half-updated
      this.onEvict?.(evicted.key, evicted.value);
    }
  }

  /** Existence check; does NOT update access order. */
  containsKey(key: K): boolean {
    return this.index.has(key);
  }

  /**
   * Frozen point-in-time listing, least- to most-recently-used.
   * Later cache mutations do not show through.
   */
  snapshot(): ReadonlyArray<CacheEntry<K, V>> {
    const entries: CacheEntry<K, V>[] = [];
    for (const node of this.recency) {
      entries.push(Object.freeze({ key: node.key, value: node.value }));
    }
    return Object.freeze(entries);
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Supplementary operations
  // ───────────────────────────────────────────────────────────────────────────

  /** Look up a key without changing its position or the stats. */
  peek(key: K): CacheLookup<V> {
    const node = this.index.get(key);
    return node ? { hit: true, value: node.value } : MISS;
  }

  /**
   * Remove a specific key. Not an eviction: `onEvict` is not called.
   *
   * @returns true if the key was present
   */
  remove(key: K): boolean {
    const node = this.index.get(key);
    if (!node) return false;
    this.recency.unlink(node);
    this.index.delete(key);
    return true;
  }

  /** Remove all entries. Stats are kept; see resetStats(). */
  clear(): void {
    this.index.clear();
    this.recency.clear();
  }

  *keys(): IterableIterator<K> {
    for (const node of this.orderedNodes()) yield node.key;
  }

  *values(): IterableIterator<V> {
    for (const node of this.orderedNodes()) yield node.value;
  }

  /**
   * All entries, oldest to newest. Iterating does not reorder, and walks
   * the order as it was when iteration began, so get/put inside the loop
   * is safe.
   */
  *entries(): IterableIterator<[K, V]> {
    for (const node of this.orderedNodes()) yield [node.key, node.value];
  }

  [Symbol.iterator](): IterableIterator<[K, V]> {
    return this.entries();
  }

  /** Copy of all entries as a Map, in oldest → newest insertion order. */
  toMap(): Map<K, V> {
    return new Map(this.entries());
  }

  stats(): CacheStats {
    const lookups = this.hits + this.misses;
    return {
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
      size: this.index.size,
      capacity: this.maxSize,
      hitRate: lookups === 0 ? 0 : this.hits / lookups,
    };
  }

  resetStats(): void {
    this.hits = 0;
    this.misses = 0;
    this.evictions = 0;
  }

  toString(): string {
    const body = Array.from(this.recency, (node) => `${formatKey(node.key)}=${formatKey(node.value)}`);
    return `${this.name}(${this.index.size}/${this.maxSize}) {${body.join(', ')}}`;
  }

  /** Nodes oldest → newest, copied so callers may mutate while walking. */
  private orderedNodes(): RecencyNode<K, V>[] {
    return Array.from(this.recency);
  }
}
