// =============================================================================
// Shared Type Definitions
// =============================================================================

/** A single key/value pair as held by the cache */
export interface CacheEntry<K, V> {
  readonly key: K;
  readonly value: V;
}

/**
 * Result of a cache lookup. A miss carries no value, so it can never be
 * confused with a stored `undefined` or `null`.
 */
export type CacheLookup<V> = { hit: true; value: V } | { hit: false };

/** Called after a capacity eviction has completed */
export type EvictionListener<K, V> = (key: K, value: V) => void;

/** Options accepted by the LRUCache constructor */
export interface LRUCacheOptions<K, V> {
  /** Maximum number of distinct keys (positive integer) */
  capacity: number;
  /** Notified once per capacity eviction */
  onEvict?: EvictionListener<K, V>;
  /** Label used in log lines and toString() (default "LRUCache") */
  name?: string;
}

/** Point-in-time counters for a cache */
export interface CacheStats {
  hits: number;
  misses: number;
  evictions: number;
  size: number;
  capacity: number;
  /** hits / (hits + misses), or 0 before the first lookup */
  hitRate: number;
}

/** Async source used to fill read-through misses */
export type CacheLoader<K, V> = (key: K) => Promise<V>;
