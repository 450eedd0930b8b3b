// =============================================================================
// Read-Through Cache — LRUCache in front of an async loader
// =============================================================================
// load(key):
//   1. Hit  — serve from the LRU cache (refreshes recency)
//   2. Miss — call the loader, put the result, return it
//
// Concurrent loads of the same missing key share one loader call.
// invalidate() also detaches a load still in flight: its result is handed
// to the callers already waiting on it but is not written to the cache.
// Loader failures are wrapped in CacheLoadError and never cached, so the
// next load retries.
// =============================================================================
import { LRUCache } from './lruCache';
import { CacheLoadError } from '../utils/CacheLoadError';
import { formatKey } from '../utils/formatKey';
import logger from '../utils/logger';
import { CacheLoader, LRUCacheOptions } from '../types';

export class ReadThroughCache<K, V> {
  readonly cache: LRUCache<K, V>;
  private readonly loader: CacheLoader<K, V>;
  private readonly inFlight = new Map<K, Promise<V>>();

  /**
   * @param loader — Fetches the value for a missing key
   * @param cache  — An existing LRUCache to fill, or options for a new one
   */
  constructor(loader: CacheLoader<K, V>, cache: LRUCache<K, V> | LRUCacheOptions<K, V>) {
    this.loader = loader;
    this.cache = cache instanceof LRUCache ? cache : new LRUCache(cache);
  }

  async load(key: K): Promise<V> {
    const cached = this.cache.get(key);
    if (cached.hit) return cached.value;

    const pending = this.inFlight.get(key);
    if (pending) return pending;

    const request: Promise<V> = this.fill(key, () => this.inFlight.get(key) === request);
    this.inFlight.set(key, request);
    try {
      return await request;
    } finally {
      if (this.inFlight.get(key) === request) this.inFlight.delete(key);
    }
  }

  /**
   * Drop a key so the next load goes to the loader, including while an
   * earlier load of it is still running.
   *
   * @returns true if a cached entry was removed
   */
  invalidate(key: K): boolean {
    this.inFlight.delete(key);
    return this.cache.remove(key);
  }

  private async fill(key: K, isCurrent: () => boolean): Promise<V> {
    let value: V;
    try {
      value = await this.loader(key);
    } catch (err) {
      const cause = err instanceof Error ? err : new Error(String(err));
      const error = new CacheLoadError(formatKey(key), cause);
      logger.warn('Cache loader failed', { key: error.key, error: cause.message });
      throw error;
    }

    if (!isCurrent()) {
      logger.debug('Discarded load invalidated in flight', { key: formatKey(key) });
      return value;
    }

    this.cache.put(key, value);
    logger.debug('Cache filled from loader', { key: formatKey(key) });
    return value;
  }
}
