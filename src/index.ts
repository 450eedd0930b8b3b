import config from './config';
import { LRUCache } from './services/lruCache';
import { LRUCacheOptions } from './types';

export * from './types';
export { LRUCache } from './services/lruCache';
export { ReadThroughCache } from './services/readThroughCache';
export { CacheConfigurationError } from './utils/CacheConfigurationError';
export type { CacheSetting } from './utils/CacheConfigurationError';
export { CacheLoadError } from './utils/CacheLoadError';
export { formatKey } from './utils/formatKey';
export { loadConfig } from './config';
export type { CacheLibConfig, LogLevel } from './config';

/**
 * Create an LRUCache, taking capacity from `LRU_CACHE_CAPACITY`
 * (default 500) unless one is given.
 *
 * const users = createLRUCache<string, User>({ name: 'users' });
 */
export function createLRUCache<K, V>(options: Partial<LRUCacheOptions<K, V>> = {}): LRUCache<K, V> {
  return new LRUCache<K, V>({ ...options, capacity: options.capacity ?? config.defaultCapacity });
}
