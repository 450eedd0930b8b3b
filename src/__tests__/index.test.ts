// =============================================================================
// Public entry point Tests
// =============================================================================

jest.mock('../utils/logger', () => ({
  __esModule: true,
  default: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

import { createLRUCache, LRUCache, ReadThroughCache, CacheConfigurationError } from '../index';
import config from '../config';

describe('createLRUCache', () => {
  it('should default capacity to the configured value', () => {
    const cache = createLRUCache<string, number>();
    expect(cache).toBeInstanceOf(LRUCache);
    expect(cache.capacity).toBe(config.defaultCapacity);
  });

  it('should honour an explicit capacity and name', () => {
    const cache = createLRUCache<string, number>({ capacity: 2, name: 'recent' });
    cache.put('a', 1);
    expect(cache.toString()).toBe('recent(1/2) {a=1}');
  });

  it('should pass onEvict through', () => {
    const onEvict = jest.fn();
    const cache = createLRUCache<string, number>({ capacity: 1, onEvict });
    cache.put('a', 1);
    cache.put('b', 2);
    expect(onEvict).toHaveBeenCalledWith('a', 1);
  });

  it('should still reject an invalid explicit capacity', () => {
    expect(() => createLRUCache({ capacity: -1 })).toThrow(CacheConfigurationError);
  });

  it('should export the read-through wrapper', () => {
    const cache = new ReadThroughCache<string, string>(async (k) => k, createLRUCache({ capacity: 1 }));
    expect(cache.cache.capacity).toBe(1);
  });
});
