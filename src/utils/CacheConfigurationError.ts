// =============================================================================
// CacheConfigurationError — Typed error for invalid cache settings
// =============================================================================
// Raised when a cache is constructed with an unusable capacity, or when the
// environment carries a value the config loader cannot accept. Thrown at
// construction / startup, never on the get/put path.
// =============================================================================

export type CacheSetting = 'capacity' | 'LRU_CACHE_CAPACITY' | 'LOG_LEVEL';

export class CacheConfigurationError extends Error {
  /** Which setting was rejected */
  public readonly setting: CacheSetting;
  /** The rejected value, as received */
  public readonly received: unknown;

  constructor(setting: CacheSetting, received: unknown, expected: string) {
    super(`Invalid ${setting}: expected ${expected}, received ${describeReceived(received)}`);
    this.name = 'CacheConfigurationError';
    this.setting = setting;
    this.received = received;

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, CacheConfigurationError.prototype);
  }
}

function describeReceived(received: unknown): string {
  if (typeof received === 'string') return JSON.stringify(received);
  return String(received);
}
