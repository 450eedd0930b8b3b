// =============================================================================
// CacheLoadError — Typed error for read-through loader failures
// =============================================================================
// Wraps whatever the loader rejected with so callers get one predictable
// error type. The message names the key only; loaded values never appear.
// =============================================================================

export class CacheLoadError extends Error {
  /** Printable description of the key that failed to load */
  public readonly key: string;
  /** The original error (for logging) */
  declare readonly cause: Error;

  constructor(key: string, cause: Error) {
    super(`Cache load for key ${key} failed: ${cause.message.slice(0, 200)}`, { cause });
    this.name = 'CacheLoadError';
    this.key = key;

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, CacheLoadError.prototype);
  }
}
