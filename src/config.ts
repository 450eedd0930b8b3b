// =============================================================================
// Library Configuration — Centralised + Validated
// =============================================================================
import dotenv from 'dotenv';
import { CacheConfigurationError } from './utils/CacheConfigurationError';
dotenv.config();

/** winston's default (npm) levels, most to least severe */
export const LOG_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface CacheLibConfig {
  /** Capacity used by createLRUCache() when none is given */
  defaultCapacity: number;
  logLevel: LogLevel;
  /** Optional log file; console only when unset */
  logFile: string | undefined;
}

export const DEFAULT_CAPACITY = 500;

/**
 * Build the config from an environment map.
 * Throws CacheConfigurationError on a malformed capacity or log level.
 */
export function loadConfig(env: NodeJS.ProcessEnv): CacheLibConfig {
  return {
    defaultCapacity: parseCapacity(env.LRU_CACHE_CAPACITY),
    logLevel: parseLogLevel(env.LOG_LEVEL),
    logFile: env.LOG_FILE || undefined,
  };
}

function parseCapacity(raw: string | undefined): number {
  if (raw === undefined || raw.trim() === '') return DEFAULT_CAPACITY;
  const trimmed = raw.trim();
  const value = /^\d+$/.test(trimmed) ? parseInt(trimmed, 10) : NaN;
  if (!Number.isInteger(value) || value < 1) {
    throw new CacheConfigurationError('LRU_CACHE_CAPACITY', raw, 'a positive integer');
  }
  return value;
}

function parseLogLevel(raw: string | undefined): LogLevel {
  if (raw === undefined || raw.trim() === '') return 'info';
  const level = LOG_LEVELS.find((candidate) => candidate === raw.trim().toLowerCase());
  if (!level) {
    throw new CacheConfigurationError('LOG_LEVEL', raw, `one of ${LOG_LEVELS.join(', ')}`);
  }
  return level;
}

const config: CacheLibConfig = loadConfig(process.env);

export default config;
