// =============================================================================
// Package entry — public API
// =============================================================================
export { LRUTTLCache, createCache, isExpired } from './services/lruTtlCache';
export { CacheError, InvalidCapacityError, InvalidOptionError, isCacheError } from './utils/CacheError';
export type { CacheErrorCode } from './utils/CacheError';
export { NO_EXPIRY, DEFAULT_REAPER_INTERVAL_MS } from './types';
export type { CacheOptions, Clock, Entry, GetResult, ICache, ReaperState } from './types';
export { loadConfig } from './config';
export type { AppConfig, LogLevel } from './config';
export { configureLogger } from './utils/logger';
