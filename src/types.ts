// =============================================================================
// Shared Type Definitions
// =============================================================================

/** Epoch-millisecond time source */
export type Clock = () => number;

/** Deadline stored on entries that never expire */
export const NO_EXPIRY = Number.POSITIVE_INFINITY;

/** Default spacing between reaper sweeps (1 second) */
export const DEFAULT_REAPER_INTERVAL_MS = 1000;

/** One cached key/value pair and its deadline */
export interface Entry<K, V> {
  key: K;
  value: V;
  /** Epoch ms after which the entry is gone; `NO_EXPIRY` for permanent entries */
  expiresAt: number;
}

/** Result of a lookup; `found` discriminates the two shapes */
export type GetResult<V> = { value: V; found: true } | { value: undefined; found: false };

/** Reaper lifecycle. `stopped` is terminal. */
export type ReaperState = 'running' | 'stopped';

export interface CacheOptions {
  /** Milliseconds between background expiry sweeps (default 1000) */
  reaperIntervalMs?: number;
  /** Time source used for every TTL computation (default `Date.now`) */
  clock?: Clock;
  /** Aborting this signal stops the reaper, same as `stop()` */
  signal?: AbortSignal;
  /** Label for log lines (default `cache`) */
  name?: string;
}

/** Public surface of a bounded LRU + TTL cache */
export interface ICache<K, V> {
  capacity(): number;
  add(key: K, value: V): void;
  addWithTTL(key: K, value: V, ttlMs: number): void;
  get(key: K): GetResult<V>;
  has(key: K): boolean;
  remove(key: K): boolean;
  clear(): void;
  size(): number;
  keys(): K[];
  sweep(): number;
  stop(): void;
  isReaperRunning(): boolean;
}
