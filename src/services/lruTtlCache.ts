// =============================================================================
// LRU + TTL Cache — bounded in-memory cache with a background reaper
// =============================================================================
// A Least-Recently-Used cache that:
//   • Holds at most `capacity` entries and drops the least recent one when a
//     new key arrives at a full cache
//   • Lets each entry carry its own TTL, or none (permanent)
//   • Removes expired entries on read and, independently, on a periodic sweep
//
// Index: Map<key, NodeId>. Ordering: RecencyList (front = most recent).
// Both are only touched from synchronous methods, so every operation and every
// sweep runs to completion on the event loop before another can begin.
// =============================================================================
import { z } from 'zod';
import { NIL, NodeId, RecencyList } from '../models/RecencyList';
import { Reaper } from './reaper';
import { InvalidCapacityError, InvalidOptionError } from '../utils/CacheError';
import logger from '../utils/logger';
import {
  CacheOptions,
  Clock,
  DEFAULT_REAPER_INTERVAL_MS,
  GetResult,
  ICache,
  NO_EXPIRY,
} from '../types';

/** Longest delay a Node timer honours; larger values fire after 1 ms */
const MAX_TIMER_DELAY_MS = 2_147_483_647;

const OptionsSchema = z.object({
  reaperIntervalMs: z.number().int().positive().max(MAX_TIMER_DELAY_MS).optional(),
  clock: z.custom<Clock>((value) => typeof value === 'function', 'expected a function').optional(),
  signal: z.instanceof(AbortSignal).optional(),
  name: z.string().min(1).optional(),
});

export class LRUTTLCache<K, V> implements ICache<K, V> {
  private readonly maxSize: number;
  private readonly now: Clock;
  private readonly name: string;
  private readonly index = new Map<K, NodeId>();
  private readonly order = new RecencyList<K, V>();
  private readonly reaper: Reaper;

  /**
   * @param capacity — Maximum number of entries; must be a positive integer
   * @throws InvalidCapacityError, InvalidOptionError
   */
  constructor(capacity: number, options: CacheOptions = {}) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new InvalidCapacityError(capacity);
    }

    const parsed = OptionsSchema.safeParse(options);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new InvalidOptionError(issue.path.join('.'), issue.message);
    }

    this.maxSize = capacity;
    this.now = parsed.data.clock ?? Date.now;
    this.name = parsed.data.name ?? 'cache';
    this.reaper = new Reaper({
      sweep: () => this.sweep(),
      intervalMs: parsed.data.reaperIntervalMs ?? DEFAULT_REAPER_INTERVAL_MS,
      signal: parsed.data.signal,
      name: this.name,
    });
  }

  capacity(): number {
    return this.maxSize;
  }

  /** Insert or update a permanent entry. An existing key loses any TTL. */
  add(key: K, value: V): void {
    this.upsert(key, value, NO_EXPIRY);
  }

  /**
   * Insert or update an entry that expires `ttlMs` from now.
   *
   * A `ttlMs` of zero or less gives a deadline that has already passed: the
   * entry is stored, then dropped by the next `get` or sweep. `NaN` is
   * treated the same way.
   */
  addWithTTL(key: K, value: V, ttlMs: number): void {
    const now = this.now();
    this.upsert(key, value, Number.isNaN(ttlMs) ? now : now + ttlMs);
  }

  /**
   * Look up `key`. A hit becomes the most recent entry; an expired entry is
   * removed and reported as a miss.
   */
  get(key: K): GetResult<V> {
    const id = this.liveNode(key);
    if (id === undefined) return { value: undefined, found: false };

    this.order.moveToFront(id);
    return { value: this.order.entry(id).value, found: true };
  }

  /** Presence check that honours expiry without touching recency. */
  has(key: K): boolean {
    return this.liveNode(key) !== undefined;
  }

  /** Delete `key` if held. Returns whether anything was removed. */
  remove(key: K): boolean {
    const id = this.index.get(key);
    if (id === undefined) return false;
    this.deleteNode(id);
    return true;
  }

  clear(): void {
    this.index.clear();
    this.order.reset();
  }

  /** Entries currently held, including expired ones not yet swept. */
  size(): number {
    return this.order.size;
  }

  /** Held keys, most recent first. Does not bump recency or drop anything. */
  keys(): K[] {
    const keys: K[] = [];
    for (const id of this.order.ids()) {
      keys.push(this.order.entry(id).key);
    }
    return keys;
  }

  /**
   * Remove every entry whose deadline has passed. The reaper calls this on
   * each tick; it may also be called directly, including after `stop()`.
   *
   * @returns — The number of entries removed
   */
  sweep(): number {
    const now = this.now();
    let removed = 0;
    let id = this.order.front();
    while (id !== NIL) {
      const next = this.order.nextOf(id);
      if (isExpired(this.order.entry(id).expiresAt, now)) {
        this.deleteNode(id);
        removed++;
      }
      id = next;
    }
    return removed;
  }

  /**
   * Stop background sweeping. Idempotent. The cache stays usable afterwards;
   * expired entries are then only dropped by reads or a manual `sweep()`.
   */
  stop(): void {
    this.reaper.stop();
  }

  isReaperRunning(): boolean {
    return this.reaper.state === 'running';
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Internals
  // ─────────────────────────────────────────────────────────────────────────

  private upsert(key: K, value: V, expiresAt: number): void {
    const existing = this.index.get(key);
    if (existing !== undefined) {
      const entry = this.order.entry(existing);
      entry.value = value;
      entry.expiresAt = expiresAt;
      this.order.moveToFront(existing);
      return;
    }

    if (this.order.size >= this.maxSize) {
      this.evictLeastRecent();
    }

    const id = this.order.pushFront({ key, value, expiresAt });
    this.index.set(key, id);
  }

  /** Node for `key` if held and not expired; an expired node is deleted. */
  private liveNode(key: K): NodeId | undefined {
    const id = this.index.get(key);
    if (id === undefined) return undefined;

    if (isExpired(this.order.entry(id).expiresAt, this.now())) {
      this.deleteNode(id);
      return undefined;
    }
    return id;
  }

  private evictLeastRecent(): void {
    const id = this.order.back();
    if (id === NIL) return;
    this.deleteNode(id);
    logger.debug('Evicted least recently used entry', { cache: this.name, capacity: this.maxSize });
  }

  private deleteNode(id: NodeId): void {
    const entry = this.order.remove(id);
    this.index.delete(entry.key);
  }
}

/** Expired iff a deadline is set and it is not strictly after `now`. */
export function isExpired(expiresAt: number, now: number): boolean {
  return expiresAt !== NO_EXPIRY && expiresAt <= now;
}

/**
 * Build a cache of `capacity` entries and start its reaper.
 * Call `stop()` on the result before discarding it.
 *
 * @throws InvalidCapacityError when `capacity` is not a positive integer
 */
export function createCache<K, V>(capacity: number, options?: CacheOptions): LRUTTLCache<K, V> {
  return new LRUTTLCache<K, V>(capacity, options);
}
