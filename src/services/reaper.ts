// =============================================================================
// Reaper — periodic expiry sweep for one cache instance
// =============================================================================
// Runs `sweep` every `intervalMs` until stopped. Stopping goes through an
// AbortController: `stop()` aborts it, and so does the owner's signal when
// one is given. The abort listener clears the timer, which makes stopping
// one-shot and idempotent.
//
//   running ──tick──► running
//   running ──abort─► stopped   (terminal)
// =============================================================================
import logger from '../utils/logger';
import type { ReaperState } from '../types';

export interface ReaperOptions {
  /** Called on every tick; returns the number of entries removed */
  sweep: () => number;
  intervalMs: number;
  /** Owner cancellation; aborting it stops the reaper */
  signal?: AbortSignal;
  /** Cache label for log lines */
  name: string;
}

export class Reaper {
  private readonly controller = new AbortController();
  private readonly name: string;
  private intervalHandle: ReturnType<typeof setInterval> | null = null;
  private detachOwner: (() => void) | null = null;

  constructor(options: ReaperOptions) {
    this.name = options.name;

    const { signal } = options;
    if (signal?.aborted) {
      this.controller.abort();
      logger.debug('Reaper not started, owner signal already aborted', { cache: this.name });
      return;
    }

    this.controller.signal.addEventListener('abort', () => this.disarm(), { once: true });

    if (signal) {
      const onOwnerAbort = () => this.stop();
      signal.addEventListener('abort', onOwnerAbort, { once: true });
      this.detachOwner = () => signal.removeEventListener('abort', onOwnerAbort);
    }

    this.intervalHandle = setInterval(() => this.tick(options.sweep), options.intervalMs);

    // A forgotten cache must not keep the process alive
    this.intervalHandle.unref();

    logger.debug('Reaper started', { cache: this.name, intervalMs: options.intervalMs });
  }

  get state(): ReaperState {
    return this.controller.signal.aborted ? 'stopped' : 'running';
  }

  /**
   * Stops the reaper. Repeated calls are no-ops.
   */
  stop(): void {
    this.controller.abort();
  }

  private tick(sweep: () => number): void {
    if (this.controller.signal.aborted) return;

    const removed = sweep();
    if (removed > 0) {
      logger.debug('Reaper sweep removed expired entries', { cache: this.name, removed });
    }
  }

  private disarm(): void {
    if (this.intervalHandle) {
      clearInterval(this.intervalHandle);
      this.intervalHandle = null;
    }
    if (this.detachOwner) {
      this.detachOwner();
      this.detachOwner = null;
    }
    logger.debug('Reaper stopped', { cache: this.name });
  }
}
