import type { LimiterState } from '../algorithms/types.js';
import { DEFAULT_CLEANUP_INTERVAL_MS } from '../constants.js';
import { defaultLogger, type LimiterLogger } from '../logger.js';
import type { Backend, CommitResult, MemoryBackendOptions, Snapshot } from './types.js';

/**
 * Internal storage entry with expiration tracking.
 */
interface InternalEntry {
  state: LimiterState;
  version: string;
  expiresAt: number;
}

/**
 * In-process backend.
 *
 * Uses a Map for O(1) lookups and a cleanup interval to remove expired entries.
 * `commit` compares and writes without yielding to the event loop, so it is
 * atomic for every caller in the process. For several processes, use
 * RedisBackend.
 */
export class MemoryBackend implements Backend {
  readonly name = 'memory';

  private readonly data = new Map<string, InternalEntry>();
  private readonly cleanupIntervalMs: number;
  private readonly getCurrentTime: () => number;
  private readonly logger: LimiterLogger;
  private cleanupTimer: ReturnType<typeof setInterval> | null = null;
  // Never reused, so a deleted and recreated key cannot match an old token.
  private nextVersion = 1;

  constructor(options: MemoryBackendOptions = {}) {
    this.cleanupIntervalMs = options.cleanupIntervalMs ?? DEFAULT_CLEANUP_INTERVAL_MS;
    this.getCurrentTime = options.getCurrentTime ?? ((): number => Date.now());
    this.logger = options.logger ?? defaultLogger();

    if (this.cleanupIntervalMs > 0) {
      this.startCleanup();
    }
  }

  private startCleanup(): void {
    this.cleanupTimer = setInterval(() => {
      this.removeExpiredEntries();
    }, this.cleanupIntervalMs);

    // Unref the timer so it doesn't prevent the process from exiting
    if (typeof this.cleanupTimer.unref === 'function') {
      this.cleanupTimer.unref();
    }
  }

  /**
   * Remove all expired entries. Returns how many were removed.
   */
  removeExpiredEntries(): number {
    const now = this.getCurrentTime();
    let removed = 0;
    for (const [key, item] of this.data) {
      if (item.expiresAt <= now) {
        this.data.delete(key);
        removed++;
      }
    }
    if (removed > 0) {
      this.logger.debug('Removed expired rate limit state', { backend: this.name, removed });
    }
    return removed;
  }

  /** Number of live keys. */
  get size(): number {
    return this.data.size;
  }

  private live(key: string): InternalEntry | null {
    const item = this.data.get(key);
    if (!item) {
      return null;
    }
    if (item.expiresAt <= this.getCurrentTime()) {
      this.data.delete(key);
      return null;
    }
    return item;
  }

  load(key: string): Promise<Snapshot> {
    const item = this.live(key);
    if (item === null) {
      return Promise.resolve({ state: null, version: null });
    }
    return Promise.resolve({ state: item.state, version: item.version });
  }

  commit(
    key: string,
    state: LimiterState,
    expectedVersion: string | null,
    ttlMs: number
  ): Promise<CommitResult> {
    const current = this.live(key);
    if ((current?.version ?? null) !== expectedVersion) {
      return Promise.resolve('conflict');
    }

    this.data.set(key, {
      state,
      version: String(this.nextVersion++),
      expiresAt: this.getCurrentTime() + ttlMs,
    });
    return Promise.resolve('committed');
  }

  delete(key: string): Promise<void> {
    this.data.delete(key);
    return Promise.resolve();
  }

  /**
   * Clears the cleanup interval and all stored state.
   */
  destroy(): Promise<void> {
    if (this.cleanupTimer !== null) {
      clearInterval(this.cleanupTimer);
      this.cleanupTimer = null;
    }
    this.data.clear();
    return Promise.resolve();
  }
}
