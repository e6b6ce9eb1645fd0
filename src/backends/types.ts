import type { LimiterState } from '../algorithms/types.js';
import type { LimiterLogger } from '../logger.js';

/**
 * Stored state for a key plus the version token guarding it.
 * Both are null when the key has no state.
 */
export interface Snapshot {
  state: LimiterState | null;
  version: string | null;
}

export type CommitResult = 'committed' | 'conflict';

/**
 * Versioned key/state store. Per-key consistency comes entirely from
 * `commit`, a compare-and-set on the version token.
 */
export interface Backend {
  /** Name used in logs and errors */
  readonly name: string;

  load(key: string): Promise<Snapshot>;

  /**
   * Write `state` only if the stored version still equals `expectedVersion`
   * (null: the key must be absent). Refreshes the key's TTL on success.
   */
  commit(
    key: string,
    state: LimiterState,
    expectedVersion: string | null,
    ttlMs: number
  ): Promise<CommitResult>;

  delete(key: string): Promise<void>;

  /** Release timers and connections the backend owns. */
  destroy(): Promise<void>;
}

/**
 * Options for the in-process backend.
 */
export interface MemoryBackendOptions {
  /** Interval between sweeps of expired keys in ms; 0 disables (default: 60000) */
  cleanupIntervalMs?: number;
  /** Optional function to get current timestamp (for testing) */
  getCurrentTime?: () => number;
  logger?: LimiterLogger;
}
