import type { Quota } from '../types.js';
import { BaseAlgorithm } from './base.js';
import type { LeakyBucketState, LimiterState } from './types.js';

/**
 * Leaky Bucket (as a meter).
 *
 * Each admitted request pours `cost` units into a bucket of size `limit` that
 * drains at `limit / windowMs` units per millisecond. A request is admitted
 * when it fits without overflowing.
 */
export class LeakyBucketAlgorithm extends BaseAlgorithm<LeakyBucketState> {
  readonly name = 'leaky-bucket' as const;

  owns(state: LimiterState): state is LeakyBucketState {
    return state.algorithm === 'leaky-bucket';
  }

  protected timestampOf(state: LeakyBucketState): number {
    return state.lastDrain;
  }

  protected advance(state: LeakyBucketState | null, now: number, quota: Quota): LeakyBucketState {
    if (state === null) {
      return { algorithm: 'leaky-bucket', level: 0, lastDrain: now };
    }
    const drained = ((now - state.lastDrain) * quota.limit) / quota.windowMs;
    return {
      algorithm: 'leaky-bucket',
      level: Math.max(0, state.level - drained),
      lastDrain: now,
    };
  }

  protected available(state: LeakyBucketState, _now: number, quota: Quota): number {
    return quota.limit - state.level;
  }

  protected consume(state: LeakyBucketState, _now: number, cost: number): LeakyBucketState {
    return { ...state, level: state.level + cost };
  }

  protected waitFor(state: LeakyBucketState, _now: number, cost: number, quota: Quota): number {
    return ((state.level + cost - quota.limit) * quota.windowMs) / quota.limit;
  }

  protected resetTime(state: LeakyBucketState, now: number, quota: Quota): number {
    return now + (state.level * quota.windowMs) / quota.limit;
  }
}
