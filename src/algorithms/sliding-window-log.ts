import type { Quota } from '../types.js';
import { BaseAlgorithm } from './base.js';
import type { LimiterState, SlidingWindowLogState } from './types.js';

/**
 * Sliding Window Log rate limiting algorithm.
 *
 * Tracks the timestamp of every admitted unit per key. On each request:
 * - Removes entries at or before `now - windowMs`
 * - Counts remaining entries
 * - Allows if `count + cost` fits the limit, then appends `cost` entries
 *
 * Exact, at the price of up to `limit` timestamps per key.
 */
export class SlidingWindowLogAlgorithm extends BaseAlgorithm<SlidingWindowLogState> {
  readonly name = 'sliding-window-log' as const;

  owns(state: LimiterState): state is SlidingWindowLogState {
    return state.algorithm === 'sliding-window-log';
  }

  protected timestampOf(state: SlidingWindowLogState): number {
    return state.timestamps.length > 0
      ? state.timestamps[state.timestamps.length - 1]
      : Number.NEGATIVE_INFINITY;
  }

  protected advance(
    state: SlidingWindowLogState | null,
    now: number,
    quota: Quota
  ): SlidingWindowLogState {
    const cutoff = now - quota.windowMs;
    return {
      algorithm: 'sliding-window-log',
      timestamps: (state?.timestamps ?? []).filter((ts) => ts > cutoff),
    };
  }

  protected available(state: SlidingWindowLogState, _now: number, quota: Quota): number {
    return quota.limit - state.timestamps.length;
  }

  protected consume(state: SlidingWindowLogState, now: number, cost: number): SlidingWindowLogState {
    return {
      algorithm: 'sliding-window-log',
      timestamps: [...state.timestamps, ...new Array<number>(cost).fill(now)],
    };
  }

  protected waitFor(
    state: SlidingWindowLogState,
    now: number,
    cost: number,
    quota: Quota
  ): number {
    // Entries are in arrival order; the k-th oldest must age out.
    const mustExpire = state.timestamps.length + cost - quota.limit;
    return state.timestamps[mustExpire - 1] + quota.windowMs - now;
  }

  protected resetTime(state: SlidingWindowLogState, now: number, quota: Quota): number {
    const count = state.timestamps.length;
    return count === 0 ? now : state.timestamps[count - 1] + quota.windowMs;
  }
}
