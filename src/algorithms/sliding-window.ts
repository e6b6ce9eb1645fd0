import type { Quota } from '../types.js';
import { BaseAlgorithm } from './base.js';
import type { LimiterState, SlidingWindowState } from './types.js';

/**
 * Sliding Window Counter.
 *
 * Keeps the counts of the current and previous epoch-aligned windows and
 * estimates the rolling count by weighting the previous window with the share
 * of it still inside the rolling window:
 *
 *   estimate = current + previous * (1 - elapsed / windowMs)
 *
 * The estimate differs from an exact log by at most `previousCount`.
 */
export class SlidingWindowAlgorithm extends BaseAlgorithm<SlidingWindowState> {
  readonly name = 'sliding-window' as const;

  owns(state: LimiterState): state is SlidingWindowState {
    return state.algorithm === 'sliding-window';
  }

  protected timestampOf(state: SlidingWindowState): number {
    return state.windowStart;
  }

  protected advance(
    state: SlidingWindowState | null,
    now: number,
    quota: Quota
  ): SlidingWindowState {
    const windowStart = Math.floor(now / quota.windowMs) * quota.windowMs;
    if (state === null || windowStart > state.windowStart + quota.windowMs) {
      return { algorithm: 'sliding-window', windowStart, currentCount: 0, previousCount: 0 };
    }
    if (windowStart > state.windowStart) {
      return {
        algorithm: 'sliding-window',
        windowStart,
        currentCount: 0,
        previousCount: state.currentCount,
      };
    }
    return state;
  }

  protected available(state: SlidingWindowState, now: number, quota: Quota): number {
    return quota.limit - this.estimate(state, now, quota);
  }

  protected consume(state: SlidingWindowState, _now: number, cost: number): SlidingWindowState {
    return { ...state, currentCount: state.currentCount + cost };
  }

  protected waitFor(state: SlidingWindowState, now: number, cost: number, quota: Quota): number {
    const elapsed = now - state.windowStart;
    const excess = this.estimate(state, now, quota) + cost - quota.limit;

    // The previous window's weight decays by previousCount per windowMs.
    if (state.previousCount > 0) {
      const decay = (excess * quota.windowMs) / state.previousCount;
      if (elapsed + decay <= quota.windowMs) {
        return decay;
      }
    }

    // Otherwise wait for the next window, where the current count becomes the decaying one.
    const untilNextWindow = quota.windowMs - elapsed;
    const nextExcess = state.currentCount + cost - quota.limit;
    if (nextExcess <= 0) {
      return untilNextWindow;
    }
    return untilNextWindow + (nextExcess * quota.windowMs) / state.currentCount;
  }

  protected resetTime(state: SlidingWindowState, now: number, quota: Quota): number {
    if (state.currentCount > 0) {
      return state.windowStart + 2 * quota.windowMs;
    }
    if (state.previousCount > 0) {
      return state.windowStart + quota.windowMs;
    }
    return now;
  }

  private estimate(state: SlidingWindowState, now: number, quota: Quota): number {
    const elapsed = now - state.windowStart;
    return state.currentCount + state.previousCount * (1 - elapsed / quota.windowMs);
  }
}
