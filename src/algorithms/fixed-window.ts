import type { Quota } from '../types.js';
import { BaseAlgorithm } from './base.js';
import type { FixedWindowState, LimiterState } from './types.js';

/**
 * Fixed Window Rate Limiting Algorithm.
 *
 * Divides time into epoch-aligned windows and counts units per key per window.
 * Clients timing requests around a boundary can get up to twice the limit
 * through in a short span.
 */
export class FixedWindowAlgorithm extends BaseAlgorithm<FixedWindowState> {
  readonly name = 'fixed-window' as const;

  owns(state: LimiterState): state is FixedWindowState {
    return state.algorithm === 'fixed-window';
  }

  protected timestampOf(state: FixedWindowState): number {
    return state.windowStart;
  }

  protected advance(state: FixedWindowState | null, now: number, quota: Quota): FixedWindowState {
    const windowStart = Math.floor(now / quota.windowMs) * quota.windowMs;
    if (state === null || windowStart > state.windowStart) {
      return { algorithm: 'fixed-window', windowStart, count: 0 };
    }
    return state;
  }

  protected available(state: FixedWindowState, _now: number, quota: Quota): number {
    return quota.limit - state.count;
  }

  protected consume(state: FixedWindowState, _now: number, cost: number): FixedWindowState {
    return { ...state, count: state.count + cost };
  }

  protected waitFor(state: FixedWindowState, now: number, _cost: number, quota: Quota): number {
    return state.windowStart + quota.windowMs - now;
  }

  protected resetTime(state: FixedWindowState, now: number, quota: Quota): number {
    return state.count === 0 ? now : state.windowStart + quota.windowMs;
  }
}
