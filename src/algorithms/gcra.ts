import type { Quota } from '../types.js';
import { BaseAlgorithm } from './base.js';
import type { GcraState, LimiterState } from './types.js';

/**
 * Generic Cell Rate Algorithm.
 *
 * Stores the theoretical arrival time (TAT) and the last evaluation time. With emission interval
 * `T = windowMs / limit`, a request of `cost` units is conforming when
 *
 *   now >= max(tat, now) + T * cost - windowMs
 *
 * which admits bursts of up to `limit` units and a sustained rate of one unit
 * per `T`.
 */
export class GcraAlgorithm extends BaseAlgorithm<GcraState> {
  readonly name = 'gcra' as const;

  owns(state: LimiterState): state is GcraState {
    return state.algorithm === 'gcra';
  }

  protected timestampOf(state: GcraState): number {
    return state.lastSeen;
  }

  protected advance(state: GcraState | null, now: number): GcraState {
    return state ? { ...state, lastSeen: now } : { algorithm: 'gcra', tat: now, lastSeen: now };
  }

  protected available(state: GcraState, now: number, quota: Quota): number {
    const debt = Math.max(0, state.tat - now);
    return ((quota.windowMs - debt) * quota.limit) / quota.windowMs;
  }

  protected consume(state: GcraState, now: number, cost: number, quota: Quota): GcraState {
    return {
      algorithm: 'gcra',
      tat: Math.max(state.tat, now) + this.increment(cost, quota),
      lastSeen: now,
    };
  }

  protected waitFor(state: GcraState, now: number, cost: number, quota: Quota): number {
    const allowAt = Math.max(state.tat, now) + this.increment(cost, quota) - quota.windowMs;
    return allowAt - now;
  }

  protected resetTime(state: GcraState, now: number): number {
    return Math.max(state.tat, now);
  }

  private increment(cost: number, quota: Quota): number {
    return (cost * quota.windowMs) / quota.limit;
  }
}
