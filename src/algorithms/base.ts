import {
  CAPACITY_EPSILON,
  STATE_TTL_WINDOWS,
  TTL_BUFFER_MULTIPLIER,
} from '../constants.js';
import type { Decision, Quota } from '../types.js';
import type { Evaluation, LimiterState, RateLimitAlgorithm } from './types.js';

/**
 * Shared decision logic. Subclasses describe their state in terms of
 * available capacity; this class turns that into decisions.
 *
 * Every hook receives `now` already clamped to the state's own timestamp, so a
 * clock that steps backwards never rewinds a key.
 */
export abstract class BaseAlgorithm<S extends LimiterState> implements RateLimitAlgorithm<S> {
  abstract readonly name: S['algorithm'];

  abstract owns(state: LimiterState): state is S;

  /** Latest time the state has been evaluated at. */
  protected abstract timestampOf(state: S): number;

  /** Bring the state forward to `now` (refill, drain, rotate, evict). Absent state becomes the initial state. */
  protected abstract advance(state: S | null, now: number, quota: Quota): S;

  /** Units that could be admitted right now. May be fractional. */
  protected abstract available(state: S, now: number, quota: Quota): number;

  protected abstract consume(state: S, now: number, cost: number, quota: Quota): S;

  /** Milliseconds until `cost` units fit. Only called when cost <= limit. */
  protected abstract waitFor(state: S, now: number, cost: number, quota: Quota): number;

  /** Epoch ms at which the state is equivalent to absent. */
  protected abstract resetTime(state: S, now: number, quota: Quota): number;

  evaluate(state: S | null, now: number, cost: number, quota: Quota): Evaluation<S> {
    const at = this.effectiveNow(state, now);
    const current = this.advance(state, at, quota);

    if (cost > quota.limit || !this.fits(current, at, cost, quota)) {
      return { state: null, decision: this.deny(current, at, cost, quota) };
    }

    const next = this.consume(current, at, cost, quota);
    return {
      state: next,
      decision: {
        allowed: true,
        limit: quota.limit,
        remaining: this.remaining(next, at, quota),
        retryAfterMs: 0,
        resetAt: new Date(Math.ceil(this.resetTime(next, at, quota))),
      },
    };
  }

  inspect(state: S | null, now: number, cost: number, quota: Quota): Decision {
    const at = this.effectiveNow(state, now);
    const current = this.advance(state, at, quota);

    if (cost > quota.limit || !this.fits(current, at, cost, quota)) {
      return this.deny(current, at, cost, quota);
    }
    return {
      allowed: true,
      limit: quota.limit,
      remaining: this.remaining(current, at, quota),
      retryAfterMs: 0,
      resetAt: new Date(Math.ceil(this.resetTime(current, at, quota))),
    };
  }

  ttlMs(quota: Quota): number {
    return Math.ceil(quota.windowMs * STATE_TTL_WINDOWS * TTL_BUFFER_MULTIPLIER);
  }

  private effectiveNow(state: S | null, now: number): number {
    return state === null ? now : Math.max(now, this.timestampOf(state));
  }

  private fits(state: S, now: number, cost: number, quota: Quota): boolean {
    return this.available(state, now, quota) + CAPACITY_EPSILON >= cost;
  }

  private remaining(state: S, now: number, quota: Quota): number {
    const whole = Math.floor(this.available(state, now, quota) + CAPACITY_EPSILON);
    return Math.min(quota.limit, Math.max(0, whole));
  }

  private deny(state: S, now: number, cost: number, quota: Quota): Decision {
    const retryAfterMs =
      cost > quota.limit
        ? Number.POSITIVE_INFINITY
        : Math.max(1, Math.ceil(this.waitFor(state, now, cost, quota) - CAPACITY_EPSILON));
    return {
      allowed: false,
      limit: quota.limit,
      remaining: this.remaining(state, now, quota),
      retryAfterMs,
      resetAt: new Date(Math.ceil(this.resetTime(state, now, quota))),
    };
  }
}
