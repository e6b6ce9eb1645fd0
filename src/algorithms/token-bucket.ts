import type { Quota } from '../types.js';
import { BaseAlgorithm } from './base.js';
import type { LimiterState, TokenBucketState } from './types.js';

/**
 * Token Bucket rate limiting algorithm.
 *
 * The bucket holds up to `limit` tokens and refills continuously at
 * `limit / windowMs` tokens per millisecond. A request takes `cost` tokens.
 * Allows bursts up to the full capacity, then a steady rate.
 *
 * A key without state starts with a full bucket.
 */
export class TokenBucketAlgorithm extends BaseAlgorithm<TokenBucketState> {
  readonly name = 'token-bucket' as const;

  owns(state: LimiterState): state is TokenBucketState {
    return state.algorithm === 'token-bucket';
  }

  protected timestampOf(state: TokenBucketState): number {
    return state.lastRefill;
  }

  protected advance(state: TokenBucketState | null, now: number, quota: Quota): TokenBucketState {
    if (state === null) {
      return { algorithm: 'token-bucket', tokens: quota.limit, lastRefill: now };
    }
    // Multiply before dividing so whole-token refills stay exact.
    const refill = ((now - state.lastRefill) * quota.limit) / quota.windowMs;
    return {
      algorithm: 'token-bucket',
      tokens: Math.min(quota.limit, state.tokens + refill),
      lastRefill: now,
    };
  }

  protected available(state: TokenBucketState): number {
    return state.tokens;
  }

  protected consume(state: TokenBucketState, _now: number, cost: number): TokenBucketState {
    return { ...state, tokens: state.tokens - cost };
  }

  protected waitFor(state: TokenBucketState, _now: number, cost: number, quota: Quota): number {
    return ((cost - state.tokens) * quota.windowMs) / quota.limit;
  }

  protected resetTime(state: TokenBucketState, now: number, quota: Quota): number {
    return now + (Math.max(0, quota.limit - state.tokens) * quota.windowMs) / quota.limit;
  }
}
