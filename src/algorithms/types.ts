import { z } from 'zod';
import type { Decision, Quota } from '../types.js';

export const TokenBucketStateSchema = z.object({
  algorithm: z.literal('token-bucket'),
  tokens: z.number(),
  lastRefill: z.number(),
});

export const LeakyBucketStateSchema = z.object({
  algorithm: z.literal('leaky-bucket'),
  level: z.number(),
  lastDrain: z.number(),
});

export const FixedWindowStateSchema = z.object({
  algorithm: z.literal('fixed-window'),
  windowStart: z.number(),
  count: z.number(),
});

export const SlidingWindowStateSchema = z.object({
  algorithm: z.literal('sliding-window'),
  windowStart: z.number(),
  currentCount: z.number(),
  previousCount: z.number(),
});

export const SlidingWindowLogStateSchema = z.object({
  algorithm: z.literal('sliding-window-log'),
  timestamps: z.array(z.number()),
});

export const GcraStateSchema = z.object({
  algorithm: z.literal('gcra'),
  /** Theoretical arrival time of the next conforming request */
  tat: z.number(),
  lastSeen: z.number(),
});

/**
 * Persisted per-key state for every algorithm, tagged by algorithm name.
 */
export const LimiterStateSchema = z.discriminatedUnion('algorithm', [
  TokenBucketStateSchema,
  LeakyBucketStateSchema,
  FixedWindowStateSchema,
  SlidingWindowStateSchema,
  SlidingWindowLogStateSchema,
  GcraStateSchema,
]);

export type TokenBucketState = z.infer<typeof TokenBucketStateSchema>;
export type LeakyBucketState = z.infer<typeof LeakyBucketStateSchema>;
export type FixedWindowState = z.infer<typeof FixedWindowStateSchema>;
export type SlidingWindowState = z.infer<typeof SlidingWindowStateSchema>;
export type SlidingWindowLogState = z.infer<typeof SlidingWindowLogStateSchema>;
export type GcraState = z.infer<typeof GcraStateSchema>;
export type LimiterState = z.infer<typeof LimiterStateSchema>;

export type AlgorithmName = LimiterState['algorithm'];

export const ALGORITHM_NAMES = [
  'token-bucket',
  'leaky-bucket',
  'fixed-window',
  'sliding-window',
  'sliding-window-log',
  'gcra',
] as const satisfies readonly AlgorithmName[];

/**
 * Result of evaluating one request. `state` is null when nothing must be written.
 */
export interface Evaluation<S extends LimiterState = LimiterState> {
  state: S | null;
  decision: Decision;
}

/**
 * A rate limiting strategy. Implementations hold no per-key data: state goes
 * in, new state comes out, and the same inputs always give the same result.
 */
export interface RateLimitAlgorithm<S extends LimiterState = LimiterState> {
  readonly name: S['algorithm'];

  /** Whether a stored state belongs to this algorithm. */
  owns(state: LimiterState): state is S;

  /**
   * Decide a request of `cost` units at `now`.
   * @param state - Stored state, or null when the key has none
   */
  evaluate(state: S | null, now: number, cost: number, quota: Quota): Evaluation<S>;

  /**
   * Read-only view: `remaining` is the current capacity and `allowed` tells
   * whether `cost` would be admitted now.
   */
  inspect(state: S | null, now: number, cost: number, quota: Quota): Decision;

  /** How long stored state must live after its last write. */
  ttlMs(quota: Quota): number;
}
