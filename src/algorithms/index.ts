export type {
  AlgorithmName,
  Evaluation,
  FixedWindowState,
  GcraState,
  LeakyBucketState,
  LimiterState,
  RateLimitAlgorithm,
  SlidingWindowLogState,
  SlidingWindowState,
  TokenBucketState,
} from './types.js';
export { ALGORITHM_NAMES, LimiterStateSchema } from './types.js';
export { BaseAlgorithm } from './base.js';
export { TokenBucketAlgorithm } from './token-bucket.js';
export { LeakyBucketAlgorithm } from './leaky-bucket.js';
export { FixedWindowAlgorithm } from './fixed-window.js';
export { SlidingWindowAlgorithm } from './sliding-window.js';
export { SlidingWindowLogAlgorithm } from './sliding-window-log.js';
export { GcraAlgorithm } from './gcra.js';
export { createAlgorithm } from './factory.js';
