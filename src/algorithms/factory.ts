import { FixedWindowAlgorithm } from './fixed-window.js';
import { GcraAlgorithm } from './gcra.js';
import { LeakyBucketAlgorithm } from './leaky-bucket.js';
import { SlidingWindowLogAlgorithm } from './sliding-window-log.js';
import { SlidingWindowAlgorithm } from './sliding-window.js';
import { TokenBucketAlgorithm } from './token-bucket.js';
import type { AlgorithmName, RateLimitAlgorithm } from './types.js';

/**
 * Create the algorithm for a configured name.
 */
export function createAlgorithm(name: AlgorithmName): RateLimitAlgorithm {
  switch (name) {
    case 'token-bucket':
      return new TokenBucketAlgorithm();
    case 'leaky-bucket':
      return new LeakyBucketAlgorithm();
    case 'fixed-window':
      return new FixedWindowAlgorithm();
    case 'sliding-window':
      return new SlidingWindowAlgorithm();
    case 'sliding-window-log':
      return new SlidingWindowLogAlgorithm();
    case 'gcra':
      return new GcraAlgorithm();
  }
}
