import type { AlgorithmName, RateLimitAlgorithm } from '../algorithms/types.js';
import type { Backend } from '../backends/types.js';
import type { Clock } from '../clock.js';
import { CapacityExceededError, InvalidConfigurationError } from '../errors.js';
import { RateLimiter, assertValidQuota } from '../limiter.js';
import { defaultLogger, type LimiterLogger } from '../logger.js';
import type { Decision, FailureMode } from '../types.js';

export interface QuotaPoolOptions {
  /** Namespaces sub-key state in the backend */
  poolId: string;
  /** Units per window shared by all allocations */
  totalQuota: number;
  windowMs: number;
  backend: Backend;
  /** @default 'token-bucket' */
  algorithm?: AlgorithmName | RateLimitAlgorithm;
  failureMode?: FailureMode;
  maxRetries?: number;
  getCurrentTime?: Clock;
  logger?: LimiterLogger;
}

/**
 * A total quota divided among sub-keys. The allocations never add up to more
 * than the total; each sub-key is limited to its own allocation.
 */
export class QuotaPool {
  readonly poolId: string;
  readonly totalQuota: number;
  private readonly options: QuotaPoolOptions;
  private readonly logger: LimiterLogger;
  private readonly limiters = new Map<string, RateLimiter>();

  constructor(options: QuotaPoolOptions) {
    assertValidQuota({ limit: options.totalQuota, windowMs: options.windowMs });
    if (options.poolId.length === 0) {
      throw new InvalidConfigurationError('poolId must be a non-empty string');
    }
    this.poolId = options.poolId;
    this.totalQuota = options.totalQuota;
    this.options = options;
    this.logger = options.logger ?? defaultLogger();
  }

  /**
   * Give `subkey` `quota` units per window, replacing any previous allocation.
   * @throws CapacityExceededError when the pool cannot cover it
   */
  allocate(subkey: string, quota: number): void {
    if (!Number.isInteger(quota) || quota <= 0) {
      throw new InvalidConfigurationError(`Allocation must be a positive integer, got: ${quota}`);
    }
    const existing = this.limiters.get(subkey);
    const available = this.available() + (existing?.limit ?? 0);
    if (quota > available) {
      throw new CapacityExceededError(quota, available);
    }

    if (existing !== undefined) {
      existing.reconfigure({ limit: quota });
    } else {
      this.limiters.set(
        subkey,
        new RateLimiter({
          algorithm: this.options.algorithm ?? 'token-bucket',
          backend: this.options.backend,
          limit: quota,
          windowMs: this.options.windowMs,
          keyPrefix: `pool:${this.poolId}:`,
          failureMode: this.options.failureMode,
          maxRetries: this.options.maxRetries,
          getCurrentTime: this.options.getCurrentTime,
          logger: this.logger,
        })
      );
    }
    this.logger.debug('Quota allocated', { poolId: this.poolId, subkey, quota });
  }

  /**
   * Return `subkey`'s allocation to the pool and clear its state.
   * Returns false when it had none.
   */
  async release(subkey: string): Promise<boolean> {
    const limiter = this.limiters.get(subkey);
    if (limiter === undefined) {
      return false;
    }
    this.limiters.delete(subkey);
    await limiter.reset(subkey);
    this.logger.debug('Quota released', { poolId: this.poolId, subkey });
    return true;
  }

  /**
   * Admission for `subkey` under its allocation. A sub-key without an
   * allocation is never admitted.
   */
  async check(subkey: string, cost = 1): Promise<Decision> {
    const limiter = this.limiters.get(subkey);
    if (limiter === undefined) {
      return this.unallocated();
    }
    return limiter.check(subkey, cost);
  }

  async peek(subkey: string, cost = 1): Promise<Decision> {
    const limiter = this.limiters.get(subkey);
    if (limiter === undefined) {
      return this.unallocated();
    }
    return limiter.peek(subkey, cost);
  }

  allocation(subkey: string): number | undefined {
    return this.limiters.get(subkey)?.limit;
  }

  allocated(): number {
    let sum = 0;
    for (const limiter of this.limiters.values()) {
      sum += limiter.limit;
    }
    return sum;
  }

  available(): number {
    return this.totalQuota - this.allocated();
  }

  allocations(): Map<string, number> {
    return new Map([...this.limiters].map(([subkey, limiter]) => [subkey, limiter.limit]));
  }

  private unallocated(): Decision {
    const now = (this.options.getCurrentTime ?? Date.now)();
    return {
      allowed: false,
      limit: 0,
      remaining: 0,
      retryAfterMs: Number.POSITIVE_INFINITY,
      resetAt: new Date(now),
    };
  }
}
