import { systemClock, type Clock } from '../clock.js';
import { InvalidConfigurationError } from '../errors.js';
import type { RateLimiter } from '../limiter.js';
import { defaultLogger, type LimiterLogger } from '../logger.js';
import type { CheckOptions, Decision } from '../types.js';

export interface AdaptiveLimiterOptions {
  limiter: RateLimiter;
  minLimit: number;
  maxLimit: number;
  /** Largest change of the limit in one evaluation */
  maxStep: number;
  /** Time between evaluations in ms */
  evaluationIntervalMs: number;
  /** Error rate above which the limit goes down (default: 0.1) */
  errorThreshold?: number;
  /** Target multiplier when going down (default: 0.5) */
  decreaseFactor?: number;
  /** Target multiplier when going up (default: 1.1) */
  increaseFactor?: number;
  /** Outcomes needed before an evaluation may change anything (default: 10) */
  minSamples?: number;
  /**
   * Average latency in ms above which the limit goes down. Latencies are
   * ignored when unset.
   */
  latencyThresholdMs?: number;
  getCurrentTime?: Clock;
  logger?: LimiterLogger;
}

export interface Adaptation {
  previousLimit: number;
  limit: number;
  errorRate: number;
  samples: number;
  /** Present when enough latencies were recorded to count */
  averageLatencyMs?: number;
}

export interface AdaptiveMetrics {
  currentLimit: number;
  successes: number;
  errors: number;
  adaptations: number;
  lastEvaluatedAt: number;
}

/**
 * Moves a limiter's limit with the error rate and latency its callers
 * observe. Outcomes are collected between evaluations; an evaluation runs at
 * most once per `evaluationIntervalMs` and never moves the limit by more than
 * `maxStep`.
 *
 * Either signal above its threshold lowers the limit. Otherwise either signal
 * below half its threshold raises it.
 */
export class AdaptiveLimiter {
  private readonly limiter: RateLimiter;
  private readonly minLimit: number;
  private readonly maxLimit: number;
  private readonly maxStep: number;
  private readonly evaluationIntervalMs: number;
  private readonly errorThreshold: number;
  private readonly decreaseFactor: number;
  private readonly increaseFactor: number;
  private readonly minSamples: number;
  private readonly latencyThresholdMs: number | undefined;
  private readonly clock: Clock;
  private readonly logger: LimiterLogger;

  private successes = 0;
  private errors = 0;
  private latencyTotal = 0;
  private latencyCount = 0;
  private adaptations = 0;
  private lastEvaluatedAt: number;

  constructor(options: AdaptiveLimiterOptions) {
    this.limiter = options.limiter;
    this.minLimit = options.minLimit;
    this.maxLimit = options.maxLimit;
    this.maxStep = options.maxStep;
    this.evaluationIntervalMs = options.evaluationIntervalMs;
    this.errorThreshold = options.errorThreshold ?? 0.1;
    this.decreaseFactor = options.decreaseFactor ?? 0.5;
    this.increaseFactor = options.increaseFactor ?? 1.1;
    this.minSamples = options.minSamples ?? 10;
    this.latencyThresholdMs = options.latencyThresholdMs;
    this.clock = options.getCurrentTime ?? systemClock;
    this.logger = options.logger ?? defaultLogger();
    this.validate();
    this.lastEvaluatedAt = this.clock();
  }

  private validate(): void {
    if (!Number.isInteger(this.minLimit) || this.minLimit < 1) {
      throw new InvalidConfigurationError(`minLimit must be a positive integer, got: ${this.minLimit}`);
    }
    if (!Number.isInteger(this.maxLimit) || this.maxLimit < this.minLimit) {
      throw new InvalidConfigurationError(
        `maxLimit must be an integer >= minLimit, got: ${this.maxLimit}`
      );
    }
    const limit = this.limiter.limit;
    if (limit < this.minLimit || limit > this.maxLimit) {
      throw new InvalidConfigurationError(
        `Initial limit ${limit} is outside [${this.minLimit}, ${this.maxLimit}]`
      );
    }
    if (!Number.isInteger(this.maxStep) || this.maxStep < 1) {
      throw new InvalidConfigurationError(`maxStep must be a positive integer, got: ${this.maxStep}`);
    }
    if (!(this.evaluationIntervalMs > 0)) {
      throw new InvalidConfigurationError(
        `evaluationIntervalMs must be positive, got: ${this.evaluationIntervalMs}`
      );
    }
    if (!(this.errorThreshold > 0 && this.errorThreshold < 1)) {
      throw new InvalidConfigurationError(
        `errorThreshold must be between 0 and 1, got: ${this.errorThreshold}`
      );
    }
    if (!(this.decreaseFactor > 0 && this.decreaseFactor < 1)) {
      throw new InvalidConfigurationError(
        `decreaseFactor must be between 0 and 1, got: ${this.decreaseFactor}`
      );
    }
    if (!(this.increaseFactor > 1)) {
      throw new InvalidConfigurationError(
        `increaseFactor must be greater than 1, got: ${this.increaseFactor}`
      );
    }
    if (this.latencyThresholdMs !== undefined && !(this.latencyThresholdMs > 0)) {
      throw new InvalidConfigurationError(
        `latencyThresholdMs must be positive, got: ${this.latencyThresholdMs}`
      );
    }
  }

  get currentLimit(): number {
    return this.limiter.limit;
  }

  async check(key: string, cost = 1, options?: CheckOptions): Promise<Decision> {
    if (this.clock() - this.lastEvaluatedAt >= this.evaluationIntervalMs) {
      this.evaluate();
    }
    return this.limiter.check(key, cost, options);
  }

  peek(key: string, cost = 1): Promise<Decision> {
    return this.limiter.peek(key, cost);
  }

  reset(key: string): Promise<void> {
    return this.limiter.reset(key);
  }

  recordSuccess(latencyMs?: number): void {
    this.successes++;
    this.recordLatency(latencyMs);
  }

  recordError(latencyMs?: number): void {
    this.errors++;
    this.recordLatency(latencyMs);
  }

  recordOutcome(success: boolean, latencyMs?: number): void {
    if (success) {
      this.recordSuccess(latencyMs);
    } else {
      this.recordError(latencyMs);
    }
  }

  private recordLatency(latencyMs: number | undefined): void {
    if (latencyMs !== undefined && Number.isFinite(latencyMs) && latencyMs >= 0) {
      this.latencyTotal += latencyMs;
      this.latencyCount++;
    }
  }

  /**
   * Evaluate now. Returns null when too few outcomes were recorded since the
   * previous evaluation; those outcomes are kept for the next one.
   */
  evaluate(): Adaptation | null {
    this.lastEvaluatedAt = this.clock();
    const samples = this.successes + this.errors;
    if (samples < this.minSamples) {
      return null;
    }

    const errorRate = this.errors / samples;
    const averageLatencyMs = this.averageLatency();
    const latencyHigh =
      averageLatencyMs !== undefined &&
      this.latencyThresholdMs !== undefined &&
      averageLatencyMs > this.latencyThresholdMs;
    const latencyLow =
      averageLatencyMs !== undefined &&
      this.latencyThresholdMs !== undefined &&
      averageLatencyMs < this.latencyThresholdMs / 2;

    const previousLimit = this.limiter.limit;
    let limit = previousLimit;

    if (errorRate > this.errorThreshold || latencyHigh) {
      const target = Math.max(this.minLimit, Math.floor(previousLimit * this.decreaseFactor));
      limit = previousLimit - Math.min(this.maxStep, previousLimit - target);
    } else if (errorRate < this.errorThreshold / 2 || latencyLow) {
      const grown = Math.max(previousLimit + 1, Math.floor(previousLimit * this.increaseFactor));
      const target = Math.min(this.maxLimit, grown);
      limit = previousLimit + Math.min(this.maxStep, target - previousLimit);
    }

    this.successes = 0;
    this.errors = 0;
    this.latencyTotal = 0;
    this.latencyCount = 0;

    const adaptation: Adaptation = {
      previousLimit,
      limit,
      errorRate,
      samples,
      ...(averageLatencyMs !== undefined ? { averageLatencyMs } : {}),
    };
    if (limit !== previousLimit) {
      this.limiter.reconfigure({ limit });
      this.adaptations++;
      this.logger.info('Adjusted rate limit', { ...adaptation });
    }
    return adaptation;
  }

  /** Mean of the recorded latencies, once there are `minSamples` of them and a threshold to compare with. */
  private averageLatency(): number | undefined {
    if (this.latencyThresholdMs === undefined || this.latencyCount < this.minSamples) {
      return undefined;
    }
    return this.latencyTotal / this.latencyCount;
  }

  metrics(): AdaptiveMetrics {
    return {
      currentLimit: this.limiter.limit,
      successes: this.successes,
      errors: this.errors,
      adaptations: this.adaptations,
      lastEvaluatedAt: this.lastEvaluatedAt,
    };
  }
}
