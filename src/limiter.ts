import { performance } from 'node:perf_hooks';
import { createAlgorithm } from './algorithms/factory.js';
import type { AlgorithmName, LimiterState, RateLimitAlgorithm } from './algorithms/types.js';
import type { Backend, Snapshot } from './backends/types.js';
import { systemClock, type Clock } from './clock.js';
import {
  DEFAULT_FAILURE_RETRY_AFTER_MS,
  DEFAULT_MAX_RETRIES,
  DEFAULT_RETRY_TIMEOUT_MS,
} from './constants.js';
import {
  BackendUnavailableError,
  ConflictExhaustedError,
  InvalidConfigurationError,
  RateLimitError,
  describeError,
} from './errors.js';
import { HookRegistry, type DecisionEvent, type DecisionHook } from './hooks.js';
import { defaultLogger, type LimiterLogger } from './logger.js';
import type { CheckOptions, Decision, FailureMode, Quota } from './types.js';

export interface RateLimiterOptions {
  /** Algorithm instance, or the name of a built-in one */
  algorithm: AlgorithmName | RateLimitAlgorithm;
  backend: Backend;
  /** Maximum units per window */
  limit: number;
  /** Window size in milliseconds */
  windowMs: number;
  /** @default 'closed' */
  failureMode?: FailureMode;
  /** Extra attempts after a lost compare-and-set or a backend error (default: 3) */
  maxRetries?: number;
  /** Wall-time budget for those attempts (default: 1000) */
  retryTimeoutMs?: number;
  /** Retry-after reported by a fail-closed denial (default: 1000) */
  failureRetryAfterMs?: number;
  /** Prepended to every key before it reaches the backend */
  keyPrefix?: string;
  /** Optional function to get current timestamp (for testing) */
  getCurrentTime?: Clock;
  logger?: LimiterLogger;
  hooks?: DecisionHook[];
}

const FAILURE_MODES: readonly FailureMode[] = ['closed', 'open', 'raise'];

/**
 * Throw InvalidConfigurationError unless `quota` is usable.
 */
export function assertValidQuota(quota: Quota): void {
  if (!Number.isInteger(quota.limit) || quota.limit <= 0) {
    throw new InvalidConfigurationError(`limit must be a positive integer, got: ${quota.limit}`);
  }
  if (!Number.isFinite(quota.windowMs) || quota.windowMs <= 0) {
    throw new InvalidConfigurationError(
      `windowMs must be a positive finite number, got: ${quota.windowMs}`
    );
  }
}

function assertValidCost(cost: number): void {
  if (!Number.isInteger(cost) || cost <= 0) {
    throw new RangeError(`cost must be a positive integer, got: ${cost}`);
  }
}

function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted === true) {
    const reason: unknown = signal.reason;
    throw reason instanceof Error ? reason : new Error('Rate limit check aborted');
  }
}

/**
 * Admission control for one quota over one backend.
 *
 * Each check loads the key's state, evaluates the algorithm, and writes the
 * result back with a compare-and-set on the version it read. A lost race
 * reloads and re-evaluates; the number of attempts and the time they may
 * take are bounded.
 */
export class RateLimiter {
  private readonly algorithm: RateLimitAlgorithm;
  private readonly backend: Backend;
  private readonly failureMode: FailureMode;
  private readonly maxRetries: number;
  private readonly retryTimeoutMs: number;
  private readonly failureRetryAfterMs: number;
  private readonly keyPrefix: string;
  private readonly clock: Clock;
  private readonly logger: LimiterLogger;
  private readonly hooks: HookRegistry;
  private quota: Quota;

  constructor(options: RateLimiterOptions) {
    this.quota = { limit: options.limit, windowMs: options.windowMs };
    assertValidQuota(this.quota);

    this.failureMode = options.failureMode ?? 'closed';
    if (!FAILURE_MODES.includes(this.failureMode)) {
      throw new InvalidConfigurationError(`Unknown failure mode: "${this.failureMode}"`);
    }
    this.maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
    if (!Number.isInteger(this.maxRetries) || this.maxRetries < 0) {
      throw new InvalidConfigurationError(
        `maxRetries must be a non-negative integer, got: ${this.maxRetries}`
      );
    }
    this.retryTimeoutMs = options.retryTimeoutMs ?? DEFAULT_RETRY_TIMEOUT_MS;
    if (!(this.retryTimeoutMs > 0)) {
      throw new InvalidConfigurationError(
        `retryTimeoutMs must be positive, got: ${this.retryTimeoutMs}`
      );
    }
    this.failureRetryAfterMs = options.failureRetryAfterMs ?? DEFAULT_FAILURE_RETRY_AFTER_MS;
    if (!Number.isFinite(this.failureRetryAfterMs) || this.failureRetryAfterMs < 1) {
      throw new InvalidConfigurationError(
        `failureRetryAfterMs must be at least 1, got: ${this.failureRetryAfterMs}`
      );
    }

    this.algorithm =
      typeof options.algorithm === 'string' ? createAlgorithm(options.algorithm) : options.algorithm;
    this.backend = options.backend;
    this.keyPrefix = options.keyPrefix ?? '';
    this.clock = options.getCurrentTime ?? systemClock;
    this.logger = options.logger ?? defaultLogger();
    this.hooks = new HookRegistry(this.logger, options.hooks);
  }

  get algorithmName(): AlgorithmName {
    return this.algorithm.name;
  }

  get limit(): number {
    return this.quota.limit;
  }

  get windowMs(): number {
    return this.quota.windowMs;
  }

  /**
   * Decide a request of `cost` units for `key` and record it when admitted.
   */
  async check(key: string, cost = 1, options: CheckOptions = {}): Promise<Decision> {
    assertValidCost(cost);
    const started = performance.now();

    let decision: Decision;
    try {
      try {
        decision = await this.consume(key, cost, options.signal);
      } catch (error) {
        decision = this.applyFailurePolicy(key, error, options.signal);
      }
    } catch (error) {
      this.hooks.emit({
        ...this.eventBase(key, cost, started),
        allowed: false,
        remaining: 0,
        limit: this.quota.limit,
        ...(error instanceof RateLimitError ? { failure: error.code } : {}),
        error: describeError(error),
      });
      throw error;
    }

    this.hooks.emit({
      ...this.eventBase(key, cost, started),
      allowed: decision.allowed,
      remaining: decision.remaining,
      limit: decision.limit,
      ...(decision.failure !== undefined ? { failure: decision.failure.code } : {}),
    });
    return decision;
  }

  /**
   * Current view of `key` without recording anything. `allowed` tells whether
   * `cost` units would be admitted now.
   */
  async peek(key: string, cost = 1): Promise<Decision> {
    assertValidCost(cost);
    try {
      const snapshot = await this.backend.load(this.storageKey(key));
      return this.algorithm.inspect(this.ownState(snapshot), this.clock(), cost, this.quota);
    } catch (error) {
      return this.applyFailurePolicy(key, error, undefined);
    }
  }

  /**
   * Forget everything recorded for `key`.
   */
  async reset(key: string): Promise<void> {
    await this.backend.delete(this.storageKey(key));
  }

  /**
   * Change the quota for subsequent decisions. Existing state is kept and
   * reinterpreted under the new quota.
   */
  reconfigure(update: Partial<Quota>): void {
    const next: Quota = {
      limit: update.limit ?? this.quota.limit,
      windowMs: update.windowMs ?? this.quota.windowMs,
    };
    assertValidQuota(next);
    this.quota = next;
  }

  addHook(hook: DecisionHook): void {
    this.hooks.add(hook);
  }

  removeHook(hook: DecisionHook): boolean {
    return this.hooks.remove(hook);
  }

  async destroy(): Promise<void> {
    this.hooks.clear();
    await this.backend.destroy();
  }

  private eventBase(
    key: string,
    cost: number,
    started: number
  ): Pick<DecisionEvent, 'key' | 'algorithm' | 'cost' | 'latencyMs' | 'timestamp'> {
    return {
      key,
      algorithm: this.algorithm.name,
      cost,
      latencyMs: performance.now() - started,
      timestamp: new Date(this.clock()),
    };
  }

  private storageKey(key: string): string {
    return `${this.keyPrefix}${key}`;
  }

  /** State written by another algorithm under the same key reads as absent. */
  private ownState(snapshot: Snapshot): LimiterState | null {
    return snapshot.state !== null && this.algorithm.owns(snapshot.state) ? snapshot.state : null;
  }

  private async consume(key: string, cost: number, signal: AbortSignal | undefined): Promise<Decision> {
    const storageKey = this.storageKey(key);
    const deadline = performance.now() + this.retryTimeoutMs;
    let attempts = 0;
    let backendError: unknown = null;

    while (attempts <= this.maxRetries) {
      attempts++;
      throwIfAborted(signal);
      try {
        const snapshot = await this.backend.load(storageKey);
        const evaluation = this.algorithm.evaluate(
          this.ownState(snapshot),
          this.clock(),
          cost,
          this.quota
        );
        if (evaluation.state === null) {
          return evaluation.decision;
        }

        throwIfAborted(signal);
        const result = await this.backend.commit(
          storageKey,
          evaluation.state,
          snapshot.version,
          this.algorithm.ttlMs(this.quota)
        );
        if (result === 'committed') {
          return evaluation.decision;
        }
        backendError = null;
      } catch (error) {
        if (signal?.aborted === true || !isRetryable(error)) {
          throw error;
        }
        backendError = error;
      }

      if (performance.now() >= deadline) {
        break;
      }
    }

    if (backendError !== null) {
      throw this.toUnavailable(backendError);
    }
    throw new ConflictExhaustedError(key, attempts);
  }

  private toUnavailable(error: unknown): BackendUnavailableError {
    return error instanceof BackendUnavailableError
      ? error
      : new BackendUnavailableError(this.backend.name, describeError(error), { cause: error });
  }

  /**
   * Map a backend failure to a decision, or rethrow it.
   */
  private applyFailurePolicy(key: string, error: unknown, signal: AbortSignal | undefined): Decision {
    const policyHandles = error instanceof ConflictExhaustedError || isRetryable(error);
    if (signal?.aborted === true || !policyHandles) {
      throw error;
    }
    const failure = error instanceof ConflictExhaustedError ? error : this.toUnavailable(error);
    if (this.failureMode === 'raise') {
      throw failure;
    }

    const now = this.clock();
    const allowed = this.failureMode === 'open';
    this.logger.warn(allowed ? 'Failing open' : 'Failing closed', {
      key,
      algorithm: this.algorithm.name,
      backend: this.backend.name,
      error: describeError(failure),
    });
    return {
      allowed,
      limit: this.quota.limit,
      remaining: 0,
      retryAfterMs: allowed ? 0 : this.failureRetryAfterMs,
      resetAt: new Date(allowed ? now : now + this.failureRetryAfterMs),
      failure,
    };
  }
}

/**
 * Backend trouble is retried; configuration and programming errors are not.
 */
function isRetryable(error: unknown): boolean {
  if (error instanceof BackendUnavailableError) {
    return true;
  }
  if (error instanceof RateLimitError || error instanceof RangeError || error instanceof TypeError) {
    return false;
  }
  return true;
}
