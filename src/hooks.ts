import { ALGORITHM_NAMES, type AlgorithmName } from './algorithms/types.js';
import { describeError, type RateLimitErrorCode } from './errors.js';
import type { LimiterLogger } from './logger.js';

/**
 * Emitted once per `check`, including one that rejects.
 */
export interface DecisionEvent {
  key: string;
  algorithm: AlgorithmName;
  allowed: boolean;
  remaining: number;
  limit: number;
  cost: number;
  /** Wall time spent producing the decision */
  latencyMs: number;
  timestamp: Date;
  /** Present when the failure policy produced the decision or raised */
  failure?: RateLimitErrorCode;
  /** Set when `check` rejected instead of deciding */
  error?: string;
}

/**
 * Observer of decisions. Errors it throws or rejects with are logged and
 * never change the decision.
 */
export type DecisionHook = (event: DecisionEvent) => void | Promise<void>;

export class HookRegistry {
  private readonly hooks: DecisionHook[] = [];
  private readonly logger: LimiterLogger;
  private failureCount = 0;

  constructor(logger: LimiterLogger, hooks: DecisionHook[] = []) {
    this.logger = logger;
    this.hooks.push(...hooks);
  }

  add(hook: DecisionHook): void {
    this.hooks.push(hook);
  }

  remove(hook: DecisionHook): boolean {
    const index = this.hooks.indexOf(hook);
    if (index === -1) {
      return false;
    }
    this.hooks.splice(index, 1);
    return true;
  }

  clear(): void {
    this.hooks.length = 0;
  }

  get size(): number {
    return this.hooks.length;
  }

  /** Hook invocations that threw or rejected. */
  get failures(): number {
    return this.failureCount;
  }

  emit(event: DecisionEvent): void {
    for (const hook of [...this.hooks]) {
      try {
        const result = hook(event);
        if (result instanceof Promise) {
          void result.catch((error: unknown) => {
            this.report(error, event);
          });
        }
      } catch (error) {
        this.report(error, event);
      }
    }
  }

  private report(error: unknown, event: DecisionEvent): void {
    this.failureCount++;
    this.logger.error('Decision hook failed', {
      key: event.key,
      algorithm: event.algorithm,
      error: describeError(error),
    });
  }
}

interface AlgorithmCounts {
  allowed: number;
  denied: number;
}

export interface MetricsSnapshot {
  total: number;
  allowed: number;
  denied: number;
  /** Decisions produced by the failure policy, and rejected checks */
  failures: number;
  /** Share of allowed decisions, 0 when nothing was recorded */
  allowRate: number;
  latency: { count: number; meanMs: number; maxMs: number };
  byAlgorithm: Partial<Record<AlgorithmName, AlgorithmCounts>>;
}

/**
 * In-process aggregation of decision events.
 *
 * @example
 * const metrics = new MetricsCollector();
 * limiter.addHook(metrics.hook);
 */
export class MetricsCollector {
  private allowed = 0;
  private denied = 0;
  private failures = 0;
  private latencyTotal = 0;
  private latencyMax = 0;
  private byAlgorithm: Partial<Record<AlgorithmName, AlgorithmCounts>> = {};

  readonly hook: DecisionHook = (event: DecisionEvent): void => {
    this.record(event);
  };

  record(event: DecisionEvent): void {
    if (event.allowed) {
      this.allowed++;
    } else {
      this.denied++;
    }
    if (event.failure !== undefined || event.error !== undefined) {
      this.failures++;
    }
    this.latencyTotal += event.latencyMs;
    this.latencyMax = Math.max(this.latencyMax, event.latencyMs);

    const counts = this.byAlgorithm[event.algorithm] ?? { allowed: 0, denied: 0 };
    if (event.allowed) {
      counts.allowed++;
    } else {
      counts.denied++;
    }
    this.byAlgorithm[event.algorithm] = counts;
  }

  snapshot(): MetricsSnapshot {
    const total = this.allowed + this.denied;
    const byAlgorithm: Partial<Record<AlgorithmName, AlgorithmCounts>> = {};
    for (const name of ALGORITHM_NAMES) {
      const counts = this.byAlgorithm[name];
      if (counts !== undefined) {
        byAlgorithm[name] = { ...counts };
      }
    }
    return {
      total,
      allowed: this.allowed,
      denied: this.denied,
      failures: this.failures,
      allowRate: total === 0 ? 0 : this.allowed / total,
      latency: {
        count: total,
        meanMs: total === 0 ? 0 : this.latencyTotal / total,
        maxMs: this.latencyMax,
      },
      byAlgorithm,
    };
  }

  reset(): void {
    this.allowed = 0;
    this.denied = 0;
    this.failures = 0;
    this.latencyTotal = 0;
    this.latencyMax = 0;
    this.byAlgorithm = {};
  }
}

/**
 * Hook writing one log line per decision: denials at info, admissions at debug.
 */
export function createLoggingHook(logger: LimiterLogger): DecisionHook {
  return (event: DecisionEvent): void => {
    const attributes = {
      key: event.key,
      algorithm: event.algorithm,
      remaining: event.remaining,
      limit: event.limit,
      cost: event.cost,
      latencyMs: event.latencyMs,
      ...(event.failure !== undefined ? { failure: event.failure } : {}),
      ...(event.error !== undefined ? { error: event.error } : {}),
    };
    if (event.allowed) {
      logger.debug('Request allowed', attributes);
    } else {
      logger.info('Request denied', attributes);
    }
  };
}
