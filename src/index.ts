/**
 * ratewarden - rate limiting admission control
 *
 * Six algorithms (token bucket, leaky bucket, fixed window, sliding window,
 * sliding window log, GCRA) over compare-and-set backends (memory, Redis,
 * multi-region), with priority, quota pool, adaptive and hierarchical layers
 * and an Express adapter.
 */

// Core
export { RateLimiter, assertValidQuota, type RateLimiterOptions } from './limiter.js';
export type {
  CheckOptions,
  CostExtractor,
  Decision,
  FailureMode,
  KeyExtractor,
  LimitReachedHandler,
  Quota,
  RateLimitErrorResponse,
  RateLimitInfo,
  SkipFunction,
} from './types.js';
export { ManualClock, systemClock, type Clock } from './clock.js';

// Algorithms
export * from './algorithms/index.js';

// Backends
export * from './backends/index.js';

// Advanced layers
export * from './advanced/index.js';

// Observability
export {
  HookRegistry,
  MetricsCollector,
  createLoggingHook,
  type DecisionEvent,
  type DecisionHook,
  type MetricsSnapshot,
} from './hooks.js';
export { createLogger, defaultLogger, type LimiterLogger, type LogLevelName } from './logger.js';

// Errors
export {
  BackendUnavailableError,
  CapacityExceededError,
  ConflictExhaustedError,
  InvalidConfigurationError,
  RateLimitError,
  type RateLimitErrorCode,
} from './errors.js';

// Configuration
export {
  BackendConfigSchema,
  RateLimiterConfigSchema,
  loadConfigFromEnv,
  parseConfig,
  type BackendConfig,
  type RateLimiterConfig,
  type RateLimiterConfigInput,
} from './config.js';
export { createBackend, createRateLimiter, type RateLimiterDependencies } from './factory.js';

// Express
export { rateLimit, type RateLimitOptions } from './middleware.js';

// Utilities
export { parseWindow, formatDuration } from './utils/index.js';
