import type { Redis } from 'ioredis';
import { MemoryBackend } from './backends/memory.js';
import { MultiRegionBackend } from './backends/multi-region.js';
import { RedisBackend } from './backends/redis.js';
import type { Backend } from './backends/types.js';
import type { Clock } from './clock.js';
import { parseConfig, type BackendConfig, type RateLimiterConfigInput } from './config.js';
import type { DecisionHook } from './hooks.js';
import { RateLimiter } from './limiter.js';
import { createLogger, defaultLogger, type LimiterLogger } from './logger.js';
import { formatDuration } from './utils/parse-window.js';

/**
 * Runtime objects a configuration cannot carry.
 */
export interface RateLimiterDependencies {
  /** Client for a top-level redis backend; takes precedence over its url */
  redisClient?: Redis;
  /** Clients for redis regions of a multi-region backend, by region name */
  regionRedisClients?: Record<string, Redis>;
  getCurrentTime?: Clock;
  logger?: LimiterLogger;
  hooks?: DecisionHook[];
}

/**
 * Create the backend described by a validated backend configuration.
 */
export function createBackend(
  config: BackendConfig,
  dependencies: RateLimiterDependencies = {},
  logger: LimiterLogger = defaultLogger()
): Backend {
  switch (config.type) {
    case 'memory':
      return new MemoryBackend({
        cleanupIntervalMs: config.cleanupIntervalMs,
        getCurrentTime: dependencies.getCurrentTime,
        logger,
      });
    case 'redis':
      return new RedisBackend({
        client: dependencies.redisClient,
        url: config.url,
        prefix: config.prefix,
        logger,
      });
    case 'multi-region':
      return new MultiRegionBackend({
        regions: config.regions.map((region) => ({
          name: region.name,
          backend: createBackend(
            region.backend,
            {
              ...dependencies,
              redisClient: dependencies.regionRedisClients?.[region.name],
            },
            logger
          ),
        })),
        logger,
      });
  }
}

/**
 * Validate `input` and build a limiter from it.
 *
 * @example
 * const limiter = createRateLimiter({ algorithm: 'gcra', limit: 100, window: '1m' });
 * const decision = await limiter.check('user:42');
 */
export function createRateLimiter(
  input: RateLimiterConfigInput,
  dependencies: RateLimiterDependencies = {}
): RateLimiter {
  const config = parseConfig(input);
  const logger =
    dependencies.logger ??
    (config.logLevel !== undefined ? createLogger({ logLevel: config.logLevel }) : defaultLogger());

  const limiter = new RateLimiter({
    algorithm: config.algorithm,
    backend: createBackend(config.backend, dependencies, logger),
    limit: config.limit,
    windowMs: config.window,
    failureMode: config.failureMode,
    maxRetries: config.maxRetries,
    retryTimeoutMs: config.retryTimeoutMs,
    failureRetryAfterMs: config.failureRetryAfterMs,
    keyPrefix: config.keyPrefix,
    getCurrentTime: dependencies.getCurrentTime,
    logger,
    hooks: dependencies.hooks,
  });

  logger.debug('Created rate limiter', {
    algorithm: config.algorithm,
    limit: config.limit,
    window: formatDuration(config.window),
    backend: config.backend.type,
  });
  return limiter;
}
