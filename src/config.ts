import { z } from 'zod';
import { ALGORITHM_NAMES } from './algorithms/types.js';
import {
  DEFAULT_FAILURE_RETRY_AFTER_MS,
  DEFAULT_MAX_RETRIES,
  DEFAULT_RETRY_TIMEOUT_MS,
} from './constants.js';
import { InvalidConfigurationError, describeError } from './errors.js';
import { parseWindow } from './utils/parse-window.js';

/**
 * Milliseconds, or a string understood by parseWindow.
 */
const WindowSchema = z
  .union([z.number().finite().positive(), z.string()])
  .transform((value, ctx) => {
    if (typeof value === 'number') {
      return value;
    }
    try {
      return parseWindow(value);
    } catch (error) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: describeError(error) });
      return z.NEVER;
    }
  });

const MemoryBackendConfigSchema = z.object({
  type: z.literal('memory'),
  cleanupIntervalMs: z.number().int().nonnegative().optional(),
});

const RedisBackendConfigSchema = z.object({
  type: z.literal('redis'),
  url: z.string().min(1).optional(),
  prefix: z.string().optional(),
});

const RegionConfigSchema = z.object({
  name: z.string().min(1),
  backend: z.discriminatedUnion('type', [MemoryBackendConfigSchema, RedisBackendConfigSchema]),
});

const MultiRegionBackendConfigSchema = z.object({
  type: z.literal('multi-region'),
  regions: z.array(RegionConfigSchema).min(1),
});

export const BackendConfigSchema = z.discriminatedUnion('type', [
  MemoryBackendConfigSchema,
  RedisBackendConfigSchema,
  MultiRegionBackendConfigSchema,
]);

export const RateLimiterConfigSchema = z
  .object({
    algorithm: z.enum(ALGORITHM_NAMES).default('token-bucket'),
    limit: z.number().int().positive(),
    window: WindowSchema,
    backend: BackendConfigSchema.default({ type: 'memory' }),
    failureMode: z.enum(['closed', 'open', 'raise']).default('closed'),
    maxRetries: z.number().int().nonnegative().default(DEFAULT_MAX_RETRIES),
    retryTimeoutMs: z.number().positive().default(DEFAULT_RETRY_TIMEOUT_MS),
    failureRetryAfterMs: z.number().min(1).default(DEFAULT_FAILURE_RETRY_AFTER_MS),
    keyPrefix: z.string().default(''),
    logLevel: z.enum(['DEBUG', 'INFO', 'WARN', 'ERROR', 'SILENT']).optional(),
  })
  .strict();

export type BackendConfig = z.infer<typeof BackendConfigSchema>;
export type RegionBackendConfig = z.infer<typeof RegionConfigSchema>['backend'];
/** Configuration as written by a caller (defaults optional, window as string or ms) */
export type RateLimiterConfigInput = z.input<typeof RateLimiterConfigSchema>;
/** Configuration after validation */
export type RateLimiterConfig = z.output<typeof RateLimiterConfigSchema>;

/**
 * Validate a configuration object.
 * @throws InvalidConfigurationError listing every problem found
 */
export function parseConfig(input: unknown): RateLimiterConfig {
  const result = RateLimiterConfigSchema.safeParse(input);
  if (!result.success) {
    const problems = result.error.issues.map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join('.') : 'config';
      return `${path}: ${issue.message}`;
    });
    throw new InvalidConfigurationError(`Invalid rate limiter configuration: ${problems.join('; ')}`);
  }
  return result.data;
}

function readEnv(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name]?.trim();
  return value === undefined || value === '' ? undefined : value;
}

function parseOptionalNumber(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const value = readEnv(env, name);
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number(value);
  if (Number.isNaN(parsed)) {
    throw new InvalidConfigurationError(`${name} must be a number, got: "${value}"`);
  }
  return parsed;
}

/**
 * Build a configuration from environment variables:
 * `<prefix>ALGORITHM`, `LIMIT`, `WINDOW`, `BACKEND`, `BACKEND_URL`,
 * `BACKEND_PREFIX`, `FAILURE_MODE`, `MAX_RETRIES`, `RETRY_TIMEOUT_MS`,
 * `KEY_PREFIX`, `LOG_LEVEL`.
 *
 * A purely numeric WINDOW is taken as milliseconds.
 */
export function loadConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  prefix = 'RATELIMIT_'
): RateLimiterConfig {
  const name = (suffix: string): string => `${prefix}${suffix}`;

  const rawWindow = readEnv(env, name('WINDOW'));
  const window =
    rawWindow !== undefined && /^\d+(\.\d+)?$/.test(rawWindow) ? Number(rawWindow) : rawWindow;

  const backendType = readEnv(env, name('BACKEND')) ?? 'memory';
  const backend =
    backendType === 'redis'
      ? {
          type: backendType,
          url: readEnv(env, name('BACKEND_URL')),
          prefix: readEnv(env, name('BACKEND_PREFIX')),
        }
      : { type: backendType };

  return parseConfig({
    algorithm: readEnv(env, name('ALGORITHM')),
    limit: parseOptionalNumber(env, name('LIMIT')),
    window,
    backend,
    failureMode: readEnv(env, name('FAILURE_MODE')),
    maxRetries: parseOptionalNumber(env, name('MAX_RETRIES')),
    retryTimeoutMs: parseOptionalNumber(env, name('RETRY_TIMEOUT_MS')),
    keyPrefix: readEnv(env, name('KEY_PREFIX')),
    logLevel: readEnv(env, name('LOG_LEVEL'))?.toUpperCase(),
  });
}
