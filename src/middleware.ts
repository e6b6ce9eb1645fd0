import type { NextFunction, Request, Response } from 'express';
import type { RateLimiterConfigInput } from './config.js';
import { MS_PER_SECOND } from './constants.js';
import { InvalidConfigurationError, describeError } from './errors.js';
import { createRateLimiter, type RateLimiterDependencies } from './factory.js';
import { RateLimiter } from './limiter.js';
import { defaultLogger, type LimiterLogger } from './logger.js';
import type {
  CostExtractor,
  Decision,
  KeyExtractor,
  LimitReachedHandler,
  RateLimitErrorResponse,
  RateLimitInfo,
  SkipFunction,
} from './types.js';

/**
 * Express middleware handler type.
 */
type ExpressMiddleware = (req: Request, res: Response, next: NextFunction) => void;

export interface RateLimitOptions {
  /** A limiter, or the configuration to build one from */
  limiter: RateLimiter | RateLimiterConfigInput;
  /** Used only when `limiter` is a configuration */
  dependencies?: RateLimiterDependencies;
  /**
   * Function to extract the rate limiting key from the request.
   * @default (req) => req.ip
   */
  keyExtractor?: KeyExtractor;
  /**
   * Units each request costs.
   * @default 1
   */
  cost?: number | CostExtractor;
  /** Handler called when the rate limit is exceeded. */
  onLimitReached?: LimitReachedHandler;
  /** Function to determine if a request should bypass rate limiting. */
  skip?: SkipFunction;
  /**
   * Whether to send standard rate limit headers.
   * @default true
   */
  headers?: boolean;
  /** @default 'Too Many Requests' */
  message?: string;
  /** @default 429 */
  statusCode?: number;
  /**
   * Status for denials produced by the fail-closed policy.
   * @default 503
   */
  failureStatusCode?: number;
  logger?: LimiterLogger;
}

const defaultKeyExtractor: KeyExtractor = (req) =>
  req.ip ?? req.socket.remoteAddress ?? 'unknown';

/**
 * Set rate limit headers on the response.
 */
function setRateLimitHeaders(res: Response, decision: Decision): void {
  res.setHeader('X-RateLimit-Limit', decision.limit);
  res.setHeader('X-RateLimit-Remaining', decision.remaining);
  res.setHeader('X-RateLimit-Reset', Math.floor(decision.resetAt.getTime() / MS_PER_SECOND));
}

function retryAfterSeconds(decision: Decision): number | null {
  return Number.isFinite(decision.retryAfterMs)
    ? Math.ceil(decision.retryAfterMs / MS_PER_SECOND)
    : null;
}

/**
 * Create a 429 error response body.
 */
function createErrorResponse(decision: Decision, message: string): RateLimitErrorResponse {
  return {
    error: message,
    retryAfter: retryAfterSeconds(decision),
    limit: decision.limit,
    resetAt: decision.resetAt.toISOString(),
  };
}

/**
 * Create a rate limiting middleware for Express.
 *
 * @example
 * app.use(rateLimit({ limiter: { limit: 100, window: '15m' } }));
 *
 * @example
 * // Shared limiter, keyed by API key, heavier cost for uploads
 * app.post('/upload', rateLimit({
 *   limiter,
 *   keyExtractor: (req) => req.get('x-api-key') ?? 'anonymous',
 *   cost: 5,
 * }));
 */
export function rateLimit(options: RateLimitOptions): ExpressMiddleware {
  const limiter =
    options.limiter instanceof RateLimiter
      ? options.limiter
      : createRateLimiter(options.limiter, options.dependencies);

  const fixedCost = typeof options.cost === 'number' ? options.cost : undefined;
  if (fixedCost !== undefined) {
    if (!Number.isInteger(fixedCost) || fixedCost <= 0) {
      throw new InvalidConfigurationError(`cost must be a positive integer, got: ${fixedCost}`);
    }
    if (fixedCost > limiter.limit) {
      throw new InvalidConfigurationError(
        `cost ${fixedCost} exceeds the limit of ${limiter.limit}; every request would be denied`
      );
    }
  }
  const costOf: CostExtractor =
    typeof options.cost === 'function' ? options.cost : (): number => fixedCost ?? 1;

  const keyExtractor = options.keyExtractor ?? defaultKeyExtractor;
  const shouldSendHeaders = options.headers !== false;
  const message = options.message ?? 'Too Many Requests';
  const statusCode = options.statusCode ?? 429;
  const failureStatusCode = options.failureStatusCode ?? 503;
  const logger = options.logger ?? defaultLogger();

  return (req: Request, res: Response, next: NextFunction): void => {
    if (options.skip !== undefined && options.skip(req)) {
      next();
      return;
    }

    const key = keyExtractor(req);

    limiter
      .check(key, costOf(req))
      .then(async (decision: Decision) => {
        const info: RateLimitInfo = { ...decision, key };
        res.locals.rateLimit = info;

        if (shouldSendHeaders) {
          setRateLimitHeaders(res, decision);
        }

        if (decision.allowed) {
          next();
          return;
        }

        const retryAfter = retryAfterSeconds(decision);
        if (shouldSendHeaders && retryAfter !== null) {
          res.setHeader('Retry-After', retryAfter);
        }

        if (options.onLimitReached) {
          try {
            await options.onLimitReached(req, res, info);
          } catch (error) {
            logger.error('onLimitReached handler failed', { key, error: describeError(error) });
          }
        }
        // The handler may have answered the request itself.
        if (res.headersSent) {
          return;
        }

        const status = decision.failure !== undefined ? failureStatusCode : statusCode;
        res.status(status).json(createErrorResponse(decision, message));
      })
      .catch((error: unknown) => {
        // Pass errors to Express error handler
        next(error);
      });
  };
}

/**
 * Default export for convenience.
 */
export default rateLimit;
