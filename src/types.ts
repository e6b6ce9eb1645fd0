import type { Request, Response } from 'express';
import type { RateLimitError } from './errors.js';

/**
 * Limit units admitted per window.
 */
export interface Quota {
  /** Maximum units per window (positive integer) */
  limit: number;
  /** Window length in milliseconds */
  windowMs: number;
}

/**
 * Outcome of a check or peek.
 */
export interface Decision {
  /** Whether the request is admitted */
  allowed: boolean;
  /** Configured limit at decision time */
  limit: number;
  /** Whole units still available, always within [0, limit] */
  remaining: number;
  /** Zero when allowed; Infinity when the cost can never be admitted */
  retryAfterMs: number;
  /** When the key's state is back to its initial, unused form */
  resetAt: Date;
  /** Set when the decision came from the failure policy rather than the algorithm */
  failure?: RateLimitError;
}

/**
 * What happens when the backend cannot produce a decision.
 * - closed: deny
 * - open: allow
 * - raise: throw the typed error
 */
export type FailureMode = 'closed' | 'open' | 'raise';

export interface CheckOptions {
  /** Abandons the check before its next backend call */
  signal?: AbortSignal;
}

/**
 * Decision plus the key it was made for, stored in `res.locals.rateLimit`.
 */
export interface RateLimitInfo extends Decision {
  key: string;
}

/**
 * Function to extract a unique key from the request for rate limiting.
 */
export type KeyExtractor = (req: Request) => string;

/**
 * Units a request costs.
 */
export type CostExtractor = (req: Request) => number;

/**
 * Handler called when rate limit is exceeded.
 */
export type LimitReachedHandler = (
  req: Request,
  res: Response,
  info: RateLimitInfo
) => void | Promise<void>;

/**
 * Function to determine if a request should skip rate limiting.
 */
export type SkipFunction = (req: Request) => boolean;

/**
 * Standard 429 response body.
 */
export interface RateLimitErrorResponse {
  error: string;
  /** Seconds; null when the request can never be admitted */
  retryAfter: number | null;
  limit: number;
  resetAt: string;
}
