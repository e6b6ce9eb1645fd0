/** Buffer multiplier applied to TTL to avoid expiration edge cases. */
export const TTL_BUFFER_MULTIPLIER = 1.1;

/** State must outlive two windows so the sliding window still sees its previous count. */
export const STATE_TTL_WINDOWS = 2;

/** Milliseconds per second. */
export const MS_PER_SECOND = 1000;

/** Tolerance for fractional capacity comparisons. */
export const CAPACITY_EPSILON = 1e-6;

export const DEFAULT_MAX_RETRIES = 3;

export const DEFAULT_RETRY_TIMEOUT_MS = 1000;

/** Retry-after reported by a fail-closed denial. */
export const DEFAULT_FAILURE_RETRY_AFTER_MS = 1000;

export const DEFAULT_CLEANUP_INTERVAL_MS = 60_000;

export const DEFAULT_REDIS_PREFIX = 'rw:';

export const SERVICE_NAME = 'ratewarden';
