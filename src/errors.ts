/**
 * Stable machine-readable codes carried by every rate limiting error.
 */
export type RateLimitErrorCode =
  | 'BACKEND_UNAVAILABLE'
  | 'CONFLICT_EXHAUSTED'
  | 'INVALID_CONFIGURATION'
  | 'CAPACITY_EXCEEDED';

export class RateLimitError extends Error {
  readonly code: RateLimitErrorCode;

  constructor(code: RateLimitErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RateLimitError';
    this.code = code;
    Object.setPrototypeOf(this, RateLimitError.prototype);
  }
}

/**
 * The state store could not be reached or answered with an error.
 */
export class BackendUnavailableError extends RateLimitError {
  readonly backend: string;

  constructor(backend: string, message: string, options?: { cause?: unknown }) {
    super('BACKEND_UNAVAILABLE', `Backend "${backend}" unavailable: ${message}`, options);
    this.name = 'BackendUnavailableError';
    this.backend = backend;
    Object.setPrototypeOf(this, BackendUnavailableError.prototype);
  }
}

/**
 * Every compare-and-set attempt for a key lost to a concurrent writer.
 * Transient: the caller may try again.
 */
export class ConflictExhaustedError extends RateLimitError {
  readonly key: string;
  readonly attempts: number;

  constructor(key: string, attempts: number) {
    super('CONFLICT_EXHAUSTED', `Gave up on key "${key}" after ${attempts} conflicting attempts`);
    this.name = 'ConflictExhaustedError';
    this.key = key;
    this.attempts = attempts;
    Object.setPrototypeOf(this, ConflictExhaustedError.prototype);
  }
}

export class InvalidConfigurationError extends RateLimitError {
  constructor(message: string) {
    super('INVALID_CONFIGURATION', message);
    this.name = 'InvalidConfigurationError';
    Object.setPrototypeOf(this, InvalidConfigurationError.prototype);
  }
}

/**
 * A quota pool allocation would exceed the pool total.
 */
export class CapacityExceededError extends RateLimitError {
  readonly requested: number;
  readonly available: number;

  constructor(requested: number, available: number) {
    super(
      'CAPACITY_EXCEEDED',
      `Requested allocation of ${requested} exceeds available capacity of ${available}`
    );
    this.name = 'CapacityExceededError';
    this.requested = requested;
    this.available = available;
    Object.setPrototypeOf(this, CapacityExceededError.prototype);
  }
}

/**
 * Render an unknown thrown value for a log line.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}
