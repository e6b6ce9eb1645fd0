import { InvalidConfigurationError } from '../errors.js';

/**
 * Time unit suffixes and their millisecond values.
 */
const TIME_UNITS: Record<string, number> = {
  ms: 1,
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000,
  d: 24 * 60 * 60 * 1000,
  w: 7 * 24 * 60 * 60 * 1000,
};

/**
 * Windows that may be given by name.
 */
const NAMED_WINDOWS: Record<string, number> = {
  second: TIME_UNITS.s,
  minute: TIME_UNITS.m,
  hour: TIME_UNITS.h,
  day: TIME_UNITS.d,
  week: TIME_UNITS.w,
};

/**
 * Parse a window string (e.g., '15m', '1h', 'minute') into milliseconds.
 *
 * @param window - A number followed by a unit (ms, s, m, h, d, w), or one of
 *   second, minute, hour, day, week
 * @throws InvalidConfigurationError if the format is invalid
 *
 * @example
 * parseWindow('15m')    // 900000
 * parseWindow('250ms')  // 250
 * parseWindow('hour')   // 3600000
 */
export function parseWindow(window: string): number {
  if (typeof window !== 'string' || window.trim().length === 0) {
    throw new InvalidConfigurationError('Window must be a non-empty string');
  }

  const trimmed = window.trim().toLowerCase();

  const named = NAMED_WINDOWS[trimmed];
  if (named !== undefined) {
    return named;
  }

  // Match number (integer or decimal) followed by unit
  const match = /^(\d+(?:\.\d+)?)\s*(ms|[smhdw])$/.exec(trimmed);

  if (match === null) {
    throw new InvalidConfigurationError(
      `Invalid window format: "${window}". Expected a number followed by a unit (ms, s, m, h, d, w) or one of second, minute, hour, day, week. Examples: '15m', '1h', '30s'`
    );
  }

  const [, amount, unit] = match;
  const value = parseFloat(amount);

  if (value <= 0) {
    throw new InvalidConfigurationError(`Window value must be positive, got: ${value}`);
  }

  const result = Math.floor(value * TIME_UNITS[unit]);

  if (result <= 0) {
    throw new InvalidConfigurationError(
      `Resulting window duration must be at least 1ms, got: ${result}ms`
    );
  }

  return result;
}

/**
 * Format milliseconds as a human-readable duration string.
 *
 * @returns e.g. '15m', '1h 30m', '2d'
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }

  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);
  const days = Math.floor(hours / 24);

  if (days > 0) {
    const remainingHours = hours % 24;
    return remainingHours > 0 ? `${days}d ${remainingHours}h` : `${days}d`;
  }

  if (hours > 0) {
    const remainingMinutes = minutes % 60;
    return remainingMinutes > 0 ? `${hours}h ${remainingMinutes}m` : `${hours}h`;
  }

  if (minutes > 0) {
    const remainingSeconds = seconds % 60;
    return remainingSeconds > 0 ? `${minutes}m ${remainingSeconds}s` : `${minutes}m`;
  }

  return `${seconds}s`;
}
