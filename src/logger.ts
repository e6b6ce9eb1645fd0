import { Logger } from '@aws-lambda-powertools/logger';
import { SERVICE_NAME } from './constants.js';

/**
 * The slice of the logger every component writes to. Any object with these
 * methods can be injected.
 */
export type LimiterLogger = Pick<Logger, 'debug' | 'info' | 'warn' | 'error'>;

export type LogLevelName = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR' | 'SILENT';

export function createLogger(options: { serviceName?: string; logLevel?: LogLevelName } = {}): Logger {
  return new Logger({
    serviceName: options.serviceName ?? SERVICE_NAME,
    ...(options.logLevel !== undefined ? { logLevel: options.logLevel } : {}),
  });
}

let sharedLogger: Logger | null = null;

/**
 * Logger used when a component is constructed without one.
 * Level comes from POWERTOOLS_LOG_LEVEL.
 */
export function defaultLogger(): Logger {
  if (sharedLogger === null) {
    sharedLogger = createLogger();
  }
  return sharedLogger;
}
