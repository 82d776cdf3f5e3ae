import pino, { type Logger } from 'pino';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/** Log level from LOG_LEVEL, falling back to info. */
export function getLogLevel(): LogLevel {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  return envLevel && isLogLevel(envLevel) ? envLevel : 'info';
}

// JSON lines go to stderr so stdout stays free for the terminal summary.
const rootLogger = pino({ name: 'hnp-scan', level: getLogLevel() }, pino.destination(2));

/**
 * Child logger bound to a component name.
 *
 * @example
 * ```typescript
 * const logger = createLogger('collector');
 * logger.warn({ err, file }, 'Skipping unreadable file');
 * ```
 */
export function createLogger(component: string): Logger {
  return rootLogger.child({ component });
}

export type { Logger };
