/**
 * Logger Utility
 *
 * Provides a leveled logging utility that writes through `console`.
 * The threshold comes from the `level` option or the `COLLAGE_LOG_LEVEL`
 * environment variable; errors and warnings are kept unless `silent` is set.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export const DEFAULT_LOG_LEVEL: LogLevel = 'info';

export interface Logger {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

export interface LoggerOptions {
  /** Minimum level to emit. Falls back to `COLLAGE_LOG_LEVEL`, then `info`. */
  level?: LogLevel;
}

/**
 * Check whether a string names a log level
 *
 * @example
 * ```typescript
 * isLogLevel('warn'); // true
 * isLogLevel('verbose'); // false
 * ```
 */
export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

/**
 * Resolve the active log level from an explicit value or the environment
 *
 * Unknown values fall back to the default level.
 */
export function resolveLogLevel(
  value: string | undefined = process.env.COLLAGE_LOG_LEVEL
): LogLevel {
  const normalized = value?.trim().toLowerCase();
  if (normalized && isLogLevel(normalized)) {
    return normalized;
  }
  return DEFAULT_LOG_LEVEL;
}

/**
 * Create a namespaced logger for a specific module
 *
 * @param namespace - Module name prefix (e.g., 'Scanner', 'Writer'); omit for plain output
 * @returns Logger instance with leveled methods
 *
 * @example
 * ```typescript
 * const logger = createLogger('Scanner');
 * logger.debug('Reading directory'); // Only when level is debug
 * logger.error('Failed to list files'); // Shown unless silent
 * ```
 */
export function createLogger(namespace?: string, options: LoggerOptions = {}): Logger {
  const threshold = LEVEL_ORDER[options.level ?? resolveLogLevel()];
  const prefix = namespace ? [`[${namespace}]`] : [];
  const enabled = (level: Exclude<LogLevel, 'silent'>) => LEVEL_ORDER[level] >= threshold;

  return {
    debug: (...args: unknown[]) => {
      if (enabled('debug')) {
        console.log(...prefix, ...args);
      }
    },

    info: (...args: unknown[]) => {
      if (enabled('info')) {
        console.log(...prefix, ...args);
      }
    },

    warn: (...args: unknown[]) => {
      if (enabled('warn')) {
        console.warn(...prefix, ...args);
      }
    },

    error: (...args: unknown[]) => {
      if (enabled('error')) {
        console.error(...prefix, ...args);
      }
    },
  };
}

/**
 * Logger that discards everything, for callers that want no output
 */
export const silentLogger: Logger = createLogger(undefined, { level: 'silent' });

/**
 * Unprefixed logger for user-facing command output
 *
 * @example
 * ```typescript
 * import { logger } from '@collage/utils';
 *
 * logger.info('Collage successfully saved as: out.jpg');
 * ```
 */
export const logger: Logger = createLogger();
