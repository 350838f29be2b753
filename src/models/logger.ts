/**
 * Scoped console logger.
 *
 * Messages are prefixed with `[tmx:<scope>]` and dropped below the
 * configured level. Decoders take a `Logger` so callers can silence or
 * capture warnings.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LogContext = Readonly<Record<string, unknown>>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface LoggerOptions {
  /** Minimum level written. Defaults to `warn`. */
  level?: LogLevel;
}

export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const threshold = LEVEL_RANK[options.level ?? 'warn'];
  const prefix = `[tmx:${scope}]`;

  const emit = (
    level: Exclude<LogLevel, 'silent'>,
    message: string,
    context?: LogContext,
  ): void => {
    if (LEVEL_RANK[level] < threshold) return;
    if (context) {
      console[level](prefix, message, context);
    } else {
      console[level](prefix, message);
    }
  };

  return {
    debug: (message, context) => emit('debug', message, context),
    info: (message, context) => emit('info', message, context),
    warn: (message, context) => emit('warn', message, context),
    error: (message, context) => emit('error', message, context),
  };
}

const noop = (): void => {};

export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};
