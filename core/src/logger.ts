export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface Logger {
  debug(message: string, ...meta: unknown[]): void;
  info(message: string, ...meta: unknown[]): void;
  warn(message: string, ...meta: unknown[]): void;
  error(message: string, ...meta: unknown[]): void;
}

export interface LoggerOptions {
  level?: LogLevel;
  prefix?: string;
  /** Destination for log lines; defaults to the global console */
  sink?: Logger;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

export function createLogger(options: LoggerOptions = {}): Logger {
  const threshold = LEVEL_ORDER[options.level ?? 'info'];
  const sink = options.sink ?? globalThis.console;
  const prefix = options.prefix;

  const emit = (level: Exclude<LogLevel, 'silent'>, message: string, meta: unknown[]): void => {
    if (LEVEL_ORDER[level] < threshold) {
      return;
    }
    const line = prefix ? `${prefix} ${message}` : message;
    sink[level](line, ...meta);
  };

  return {
    debug: (message, ...meta) => emit('debug', message, meta),
    info: (message, ...meta) => emit('info', message, meta),
    warn: (message, ...meta) => emit('warn', message, meta),
    error: (message, ...meta) => emit('error', message, meta),
  };
}
