export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_WEIGHT;
}

function activeLevel(): LogLevel {
  const raw = process.env.LOG_LEVEL?.trim().toLowerCase() ?? '';
  return isLogLevel(raw) ? raw : 'info';
}

function enabled(level: LogLevel): boolean {
  return LEVEL_WEIGHT[level] >= LEVEL_WEIGHT[activeLevel()];
}

export interface Logger {
  debug(message: string, ...meta: unknown[]): void;
  info(message: string, ...meta: unknown[]): void;
  warn(message: string, ...meta: unknown[]): void;
  error(message: string, ...meta: unknown[]): void;
}

/**
 * Console logger whose lines carry a component tag, e.g. `[BuildRepos] Pulling ...`.
 * `LOG_LEVEL` is read on every call so tests and scripts can change it at runtime.
 */
export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;
  return {
    debug(message, ...meta) {
      if (enabled('debug')) console.log(`${prefix} ${message}`, ...meta);
    },
    info(message, ...meta) {
      if (enabled('info')) console.log(`${prefix} ${message}`, ...meta);
    },
    warn(message, ...meta) {
      if (enabled('warn')) console.warn(`${prefix} ${message}`, ...meta);
    },
    error(message, ...meta) {
      if (enabled('error')) console.error(`${prefix} ${message}`, ...meta);
    }
  };
}
