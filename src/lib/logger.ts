/**
 * Namespaced console logger shared by the agents and the coordinator.
 *
 * The level comes from LOG_LEVEL and defaults to `silent` under test runs so
 * that progress assertions are not drowned in output.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface Logger {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

function resolveInitialLevel(): LogLevel {
  const fromEnv = process.env.LOG_LEVEL;
  if (isLogLevel(fromEnv)) {
    return fromEnv;
  }
  return process.env.NODE_ENV === 'test' ? 'silent' : 'info';
}

let currentLevel: LogLevel = resolveInitialLevel();

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

export function createLogger(namespace: string): Logger {
  const prefix = `[${namespace}]`;

  return {
    debug: (...args: unknown[]) => {
      if (enabled('debug')) console.debug(prefix, ...args);
    },
    info: (...args: unknown[]) => {
      if (enabled('info')) console.info(prefix, ...args);
    },
    warn: (...args: unknown[]) => {
      if (enabled('warn')) console.warn(prefix, ...args);
    },
    error: (...args: unknown[]) => {
      if (enabled('error')) console.error(prefix, ...args);
    }
  };
}
