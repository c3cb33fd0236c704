import type { LogLevel } from './config.js';

/** Logger interface shared by every package. */
export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/** Console-backed logger that drops messages below `level`. */
export function createConsoleLogger(level: LogLevel = 'info'): Logger {
  const min = LEVEL_ORDER[level];
  const enabled = (l: LogLevel) => LEVEL_ORDER[l] >= min;

  return {
    debug: (msg, ...args) => {
      if (enabled('debug')) console.debug(`[DEBUG] ${msg}`, ...args);
    },
    info: (msg, ...args) => {
      if (enabled('info')) console.log(`[INFO] ${msg}`, ...args);
    },
    warn: (msg, ...args) => {
      if (enabled('warn')) console.warn(`[WARN] ${msg}`, ...args);
    },
    error: (msg, ...args) => {
      if (enabled('error')) console.error(`[ERROR] ${msg}`, ...args);
    },
  };
}

/** Logger that discards everything. */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
