import type { Logger, LogLevel } from '@toolpilot/core';

/** The console methods the logger writes through. */
export interface ConsoleSink {
  debug(...args: unknown[]): void;
  log(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

/** Console logger with level prefixes; messages below `level` are dropped. */
export function createConsoleLogger(level: LogLevel = 'info', sink: ConsoleSink = console): Logger {
  const enabled = (at: LogLevel): boolean => SEVERITY[at] >= SEVERITY[level];
  return {
    debug: (msg, ...args) => {
      if (enabled('debug')) sink.debug(`[DEBUG] ${msg}`, ...args);
    },
    info: (msg, ...args) => {
      if (enabled('info')) sink.log(`[INFO] ${msg}`, ...args);
    },
    warn: (msg, ...args) => {
      if (enabled('warn')) sink.warn(`[WARN] ${msg}`, ...args);
    },
    error: (msg, ...args) => {
      if (enabled('error')) sink.error(`[ERROR] ${msg}`, ...args);
    },
  };
}
