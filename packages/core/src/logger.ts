/**
 * Scoped console logger.
 *
 * Every line is prefixed with `[pullseq:<scope>]` and filtered against the
 * configured `log.level` at call time, so `config.set()` takes effect
 * immediately.
 */

import { getLogLevel, type LogLevel } from "./config.js";

export interface Logger {
  readonly scope: string;
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
  enabled(level: Exclude<LogLevel, "silent">): boolean;
}

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function createLogger(scope: string): Logger {
  const prefix = `[pullseq:${scope}]`;
  const enabled = (level: Exclude<LogLevel, "silent">): boolean =>
    SEVERITY[level] >= SEVERITY[getLogLevel()];

  return {
    scope,
    enabled,
    debug: (...args) => {
      if (enabled("debug")) console.debug(prefix, ...args);
    },
    info: (...args) => {
      if (enabled("info")) console.info(prefix, ...args);
    },
    warn: (...args) => {
      if (enabled("warn")) console.warn(prefix, ...args);
    },
    error: (...args) => {
      if (enabled("error")) console.error(prefix, ...args);
    },
  };
}
