// lib/log.ts
// Console logging with a bracketed scope, gated by level.

import type { LogLevel } from '../types';

const RANK: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

let currentLevel: LogLevel = 'warn';

export function setLogLevel(level: LogLevel) {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export type Logger = {
  error: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  debug: (...args: unknown[]) => void;
};

export function createLogger(scope: string): Logger {
  const tag = `[${scope}]`;
  const enabled = (level: LogLevel) => RANK[currentLevel] >= RANK[level];
  return {
    error: (...args) => { if (enabled('error')) console.error(tag, ...args); },
    warn: (...args) => { if (enabled('warn')) console.warn(tag, ...args); },
    info: (...args) => { if (enabled('info')) console.info(tag, ...args); },
    debug: (...args) => { if (enabled('debug')) console.debug(tag, ...args); },
  };
}
