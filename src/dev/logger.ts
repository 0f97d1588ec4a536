/**
 * Centralized logger
 * - debug/info/warn are dropped when NODE_ENV is 'production'
 * - error always reaches the console
 * - every line is tagged with the engine prefix
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const PREFIX = '[boxwood]';

function isProduction(): boolean {
  return process.env.NODE_ENV === 'production';
}

function callConsole(level: LogLevel, args: unknown[]): void {
  const c = typeof console !== 'undefined' ? console : undefined;
  if (!c) return;
  const fn: unknown = c[level];
  if (typeof fn === 'function') {
    try {
      fn.apply(c, [PREFIX, ...args]);
    } catch {
      // ignore logging errors
    }
  }
}

export const logger = {
  debug: (...args: unknown[]) => {
    if (isProduction()) return;
    callConsole('debug', args);
  },

  info: (...args: unknown[]) => {
    if (isProduction()) return;
    callConsole('info', args);
  },

  warn: (...args: unknown[]) => {
    if (isProduction()) return;
    callConsole('warn', args);
  },

  error: (...args: unknown[]) => {
    callConsole('error', args);
  },
};
