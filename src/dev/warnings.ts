/**
 * Dev-only warnings
 */

import { logger } from './logger';

const seen = new Set<string>();

export function warnOnce(key: string, message: string): void {
  if (process.env.NODE_ENV === 'production') return;
  if (seen.has(key)) return;
  seen.add(key);
  logger.warn(message);
}

/** @internal test hook */
export function _resetWarnings(): void {
  seen.clear();
}
