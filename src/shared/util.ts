/**
 * Small shared utilities
 */

export function isObject(value: unknown): value is object {
  return !!value && typeof value === 'object';
}

/**
 * Freeze a plain data graph in place. Templates are shared between frames
 * and between the store and in-flight frames, so nothing may write to them.
 */
export function deepFreeze<T>(value: T): T {
  if (!isObject(value) || Object.isFrozen(value)) return value;
  Object.freeze(value);
  for (const child of Object.values(value)) {
    deepFreeze(child);
  }
  return value;
}

/** Sizes and offsets that feed geometry: NaN and negatives become 0 */
export function clampSize(value: number): number {
  return Number.isFinite(value) && value > 0 ? value : 0;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}
