/**
 * Invariant assertion utilities
 *
 * Core principle: fail fast when an engine invariant is violated.
 * These guard engine bugs, not host input; host input errors go through
 * CompileError / BindingError instead.
 */

/**
 * Assert a condition; throw with context if false
 * @internal
 */
export function invariant(
  condition: boolean,
  message: string,
  context?: Record<string, unknown>
): asserts condition {
  if (!condition) {
    const contextStr = context ? '\n' + JSON.stringify(context, null, 2) : '';
    throw new Error(`[boxwood Invariant] ${message}${contextStr}`);
  }
}

/**
 * Assert a reference is not null/undefined
 * @internal
 */
export function assertDefined<T>(
  value: T | null | undefined,
  message: string
): asserts value is T {
  invariant(value !== null && value !== undefined, message, { value });
}
