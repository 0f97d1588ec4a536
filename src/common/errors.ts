/**
 * Error taxonomy
 *
 * CompileError  - fatal to one compile attempt; the previous template stays live
 * BindingError  - recovered per node with a fallback value and a diagnostic
 */

export type CompileErrorCode =
  | 'MALFORMED_MARKUP'
  | 'UNKNOWN_TAG'
  | 'MISSING_ATTRIBUTE'
  | 'INVALID_ATTRIBUTE'
  | 'UNKNOWN_REUSABLE'
  | 'DUPLICATE_REUSABLE'
  | 'CYCLIC_REUSE'
  | 'UNBOUND_LOCAL'
  | 'STALE_RELOAD';

export interface SourcePosition {
  line: number;
  column: number;
}

export class CompileError extends Error {
  readonly code: CompileErrorCode;
  readonly line?: number;
  readonly column?: number;

  constructor(
    code: CompileErrorCode,
    message: string,
    position?: SourcePosition
  ) {
    super(
      position ? `${message} (line ${position.line}, column ${position.column})` : message
    );
    this.name = 'CompileError';
    this.code = code;
    this.line = position?.line;
    this.column = position?.column;
    Object.setPrototypeOf(this, CompileError.prototype);
  }
}

export type BindingErrorCode = 'UNBOUND_KEY' | 'WRONG_KIND';

export class BindingError extends Error {
  readonly code: BindingErrorCode;
  readonly key: string;

  constructor(code: BindingErrorCode, key: string, message?: string) {
    super(
      message ??
        (code === 'UNBOUND_KEY'
          ? `No binding for key '${key}'`
          : `Binding '${key}' holds a value of the wrong kind`)
    );
    this.name = 'BindingError';
    this.code = code;
    this.key = key;
    Object.setPrototypeOf(this, BindingError.prototype);
  }
}

export function isBindingError(error: unknown): error is BindingError {
  return error instanceof BindingError;
}

/**
 * Safe wrapper for async work
 * Returns the value or the error without throwing
 *
 * @example
 * ```ts
 * const { data, error } = await handle(readFile(path, 'utf8'));
 * if (error) return report(error);
 * ```
 */
export async function handle<T>(
  promise: Promise<T>
): Promise<{ data: T; error: null } | { data: null; error: Error }> {
  try {
    const data = await promise;
    return { data, error: null };
  } catch (error) {
    return {
      data: null,
      error: error instanceof Error ? error : new Error(String(error)),
    };
  }
}
