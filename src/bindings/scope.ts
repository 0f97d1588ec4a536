/**
 * Scope-chain resolution
 *
 * A scope is one list instance: the item's context plus the list's local
 * bindings, linked to the enclosing scope and ending at the host's root
 * context. Lookups walk outward until some context knows the key. Missing
 * and wrong-kind values resolve to a fallback and record a diagnostic;
 * anything else a host context throws propagates.
 */

import { BindingError, type BindingErrorCode } from '../common/errors';
import { TRANSPARENT, type Color, type LocalBinding } from '../compiler/types';
import { parseColor } from '../shared/color';
import type { BindingContext } from './context';

export interface BindingDiagnostic {
  readonly code: BindingErrorCode;
  readonly key: string;
  /** Stable id of the node whose binding failed */
  readonly nodeId: string;
  readonly message: string;
}

export interface BindingValues {
  text: string;
  bool: boolean;
  list: readonly BindingContext[];
  event: string;
  numeric: number;
  color: Color;
  image: string | null;
}

export type BindingKind = keyof BindingValues;

type Reader<K extends BindingKind> = (
  context: BindingContext,
  key: string
) => BindingValues[K] | undefined;

function toColor(key: string, value: Color | string | undefined): Color | undefined {
  if (typeof value !== 'string') return value;
  const color = parseColor(value);
  if (!color) throw new BindingError('WRONG_KIND', key, `Binding '${key}' is not a color: '${value}'`);
  return color;
}

const READERS: { [K in BindingKind]: Reader<K> } = {
  text: (ctx, key) => ctx.getText(key),
  bool: (ctx, key) => ctx.getBool(key),
  list: (ctx, key) => ctx.getList(key),
  event: (ctx, key) => ctx.getEventName(key),
  numeric: (ctx, key) => ctx.getNumeric?.(key),
  color: (ctx, key) => toColor(key, ctx.getColor?.(key)),
  image: (ctx, key) => ctx.getImage?.(key),
};

/** `set-*` locals hold strings; each kind reads them its own way. */
const FROM_LITERAL: { [K in BindingKind]: (value: string) => BindingValues[K] | undefined } = {
  text: (value) => value,
  bool: (value) => (value === 'true' ? true : value === 'false' ? false : undefined),
  list: () => undefined,
  event: (value) => value,
  numeric: (value) => {
    const n = Number(value);
    return value.trim() !== '' && Number.isFinite(n) ? n : undefined;
  },
  color: (value) => parseColor(value) ?? undefined,
  image: (value) => value,
};

const FALLBACKS: { [K in BindingKind]: BindingValues[K] } = {
  text: '',
  bool: false,
  list: [],
  event: '',
  numeric: 0,
  color: TRANSPARENT,
  image: null,
};

type Lookup<T> =
  | { found: true; value: T }
  | { found: false; error?: BindingError };

export class BindingScope {
  constructor(
    readonly context: BindingContext,
    readonly locals: Readonly<Record<string, LocalBinding>>,
    readonly parent: BindingScope | null,
    private readonly report: (diagnostic: BindingDiagnostic) => void
  ) {}

  static root(
    context: BindingContext,
    report: (diagnostic: BindingDiagnostic) => void
  ): BindingScope {
    return new BindingScope(context, {}, null, report);
  }

  /** Scope for one list item */
  child(
    context: BindingContext,
    locals: Readonly<Record<string, LocalBinding>>
  ): BindingScope {
    return new BindingScope(context, locals, this, this.report);
  }

  resolve<K extends BindingKind>(
    kind: K,
    key: string,
    nodeId: string
  ): BindingValues[K] {
    const result = this.lookup(kind, key);
    if (result.found) return result.value;
    const error = result.error ?? new BindingError('UNBOUND_KEY', key);
    this.report({ code: error.code, key, nodeId, message: error.message });
    return FALLBACKS[kind];
  }

  /** Event names fall back to the key itself and never report. */
  eventName(key: string): string {
    const result = this.lookup('event', key);
    return result.found ? result.value : key;
  }

  private lookup<K extends BindingKind>(kind: K, key: string): Lookup<BindingValues[K]> {
    for (let scope: BindingScope | null = this; scope; scope = scope.parent) {
      const local = Object.prototype.hasOwnProperty.call(scope.locals, key)
        ? scope.locals[key]
        : undefined;

      if (local?.type === 'literal') {
        const value = FROM_LITERAL[kind](local.value);
        if (value === undefined) {
          return { found: false, error: new BindingError('WRONG_KIND', key) };
        }
        return { found: true, value };
      }

      if (local?.type === 'ref') {
        // An explicit rebinding reads its own item context only.
        const read = readContext(kind, scope.context, local.key);
        if (read.found || read.error) return read;
        return { found: false, error: new BindingError('UNBOUND_KEY', local.key) };
      }

      const read = readContext(kind, scope.context, key);
      if (read.found || read.error?.code === 'WRONG_KIND') return read;
    }
    return { found: false };
  }
}

function readContext<K extends BindingKind>(
  kind: K,
  context: BindingContext,
  key: string
): Lookup<BindingValues[K]> {
  try {
    const value = READERS[kind](context, key);
    return value === undefined ? { found: false } : { found: true, value };
  } catch (err) {
    if (err instanceof BindingError) {
      return err.code === 'WRONG_KIND'
        ? { found: false, error: err }
        : { found: false };
    }
    throw err;
  }
}
