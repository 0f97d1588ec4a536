/**
 * Binding Context
 *
 * The host's read-only data view for one frame. Accessors return undefined
 * for a missing key; they may also throw BindingError for a missing key or
 * a value of the wrong kind. The engine never keeps a context past the frame
 * it was passed to.
 */

import { BindingError } from '../common/errors';
import type { Color } from '../compiler/types';

export interface BindingContext {
  getText(key: string): string | undefined;
  getBool(key: string): boolean | undefined;
  getList(key: string): readonly BindingContext[] | undefined;
  getEventName(key: string): string | undefined;
  getNumeric?(key: string): number | undefined;
  /** A Color, or any CSS color string */
  getColor?(key: string): Color | string | undefined;
  /** Texture name for image-backed elements */
  getImage?(key: string): string | undefined;
}

export type BindingValue =
  | string
  | number
  | boolean
  | Color
  | readonly BindingRecord[];

export interface BindingRecord {
  readonly [key: string]: BindingValue | undefined;
}

function isRecordList(value: BindingValue): value is readonly BindingRecord[] {
  return Array.isArray(value);
}

function isColor(value: BindingValue): value is Color {
  return typeof value === 'object' && !Array.isArray(value);
}

/**
 * A context over a plain object. Nested arrays of objects become list
 * sources whose items are contexts themselves.
 *
 * @example
 * ```ts
 * const ctx = createBindingContext({
 *   title: 'Inbox',
 *   Documents: [{ title: 'a' }, { title: 'b' }],
 * });
 * ```
 */
export function createBindingContext(record: BindingRecord): BindingContext {
  const lookup = (key: string): BindingValue | undefined =>
    Object.prototype.hasOwnProperty.call(record, key) ? record[key] : undefined;

  const wrongKind = (key: string) => new BindingError('WRONG_KIND', key);

  const readString = (key: string): string | undefined => {
    const value = lookup(key);
    if (value === undefined) return undefined;
    if (typeof value === 'string') return value;
    if (typeof value === 'number') return String(value);
    throw wrongKind(key);
  };

  let lists: Map<string, readonly BindingContext[]> | undefined;

  return {
    getText: readString,
    getEventName: readString,
    getImage: readString,

    getBool(key) {
      const value = lookup(key);
      if (value === undefined || typeof value === 'boolean') return value;
      throw wrongKind(key);
    },

    getNumeric(key) {
      const value = lookup(key);
      if (value === undefined || typeof value === 'number') return value;
      throw wrongKind(key);
    },

    getColor(key) {
      const value = lookup(key);
      if (value === undefined || typeof value === 'string') return value;
      if (typeof value !== 'number' && typeof value !== 'boolean' && isColor(value)) {
        return value;
      }
      throw wrongKind(key);
    },

    getList(key) {
      const cached = lists?.get(key);
      if (cached) return cached;
      const value = lookup(key);
      if (value === undefined) return undefined;
      if (typeof value === 'object' && isRecordList(value)) {
        const items = value.map(createBindingContext);
        (lists ??= new Map()).set(key, items);
        return items;
      }
      throw wrongKind(key);
    },
  };
}
