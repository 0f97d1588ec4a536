/**
 * Markup reader
 *
 * Turns the XML source into a plain element tree. No semantics here: tag
 * and attribute meaning is applied by the reusable expander and the
 * template builder.
 */

import { SaxesParser } from 'saxes';
import { CompileError, type SourcePosition } from '../common/errors';

/**
 * `bound` records whether a reference attribute still names a key ('ref')
 * or was replaced by a literal during reusable expansion ('literal').
 */
export interface MarkupAttribute {
  readonly value: string;
  readonly bound: 'ref' | 'literal';
}

export interface MarkupElement {
  readonly name: string;
  readonly attributes: Readonly<Record<string, MarkupAttribute>>;
  readonly children: readonly MarkupElement[];
  /** Direct character data, trimmed */
  readonly text: string;
  readonly position: SourcePosition;
}

interface OpenElement {
  name: string;
  attributes: Record<string, MarkupAttribute>;
  children: MarkupElement[];
  text: string;
  position: SourcePosition;
}

export function readMarkup(source: string): MarkupElement {
  const parser = new SaxesParser({ position: true });
  const stack: OpenElement[] = [];
  const roots: MarkupElement[] = [];

  parser.on('opentag', (tag) => {
    const attributes: Record<string, MarkupAttribute> = {};
    for (const [name, value] of Object.entries(tag.attributes)) {
      attributes[name] = { value, bound: 'ref' };
    }
    stack.push({
      name: tag.name,
      attributes,
      children: [],
      text: '',
      position: { line: parser.line, column: parser.column },
    });
  });

  parser.on('closetag', () => {
    const open = stack.pop();
    if (!open) return;
    const element: MarkupElement = { ...open, text: open.text.trim() };
    const parent = stack[stack.length - 1];
    if (parent) parent.children.push(element);
    else roots.push(element);
  });

  const appendText = (text: string) => {
    const top = stack[stack.length - 1];
    if (top) top.text += text;
  };
  parser.on('text', appendText);
  parser.on('cdata', appendText);

  try {
    parser.write(source).close();
  } catch (err) {
    throw new CompileError(
      'MALFORMED_MARKUP',
      err instanceof Error ? err.message : String(err),
      { line: parser.line, column: parser.column }
    );
  }

  const root = roots[0];
  if (!root) {
    throw new CompileError('MALFORMED_MARKUP', 'Markup has no root element');
  }
  return root;
}

// ─────────────────────────────────────────────────────────────────────────────
// Attribute access
// ─────────────────────────────────────────────────────────────────────────────

export function optionalAttr(
  el: MarkupElement,
  name: string
): MarkupAttribute | undefined {
  return Object.prototype.hasOwnProperty.call(el.attributes, name)
    ? el.attributes[name]
    : undefined;
}

export function requireAttr(el: MarkupElement, name: string): MarkupAttribute {
  const attr = optionalAttr(el, name);
  if (!attr) {
    throw new CompileError(
      'MISSING_ATTRIBUTE',
      `<${el.name}> requires attribute '${name}'`,
      el.position
    );
  }
  return attr;
}

export function invalidAttr(
  el: MarkupElement,
  name: string,
  value: string,
  expected: string
): CompileError {
  return new CompileError(
    'INVALID_ATTRIBUTE',
    `<${el.name} ${name}="${value}"> expects ${expected}`,
    el.position
  );
}

export function numberAttr(el: MarkupElement, name: string): number | undefined {
  const attr = optionalAttr(el, name);
  if (!attr) return undefined;
  return parseNumber(el, name, attr.value);
}

export function requireNumberAttr(el: MarkupElement, name: string): number {
  return parseNumber(el, name, requireAttr(el, name).value);
}

export function parseNumber(
  el: MarkupElement,
  name: string,
  value: string
): number {
  const n = Number(value.trim());
  if (value.trim() === '' || !Number.isFinite(n)) {
    throw invalidAttr(el, name, value, 'a number');
  }
  return n;
}

export function parseBool(
  el: MarkupElement,
  name: string,
  value: string
): boolean {
  if (value === 'true') return true;
  if (value === 'false') return false;
  throw invalidAttr(el, name, value, "'true' or 'false'");
}
