/**
 * Reusables
 *
 * `<reusable>` definitions live in an arena (array + name index) so the
 * reference graph is plain integers. Cycles are rejected before anything is
 * expanded; expansion then splices each `<use>` inline, substituting
 * reference attributes that name a declared `<param>`.
 */

import { CompileError } from '../common/errors';
import type { LocalBinding } from './types';
import {
  optionalAttr,
  requireAttr,
  type MarkupAttribute,
  type MarkupElement,
} from './markup';

export interface ReusableParam {
  readonly local: string;
  readonly defaultValue?: string;
}

export interface ReusableDef {
  readonly name: string;
  readonly params: readonly ReusableParam[];
  readonly body: readonly MarkupElement[];
  readonly element: MarkupElement;
}

/** A `<use>` before expansion */
export interface ComponentUse {
  readonly reusableName: string;
  readonly overrides: Readonly<Record<string, LocalBinding>>;
}

export interface ReusableArena {
  readonly defs: readonly ReusableDef[];
  readonly index: ReadonlyMap<string, number>;
  /** edges[i] holds the arena indices used by defs[i], in source order */
  readonly edges: readonly (readonly number[])[];
}

export const BINDING_KINDS = [
  'text',
  'bool',
  'event',
  'list',
  'numeric',
  'color',
  'image',
] as const;

/**
 * Attributes that hold a binding key (and so may name a param), per tag.
 * `get-*` tags are matched by prefix.
 */
const REFERENCE_ATTRIBUTES: Readonly<Record<string, readonly string[]>> = {
  element: ['if', 'if-not'],
  'text-element': ['if', 'if-not'],
  list: ['src', 'if', 'if-not'],
  'dyn-content': ['from'],
  'dyn-color': ['from'],
  'border-dynamic-color': ['from'],
  'width-fixed': ['from'],
  'height-fixed': ['from'],
  id: ['from'],
  'floating-offset': ['x-from', 'y-from'],
  'floating-size': ['width-from', 'height-from'],
  image: ['src'],
  clicked: ['emit'],
  'right-clicked': ['emit'],
};

function referenceAttributes(tag: string): readonly string[] {
  if (tag.startsWith('get-')) return ['from'];
  return REFERENCE_ATTRIBUTES[tag] ?? [];
}

// ─────────────────────────────────────────────────────────────────────────────
// Arena
// ─────────────────────────────────────────────────────────────────────────────

function collectUses(elements: readonly MarkupElement[], out: MarkupElement[]) {
  for (const el of elements) {
    if (el.name === 'use') out.push(el);
    collectUses(el.children, out);
  }
  return out;
}

function readParams(el: MarkupElement): {
  params: ReusableParam[];
  body: MarkupElement[];
} {
  const params: ReusableParam[] = [];
  const body: MarkupElement[] = [];
  for (const child of el.children) {
    if (child.name !== 'param') {
      body.push(child);
      continue;
    }
    const local = requireAttr(child, 'local').value;
    if (params.some((p) => p.local === local)) {
      throw new CompileError(
        'INVALID_ATTRIBUTE',
        `Reusable '${requireAttr(el, 'name').value}' declares param '${local}' twice`,
        child.position
      );
    }
    const defaultValue = optionalAttr(child, 'default')?.value;
    params.push(defaultValue === undefined ? { local } : { local, defaultValue });
  }
  return { params, body };
}

/**
 * Builds the arena from the page's `<reusable>` children and checks every
 * `<use>` in the page against it.
 */
export function buildArena(
  reusables: readonly MarkupElement[],
  pageBody: readonly MarkupElement[]
): ReusableArena {
  const defs: ReusableDef[] = [];
  const index = new Map<string, number>();

  for (const el of reusables) {
    const name = requireAttr(el, 'name').value;
    if (index.has(name)) {
      throw new CompileError(
        'DUPLICATE_REUSABLE',
        `Reusable '${name}' is declared more than once`,
        el.position
      );
    }
    index.set(name, defs.length);
    defs.push({ name, ...readParams(el), element: el });
  }

  const resolve = (use: MarkupElement): number => {
    const name = requireAttr(use, 'name').value;
    const target = index.get(name);
    if (target === undefined) {
      throw new CompileError(
        'UNKNOWN_REUSABLE',
        `<use name="${name}"> does not match any reusable`,
        use.position
      );
    }
    return target;
  };

  const edges = defs.map((def) => collectUses(def.body, []).map(resolve));
  collectUses(pageBody, []).forEach(resolve);

  return { defs, index, edges };
}

/** Depth-first search with an on-stack marker; throws on the first back edge. */
export function assertAcyclic(arena: ReusableArena): void {
  const state = new Uint8Array(arena.defs.length); // 0 new, 1 on stack, 2 done
  const stack: number[] = [];

  const visit = (node: number) => {
    state[node] = 1;
    stack.push(node);
    for (const next of arena.edges[node] ?? []) {
      if (state[next] === 1) {
        const cycle = stack.slice(stack.indexOf(next)).concat(next);
        const names = cycle.map((i) => arena.defs[i]?.name ?? String(i));
        throw new CompileError(
          'CYCLIC_REUSE',
          `Reusable cycle: ${names.join(' -> ')}`,
          arena.defs[node]?.element.position
        );
      }
      if (state[next] === 0) visit(next);
    }
    stack.pop();
    state[node] = 2;
  };

  for (let i = 0; i < arena.defs.length; i++) {
    if (state[i] === 0) visit(i);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Expansion
// ─────────────────────────────────────────────────────────────────────────────

/** undefined value: declared but neither overridden nor defaulted */
type Substitutions = ReadonlyMap<string, MarkupAttribute | undefined>;

const NO_SUBSTITUTIONS: Substitutions = new Map();

function overrideKind(tag: string): 'set' | 'get' | null {
  const match = /^(set|get)-(.+)$/.exec(tag);
  if (!match) return null;
  const [, mode, kind] = match;
  if (!BINDING_KINDS.some((k) => k === kind)) return null;
  return mode === 'set' ? 'set' : 'get';
}

/** Reads `set-*` / `get-*` children; attributes are already substituted. */
export function readLocalBindings(
  el: MarkupElement,
  accept: (child: MarkupElement) => boolean = () => false
): Record<string, LocalBinding> {
  const bindings: Record<string, LocalBinding> = {};
  for (const child of el.children) {
    const mode = overrideKind(child.name);
    if (!mode) {
      if (accept(child)) continue;
      throw new CompileError(
        'UNKNOWN_TAG',
        `<${child.name}> is not allowed inside <${el.name}>`,
        child.position
      );
    }
    const local = requireAttr(child, 'local').value;
    if (mode === 'set') {
      bindings[local] = { type: 'literal', value: requireAttr(child, 'to').value };
    } else {
      const from = requireAttr(child, 'from');
      bindings[local] =
        from.bound === 'literal'
          ? { type: 'literal', value: from.value }
          : { type: 'ref', key: from.value };
    }
  }
  return bindings;
}

function substitute(
  el: MarkupElement,
  subs: Substitutions,
  reusable: string | undefined
): MarkupElement['attributes'] {
  const names = referenceAttributes(el.name);
  if (names.length === 0 || subs.size === 0) return el.attributes;

  const attributes: Record<string, MarkupAttribute> = { ...el.attributes };
  for (const name of names) {
    const attr = optionalAttr(el, name);
    if (!attr || attr.bound === 'literal' || !subs.has(attr.value)) continue;
    const replacement = subs.get(attr.value);
    if (!replacement) {
      throw new CompileError(
        'UNBOUND_LOCAL',
        `Param '${attr.value}' of reusable '${reusable ?? ''}' is referenced but has no value or default`,
        el.position
      );
    }
    attributes[name] = replacement;
  }
  return attributes;
}

function expandUse(
  use: MarkupElement,
  arena: ReusableArena,
  subs: Substitutions,
  reusable: string | undefined
): MarkupElement[] {
  const def = arena.defs[arena.index.get(requireAttr(use, 'name').value) ?? -1];
  if (!def) {
    throw new CompileError(
      'UNKNOWN_REUSABLE',
      `<use name="${requireAttr(use, 'name').value}"> does not match any reusable`,
      use.position
    );
  }

  // The use's own get-* attributes see the caller's params.
  const resolvedUse: MarkupElement = {
    ...use,
    children: use.children.map((child) => ({
      ...child,
      attributes: substitute(child, subs, reusable),
    })),
  };
  const component: ComponentUse = {
    reusableName: def.name,
    overrides: readLocalBindings(resolvedUse),
  };

  for (const local of Object.keys(component.overrides)) {
    if (!def.params.some((p) => p.local === local)) {
      throw new CompileError(
        'INVALID_ATTRIBUTE',
        `Reusable '${def.name}' has no param '${local}'`,
        use.position
      );
    }
  }

  const inner = new Map<string, MarkupAttribute | undefined>();
  for (const param of def.params) {
    const override = component.overrides[param.local];
    if (override) {
      inner.set(
        param.local,
        override.type === 'literal'
          ? { value: override.value, bound: 'literal' }
          : { value: override.key, bound: 'ref' }
      );
    } else if (param.defaultValue !== undefined) {
      inner.set(param.local, { value: param.defaultValue, bound: 'literal' });
    } else {
      inner.set(param.local, undefined);
    }
  }

  return expandAll(def.body, arena, inner, def.name);
}

function expandAll(
  elements: readonly MarkupElement[],
  arena: ReusableArena,
  subs: Substitutions,
  reusable: string | undefined
): MarkupElement[] {
  const out: MarkupElement[] = [];
  for (const el of elements) {
    if (el.name === 'use') {
      out.push(...expandUse(el, arena, subs, reusable));
      continue;
    }
    out.push({
      ...el,
      attributes: substitute(el, subs, reusable),
      children: expandAll(el.children, arena, subs, reusable),
    });
  }
  return out;
}

/** Splices every `<use>` under `elements`. Requires an acyclic arena. */
export function expandReusables(
  elements: readonly MarkupElement[],
  arena: ReusableArena
): MarkupElement[] {
  return expandAll(elements, arena, NO_SUBSTITUTIONS, undefined);
}
