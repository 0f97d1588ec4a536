import * as fs from 'fs';
import * as path from 'path';
import { createBindingContext, type BindingRecord } from '../../src/bindings/context';
import { compileOrThrow } from '../../src/compiler/compile';
import type {
  InteractionFlags,
  InteractionView,
} from '../../src/interaction/types';
import { solve } from '../../src/layout/solve';
import type {
  LayoutNode,
  LayoutTree,
  Rect,
  Size,
  SolveOptions,
} from '../../src/layout/types';

export const VIEWPORT: Size = { width: 800, height: 600 };

export function fixture(name: string): string {
  return fs.readFileSync(path.join(__dirname, '..', 'fixtures', name), 'utf8');
}

/** Wraps node markup in a page */
export function page(body: string, reusables = ''): string {
  return `<page name="Test">${reusables}${body}</page>`;
}

/** An element with an explicit id, config tags and children */
export function el(id: string, config: string, children = ''): string {
  return `<element id="${id}"><element-config>${config}</element-config>${children}</element>`;
}

export function layoutOf(
  markup: string,
  record: BindingRecord = {},
  viewport: Size = VIEWPORT,
  interaction?: InteractionView,
  options?: SolveOptions
): LayoutTree {
  return solve(
    compileOrThrow(markup),
    createBindingContext(record),
    viewport,
    interaction,
    options
  );
}

export function nodeOf(tree: LayoutTree, id: string): LayoutNode {
  const node = tree.byId.get(id);
  if (!node) throw new Error(`No node '${id}' in layout`);
  return node;
}

export function rectOf(tree: LayoutTree, id: string): Rect {
  return nodeOf(tree, id).rect;
}

export function viewOf(
  entries: Record<string, Partial<InteractionFlags>>
): InteractionView {
  const state = new Map<string, InteractionFlags>();
  for (const [id, flags] of Object.entries(entries)) {
    state.set(id, { hovered: false, clicked: false, rightClicked: false, ...flags });
  }
  return {
    get: (id) => state.get(id),
    has: (id) => state.has(id),
    size: state.size,
    ids: () => state.keys(),
  };
}
