/**
 * Layout Solver
 *
 * A pure function of (template, bindings, viewport, interaction view):
 *
 *   bind -> intrinsic (x, y) -> distribute (x, y) -> position
 *        -> floating placement (dependency order) -> paint order
 *
 * The interaction view is only read; the tracker is updated afterwards
 * against the geometry returned here.
 */

import type { BindingContext } from '../bindings/context';
import { BindingScope, type BindingDiagnostic } from '../bindings/scope';
import { DEFAULT_STYLE } from '../compiler/config';
import { TRANSPARENT, type IntermediateTemplate } from '../compiler/types';
import { assertDefined } from '../dev/invariant';
import { warnOnce } from '../dev/warnings';
import { EMPTY_VIEW, type InteractionView } from '../interaction/types';
import { clampSize, deepFreeze } from '../shared/util';
import { bindNodes, type BindEnv } from './bind';
import { rectOf, type Box } from './box';
import { monospaceMeasurer } from './measure';
import { placeFloating, position, type PositionEnv } from './position';
import { distribute, intrinsic } from './sizing';
import type { LayoutNode, LayoutTree, Size, SolveOptions } from './types';

function viewportBox(viewport: Size): Box {
  return {
    kind: 'element',
    id: '',
    path: '',
    depth: 0,
    seq: -1,
    sizing: {
      x: { type: 'fixed', size: viewport.width },
      y: { type: 'fixed', size: viewport.height },
    },
    direction: DEFAULT_STYLE.direction,
    padding: DEFAULT_STYLE.padding,
    childGap: 0,
    alignX: DEFAULT_STYLE.alignX,
    alignY: DEFAULT_STYLE.alignY,
    paint: { color: TRANSPARENT, border: null, radius: DEFAULT_STYLE.radius, image: null },
    measured: { width: 0, height: 0 },
    scroll: null,
    floating: null,
    handlers: {},
    children: [],
    size: { x: viewport.width, y: viewport.height },
    pos: { x: 0, y: 0 },
    content: { x: 0, y: 0 },
    clip: null,
    scrollOffset: { x: 0, y: 0 },
  };
}

function floatingTarget(
  box: Box,
  parent: Box,
  root: Box,
  ids: ReadonlyMap<string, Box>,
  report: (diagnostic: BindingDiagnostic) => void
): Box {
  const attach = box.floating?.attachTo;
  if (!attach || attach.type === 'parent') return parent;
  if (attach.type === 'root') return root;
  const target = ids.get(attach.id);
  if (target) return target;
  report({
    code: 'UNBOUND_KEY',
    key: attach.id,
    nodeId: box.id,
    message: `Floating attach target '${attach.id}' is not in this frame; attached to parent`,
  });
  return parent;
}

function parentsOf(root: Box): Map<Box, Box> {
  const parents = new Map<Box, Box>();
  const walk = (box: Box) => {
    for (const child of box.children) {
      parents.set(child, box);
      walk(child);
    }
  };
  walk(root);
  return parents;
}

/** Nearest floating box at or above `box`, or null for flow geometry */
function floatingOwner(box: Box, parents: ReadonlyMap<Box, Box>): Box | null {
  for (let current: Box | undefined = box; current; current = parents.get(current)) {
    if (current.floating) return current;
  }
  return null;
}

/**
 * Places queued floating boxes once their target is final. A target inside
 * another floating subtree places that subtree first; a cycle places
 * against the geometry it has so far.
 */
function placeFloatingBoxes(
  root: Box,
  env: PositionEnv,
  ids: ReadonlyMap<string, Box>,
  report: (diagnostic: BindingDiagnostic) => void
): void {
  const parents = parentsOf(root);
  const placed = new Set<Box>();
  const visiting = new Set<Box>();

  const place = (box: Box) => {
    if (placed.has(box) || visiting.has(box)) return;
    visiting.add(box);
    const parent = parents.get(box);
    assertDefined(parent, `Floating box '${box.id}' has no parent`);

    const parentOwner = floatingOwner(parent, parents);
    if (parentOwner) place(parentOwner);
    const target = floatingTarget(box, parent, root, ids, report);
    const targetOwner = floatingOwner(target, parents);
    if (targetOwner && targetOwner !== box) place(targetOwner);

    placeFloating(box, rectOf(target));
    visiting.delete(box);
    placed.add(box);
    position(box, env);
  };

  for (let i = 0; i < env.queue.length; i++) {
    const box = env.queue[i];
    assertDefined(box, 'Floating queue entry missing');
    place(box);
  }
}

/**
 * Flow pre-order, then each floating subtree by z-index (ties by
 * declaration order). Nested floating boxes join the global z ordering.
 */
function paintOrder(root: Box): Box[] {
  const floating: Box[] = [];
  const out: Box[] = [];

  const collectFloating = (box: Box) => {
    for (const child of box.children) {
      if (child.floating) floating.push(child);
      collectFloating(child);
    }
  };
  const walkFlow = (box: Box) => {
    for (const child of box.children) {
      if (child.floating) continue;
      out.push(child);
      walkFlow(child);
    }
  };

  collectFloating(root);
  walkFlow(root);
  floating.sort(
    (a, b) => (a.floating?.zIndex ?? 0) - (b.floating?.zIndex ?? 0) || a.seq - b.seq
  );
  for (const box of floating) {
    out.push(box);
    walkFlow(box);
  }
  return out;
}

function toNode(box: Box, nodes: Map<Box, LayoutNode>): LayoutNode {
  const children = box.children.map((child) => toNode(child, nodes));
  const node: LayoutNode = {
    kind: box.kind,
    id: box.id,
    path: box.path,
    rect: rectOf(box),
    depth: box.depth,
    direction: box.direction,
    alignX: box.alignX,
    alignY: box.alignY,
    padding: box.padding,
    childGap: box.childGap,
    paint: box.paint,
    ...(box.text ? { text: box.text } : {}),
    clip: box.clip,
    ...(box.scroll
      ? {
          scroll: {
            vertical: box.scroll.vertical,
            horizontal: box.scroll.horizontal,
            offset: { x: box.scrollOffset.x, y: box.scrollOffset.y },
            contentSize: { width: box.content.x, height: box.content.y },
          },
        }
      : {}),
    floating: box.floating,
    handlers: box.handlers,
    children,
  };
  nodes.set(box, node);
  return node;
}

export function solve(
  template: IntermediateTemplate,
  bindings: BindingContext,
  viewport: Size,
  interaction: InteractionView = EMPTY_VIEW,
  options: SolveOptions = {}
): LayoutTree {
  const size: Size = {
    width: clampSize(viewport.width),
    height: clampSize(viewport.height),
  };
  const diagnostics: BindingDiagnostic[] = [];
  const report = (diagnostic: BindingDiagnostic) => {
    diagnostics.push(diagnostic);
    warnOnce(
      `binding:${diagnostic.code}:${diagnostic.key}:${diagnostic.nodeId}`,
      `${diagnostic.message} (node ${diagnostic.nodeId})`
    );
  };

  const root = viewportBox(size);
  const env: BindEnv = {
    interaction,
    measure: options.measureText ?? monospaceMeasurer,
    ids: new Map(),
    seq: 0,
  };
  bindNodes(template.roots, root, BindingScope.root(bindings, report), '', env);

  for (const axis of ['x', 'y'] as const) {
    intrinsic(root, axis);
    distribute(root, axis, axis === 'x' ? size.width : size.height);
  }

  const positionEnv: PositionEnv = {
    scrollOffsets: options.scrollOffsets ?? {},
    queue: [],
  };
  position(root, positionEnv);
  placeFloatingBoxes(root, positionEnv, env.ids, report);

  const nodes = new Map<Box, LayoutNode>();
  const rootNode = toNode(root, nodes);
  const drawOrder: LayoutNode[] = [];
  for (const box of paintOrder(root)) {
    const node = nodes.get(box);
    assertDefined(node, `Painted box '${box.id}' has no layout node`);
    drawOrder.push(node);
  }
  const byId = new Map<string, LayoutNode>();
  for (const [id, box] of env.ids) {
    const node = nodes.get(box);
    assertDefined(node, `Element '${id}' has no layout node`);
    byId.set(id, node);
  }

  return deepFreeze({
    page: template.page,
    viewport: size,
    root: rootNode,
    drawOrder,
    byId,
    diagnostics,
  });
}
