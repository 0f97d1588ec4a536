/**
 * Render commands
 *
 * Flattens a Layout Tree into the ordered list a rendering backend draws.
 * Order follows drawOrder; scroll containers wrap their flow descendants
 * in a scissor pair. Floating subtrees are drawn outside any scissor.
 */

import type { Color, Corners, Sides } from '../compiler/types';
import type { LayoutNode, LayoutTree, Rect, TextStyle } from '../layout/types';

export type RenderCommand =
  | {
      readonly type: 'rectangle';
      readonly id: string;
      readonly rect: Rect;
      readonly color: Color;
      readonly radius: Corners;
    }
  | {
      readonly type: 'border';
      readonly id: string;
      readonly rect: Rect;
      readonly color: Color;
      readonly width: Sides;
      readonly radius: Corners;
    }
  | {
      readonly type: 'text';
      readonly id: string;
      readonly rect: Rect;
      readonly content: string;
      readonly style: TextStyle;
    }
  | {
      readonly type: 'image';
      readonly id: string;
      readonly rect: Rect;
      readonly image: string;
      /** Background color, for backends that tint textures */
      readonly tint: Color;
      readonly radius: Corners;
    }
  | { readonly type: 'scissor-start'; readonly id: string; readonly rect: Rect }
  | { readonly type: 'scissor-end'; readonly id: string };

const NO_RADIUS: Corners = { topLeft: 0, topRight: 0, bottomRight: 0, bottomLeft: 0 };

function hasBorder(width: Sides): boolean {
  return width.top > 0 || width.right > 0 || width.bottom > 0 || width.left > 0;
}

/** Rectangles centred in the gaps between consecutive flow children */
function betweenChildren(node: LayoutNode, thickness: number): Rect[] {
  const flow = node.children.filter((child) => !child.floating);
  const out: Rect[] = [];
  for (let i = 1; i < flow.length; i++) {
    const prev = flow[i - 1];
    if (!prev) continue;
    const gapCenterOffset = (node.childGap - thickness) / 2;
    if (node.direction === 'ltr') {
      out.push({
        x: prev.rect.x + prev.rect.width + gapCenterOffset,
        y: node.rect.y + node.padding.top,
        width: thickness,
        height: Math.max(0, node.rect.height - node.padding.top - node.padding.bottom),
      });
    } else {
      out.push({
        x: node.rect.x + node.padding.left,
        y: prev.rect.y + prev.rect.height + gapCenterOffset,
        width: Math.max(0, node.rect.width - node.padding.left - node.padding.right),
        height: thickness,
      });
    }
  }
  return out;
}

function nodeCommands(node: LayoutNode, out: RenderCommand[]): void {
  const { id, rect, paint } = node;

  if (node.kind === 'text') {
    if (node.text && node.text.content !== '') {
      out.push({ type: 'text', id, rect, content: node.text.content, style: node.text.style });
    }
    return;
  }

  if (paint.image) {
    out.push({ type: 'image', id, rect, image: paint.image, tint: paint.color, radius: paint.radius });
  } else if (paint.color.a > 0) {
    out.push({ type: 'rectangle', id, rect, color: paint.color, radius: paint.radius });
  }

  const border = paint.border;
  if (border && hasBorder(border.width)) {
    out.push({ type: 'border', id, rect, color: border.color, width: border.width, radius: paint.radius });
  }
  if (border && border.betweenChildren > 0) {
    for (const divider of betweenChildren(node, border.betweenChildren)) {
      out.push({ type: 'rectangle', id, rect: divider, color: border.color, radius: NO_RADIUS });
    }
  }
}

export function toRenderCommands(layout: LayoutTree): RenderCommand[] {
  const parents = new Map<LayoutNode, LayoutNode>();
  const index = (node: LayoutNode) => {
    for (const child of node.children) {
      parents.set(child, node);
      index(child);
    }
  };
  index(layout.root);

  const isFlowAncestor = (ancestor: LayoutNode, node: LayoutNode): boolean => {
    for (let current: LayoutNode | undefined = node; current; current = parents.get(current)) {
      if (current.floating) return false;
      const parent = parents.get(current);
      if (parent === ancestor) return true;
    }
    return false;
  };

  const out: RenderCommand[] = [];
  const open: LayoutNode[] = [];
  const close = (until: (top: LayoutNode) => boolean) => {
    for (let top = open[open.length - 1]; top && !until(top); top = open[open.length - 1]) {
      open.pop();
      out.push({ type: 'scissor-end', id: top.id });
    }
  };

  for (const node of layout.drawOrder) {
    close((top) => isFlowAncestor(top, node));
    nodeCommands(node, out);
    if (node.scroll) {
      out.push({ type: 'scissor-start', id: node.id, rect: node.rect });
      open.push(node);
    }
  }
  close(() => false);
  return out;
}
