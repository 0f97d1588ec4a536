/**
 * Positioning and floating placement
 */

import type { AttachPoint } from '../compiler/types';
import {
  flowChildren,
  isMainAxis,
  paddingStart,
  paddingTotal,
  rectOf,
  type Axis,
  type Box,
} from './box';
import type { Point, Rect } from './types';

export interface PositionEnv {
  readonly scrollOffsets: Readonly<Record<string, Point>>;
  /** Floating boxes met during positioning, placed once flow geometry is final */
  readonly queue: Box[];
}

function alignFactor(box: Box, axis: Axis): number {
  const align = axis === 'x' ? box.alignX : box.alignY;
  if (align === 'center') return 0.5;
  if (align === 'right' || align === 'bottom') return 1;
  return 0;
}

function intersect(a: Rect | null, b: Rect): Rect {
  if (!a) return b;
  const x = Math.max(a.x, b.x);
  const y = Math.max(a.y, b.y);
  const right = Math.min(a.x + a.width, b.x + b.width);
  const bottom = Math.min(a.y + a.height, b.y + b.height);
  return { x, y, width: Math.max(0, right - x), height: Math.max(0, bottom - y) };
}

function scrollOffsetOf(box: Box, env: PositionEnv): Point {
  if (!box.scroll) return { x: 0, y: 0 };
  const offset = Object.prototype.hasOwnProperty.call(env.scrollOffsets, box.id)
    ? env.scrollOffsets[box.id]
    : undefined;
  const x = offset && box.scroll.horizontal && Number.isFinite(offset.x) ? offset.x : 0;
  const y = offset && box.scroll.vertical && Number.isFinite(offset.y) ? offset.y : 0;
  return { x, y };
}

/** Places the children of an already placed box, recursively. */
export function position(box: Box, env: PositionEnv): void {
  const offset = scrollOffsetOf(box, env);
  box.scrollOffset = { x: offset.x, y: offset.y };
  const childClip = box.scroll ? intersect(box.clip, rectOf(box)) : box.clip;
  const flow = flowChildren(box);

  for (const axis of ['x', 'y'] as const) {
    const inner = Math.max(0, box.size[axis] - paddingTotal(box, axis));
    const start = box.pos[axis] + paddingStart(box, axis) + box.scrollOffset[axis];
    const factor = alignFactor(box, axis);

    if (isMainAxis(box, axis)) {
      const used =
        flow.reduce((sum, child) => sum + child.size[axis], 0) +
        box.childGap * Math.max(0, flow.length - 1);
      let cursor = start + Math.max(0, inner - used) * factor;
      for (const child of flow) {
        child.pos[axis] = cursor;
        cursor += child.size[axis] + box.childGap;
      }
    } else {
      for (const child of flow) {
        child.pos[axis] = start + Math.max(0, inner - child.size[axis]) * factor;
      }
    }
  }

  for (const child of box.children) {
    if (child.floating) {
      env.queue.push(child);
      continue;
    }
    child.clip = childClip;
    position(child, env);
  }
}

export function pointOf(rect: Rect, point: AttachPoint): Point {
  const [vertical, horizontal] =
    point === 'center' ? ['center', 'center'] : point.split('-');
  const fx = horizontal === 'left' ? 0 : horizontal === 'right' ? 1 : 0.5;
  const fy = vertical === 'top' ? 0 : vertical === 'bottom' ? 1 : 0.5;
  return { x: rect.x + rect.width * fx, y: rect.y + rect.height * fy };
}

/**
 * target.point(parentPoint) - own.point(elementPoint) + offset.
 * Floating boxes are never clipped by their ancestors.
 */
export function placeFloating(box: Box, target: Rect): void {
  const floating = box.floating;
  if (!floating) return;
  const anchor = pointOf(target, floating.parentPoint);
  const own = pointOf({ x: 0, y: 0, width: box.size.x, height: box.size.y }, floating.elementPoint);
  box.pos.x = anchor.x - own.x + floating.offset.x;
  box.pos.y = anchor.y - own.y + floating.offset.y;
  box.clip = null;
}
