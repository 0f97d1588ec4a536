/**
 * Sizing passes, run once per axis.
 *
 * intrinsic (post-order): natural size from content, padding and gaps.
 * distribute (pre-order): percent shares, grow distribution, cross-axis
 * stretch. Sizes only ever grow here; nothing shrinks below intrinsic.
 */

import { clamp, clampSize } from '../shared/util';
import {
  extent,
  flowChildren,
  isMainAxis,
  paddingTotal,
  type Axis,
  type Box,
} from './box';

const EPSILON = 1e-6;

export function intrinsic(box: Box, axis: Axis): number {
  let content: number;
  if (box.kind === 'text') {
    content = extent(box.measured, axis);
  } else {
    for (const child of box.children) intrinsic(child, axis);
    const flow = flowChildren(box);
    const sizes = flow.map((child) => child.size[axis]);
    content = isMainAxis(box, axis)
      ? sizes.reduce((sum, s) => sum + s, 0) + box.childGap * Math.max(0, flow.length - 1)
      : sizes.reduce((max, s) => Math.max(max, s), 0);
    content += paddingTotal(box, axis);
  }
  box.content[axis] = content;

  const sizing = box.sizing[axis];
  switch (sizing.type) {
    case 'fixed':
      box.size[axis] = sizing.size;
      break;
    case 'percent':
      box.size[axis] = 0;
      break;
    case 'fit':
    case 'grow':
      box.size[axis] = clamp(content, sizing.min, sizing.max);
  }
  return box.size[axis];
}

/**
 * Hands out `remaining` in equal shares. A child that reaches its max keeps
 * only what fits; the rest goes round again to the others.
 */
function grow(children: readonly Box[], axis: Axis, remaining: number): void {
  const maxOf = (child: Box) => {
    const sizing = child.sizing[axis];
    return sizing.type === 'grow' ? sizing.max : child.size[axis];
  };

  let active = children.filter(
    (child) => child.sizing[axis].type === 'grow' && child.size[axis] < maxOf(child)
  );
  while (remaining > EPSILON && active.length > 0) {
    const share = remaining / active.length;
    const next: Box[] = [];
    for (const child of active) {
      const room = maxOf(child) - child.size[axis];
      const add = Math.min(share, room);
      child.size[axis] += add;
      remaining -= add;
      if (room > share) next.push(child);
    }
    if (next.length === active.length) break;
    active = next;
  }
}

/** Percent and grow sizing of a child outside the flow, against `reference` */
function sizeFloating(child: Box, axis: Axis, reference: number): void {
  const sizing = child.sizing[axis];
  if (sizing.type === 'percent') {
    child.size[axis] = clampSize(sizing.fraction * reference);
  } else if (sizing.type === 'grow') {
    child.size[axis] = Math.max(child.size[axis], clamp(reference, sizing.min, sizing.max));
  }
}

export function distribute(box: Box, axis: Axis, viewport: number): void {
  const inner = clampSize(box.size[axis] - paddingTotal(box, axis));
  const flow = flowChildren(box);

  if (isMainAxis(box, axis)) {
    const gaps = box.childGap * Math.max(0, flow.length - 1);
    const available = clampSize(inner - gaps);
    for (const child of flow) {
      const sizing = child.sizing[axis];
      if (sizing.type === 'percent') child.size[axis] = sizing.fraction * available;
    }
    const used = flow.reduce((sum, child) => sum + child.size[axis], 0);
    grow(flow, axis, available - used);
  } else {
    for (const child of flow) {
      const sizing = child.sizing[axis];
      if (sizing.type === 'percent') {
        child.size[axis] = sizing.fraction * inner;
      } else if (sizing.type === 'grow') {
        child.size[axis] = Math.max(child.size[axis], clamp(inner, sizing.min, sizing.max));
      }
    }
  }

  for (const child of box.children) {
    if (child.floating) {
      const reference = child.floating.attachTo.type === 'root' ? viewport : box.size[axis];
      sizeFloating(child, axis, reference);
    }
    distribute(child, axis, viewport);
  }
}
