/**
 * Working boxes
 *
 * The solver's scratch tree. Boxes are created by the bind pass and
 * written in place by the sizing and positioning passes; solve() copies
 * the result into frozen LayoutNodes before returning, so no Box ever
 * leaves a frame.
 */

import type { AlignX, AlignY, Direction, Sides } from '../compiler/types';
import type {
  LayoutFloating,
  LayoutHandlers,
  LayoutPaint,
  LayoutText,
  Rect,
  Size,
} from './types';

export type Axis = 'x' | 'y';

export type BoxSizing =
  | { readonly type: 'fit'; readonly min: number; readonly max: number }
  | { readonly type: 'grow'; readonly min: number; readonly max: number }
  | { readonly type: 'fixed'; readonly size: number }
  | { readonly type: 'percent'; readonly fraction: number };

export interface Box {
  readonly kind: 'element' | 'text';
  readonly id: string;
  readonly path: string;
  readonly depth: number;
  /** Pre-order creation index; the declaration-order tie-break */
  readonly seq: number;
  readonly sizing: Readonly<Record<Axis, BoxSizing>>;
  readonly direction: Direction;
  readonly padding: Sides;
  readonly childGap: number;
  readonly alignX: AlignX;
  readonly alignY: AlignY;
  readonly paint: LayoutPaint;
  readonly text?: LayoutText;
  /** Measured text extent; zero for elements */
  readonly measured: Size;
  readonly scroll: { readonly vertical: boolean; readonly horizontal: boolean } | null;
  readonly floating: LayoutFloating | null;
  readonly handlers: LayoutHandlers;
  readonly children: Box[];

  size: Record<Axis, number>;
  pos: Record<Axis, number>;
  /** Children extent plus padding, per axis */
  content: Record<Axis, number>;
  clip: Rect | null;
  scrollOffset: Record<Axis, number>;
}

export function isMainAxis(box: Box, axis: Axis): boolean {
  return (box.direction === 'ltr') === (axis === 'x');
}

export function paddingStart(box: Box, axis: Axis): number {
  return axis === 'x' ? box.padding.left : box.padding.top;
}

export function paddingTotal(box: Box, axis: Axis): number {
  return axis === 'x'
    ? box.padding.left + box.padding.right
    : box.padding.top + box.padding.bottom;
}

export function flowChildren(box: Box): Box[] {
  return box.children.filter((child) => !child.floating);
}

export function rectOf(box: Box): Rect {
  return { x: box.pos.x, y: box.pos.y, width: box.size.x, height: box.size.y };
}

export function extent(size: Size, axis: Axis): number {
  return axis === 'x' ? size.width : size.height;
}
