import type { BindingDiagnostic } from '../bindings/scope';
import type {
  AlignX,
  AlignY,
  AttachPoint,
  AttachTarget,
  Color,
  Corners,
  Direction,
  Sides,
  TextAlign,
} from '../compiler/types';

export interface Point {
  readonly x: number;
  readonly y: number;
}

export interface Size {
  readonly width: number;
  readonly height: number;
}

export interface Rect extends Point, Size {}

export interface TextStyle {
  readonly fontId: number;
  readonly fontSize: number;
  /** 0 means "use fontSize" */
  readonly lineHeight: number;
  readonly align: TextAlign;
  readonly color: Color;
}

/** Pure function; called once per bound text node per frame */
export type TextMeasurer = (text: string, style: TextStyle) => Size;

export interface ResolvedBorder {
  readonly color: Color;
  readonly width: Sides;
  readonly betweenChildren: number;
}

export interface LayoutPaint {
  readonly color: Color;
  readonly border: ResolvedBorder | null;
  readonly radius: Corners;
  /** Texture name */
  readonly image: string | null;
}

export interface LayoutText {
  readonly content: string;
  readonly style: TextStyle;
}

export interface LayoutScroll {
  readonly vertical: boolean;
  readonly horizontal: boolean;
  readonly offset: Point;
  /** Extent of the children plus padding, before clipping */
  readonly contentSize: Size;
}

export interface LayoutFloating {
  readonly zIndex: number;
  readonly capturePointer: boolean;
  readonly attachTo: AttachTarget;
  readonly parentPoint: AttachPoint;
  readonly elementPoint: AttachPoint;
  readonly offset: Point;
}

export interface LayoutHandlers {
  readonly click?: string;
  readonly rightClick?: string;
}

export interface LayoutNode {
  readonly kind: 'element' | 'text';
  /** Stable element id */
  readonly id: string;
  /** Template position the node was instantiated from */
  readonly path: string;
  readonly rect: Rect;
  readonly depth: number;
  readonly direction: Direction;
  readonly alignX: AlignX;
  readonly alignY: AlignY;
  readonly padding: Sides;
  readonly childGap: number;
  readonly paint: LayoutPaint;
  readonly text?: LayoutText;
  /** Intersection of every enclosing scroll container; null when unclipped */
  readonly clip: Rect | null;
  readonly scroll?: LayoutScroll;
  readonly floating: LayoutFloating | null;
  readonly handlers: LayoutHandlers;
  readonly children: readonly LayoutNode[];
}

export interface LayoutTree {
  readonly page: string;
  readonly viewport: Size;
  /** Synthetic viewport container; not part of drawOrder or byId */
  readonly root: LayoutNode;
  readonly drawOrder: readonly LayoutNode[];
  readonly byId: ReadonlyMap<string, LayoutNode>;
  readonly diagnostics: readonly BindingDiagnostic[];
}

export interface SolveOptions {
  measureText?: TextMeasurer;
  /** Host-owned scroll offsets of scroll containers, by stable id */
  scrollOffsets?: Readonly<Record<string, Point>>;
}
