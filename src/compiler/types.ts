/**
 * Intermediate Template types
 *
 * Everything here is produced once per compile and deep-frozen; the solver
 * only ever reads it.
 */

export interface Literal<T> {
  readonly type: 'literal';
  readonly value: T;
}

export interface DynamicRef {
  readonly type: 'ref';
  readonly key: string;
}

/** A value fixed at compile time or looked up in the binding scope per frame */
export type ValueRef<T> = Literal<T> | DynamicRef;

/** `set-*` gives a literal, `get-*` rebinds to a key of the enclosing context */
export type LocalBinding = Literal<string> | DynamicRef;

export interface Color {
  readonly r: number;
  readonly g: number;
  readonly b: number;
  /** 0..1 */
  readonly a: number;
}

export const TRANSPARENT: Color = Object.freeze({ r: 0, g: 0, b: 0, a: 0 });
export const BLACK: Color = Object.freeze({ r: 0, g: 0, b: 0, a: 1 });

export type Sizing =
  | { readonly type: 'fit'; readonly min: number; readonly max: number }
  | { readonly type: 'grow'; readonly min: number; readonly max: number }
  | { readonly type: 'fixed'; readonly size: ValueRef<number> }
  | { readonly type: 'percent'; readonly fraction: number };

export interface Sides {
  readonly top: number;
  readonly right: number;
  readonly bottom: number;
  readonly left: number;
}

export interface Corners {
  readonly topLeft: number;
  readonly topRight: number;
  readonly bottomRight: number;
  readonly bottomLeft: number;
}

export type Direction = 'ttb' | 'ltr';
export type AlignX = 'left' | 'center' | 'right';
export type AlignY = 'top' | 'center' | 'bottom';

export const ATTACH_POINTS = [
  'top-left',
  'center-left',
  'bottom-left',
  'top-center',
  'center',
  'bottom-center',
  'top-right',
  'center-right',
  'bottom-right',
] as const;

export type AttachPoint = (typeof ATTACH_POINTS)[number];

export type AttachTarget =
  | { readonly type: 'parent' }
  | { readonly type: 'root' }
  | { readonly type: 'element'; readonly id: string };

export interface FloatingSpec {
  readonly offsetX: ValueRef<number>;
  readonly offsetY: ValueRef<number>;
  readonly parentPoint: AttachPoint;
  readonly elementPoint: AttachPoint;
  readonly zIndex: number;
  readonly attachTo: AttachTarget;
  readonly capturePointer: boolean;
}

export interface BorderSpec {
  readonly color: ValueRef<Color>;
  readonly width: Sides;
  readonly betweenChildren: number;
}

export interface StyleProps {
  readonly id?: ValueRef<string>;
  readonly width: Sizing;
  readonly height: Sizing;
  readonly direction: Direction;
  readonly padding: Sides;
  readonly childGap: number;
  readonly alignX: AlignX;
  readonly alignY: AlignY;
  readonly color?: ValueRef<Color>;
  readonly radius: Corners;
  readonly border?: BorderSpec;
  readonly floating?: FloatingSpec;
  readonly scroll?: { readonly vertical: boolean; readonly horizontal: boolean };
  readonly image?: ValueRef<string>;
}

/**
 * One config tag. Base props are folded at compile time; state overrides
 * keep their command lists and are replayed over the base while the state
 * is active.
 */
export type ConfigCommand =
  | { readonly type: 'id'; readonly value: ValueRef<string> }
  | { readonly type: 'width'; readonly sizing: Sizing }
  | { readonly type: 'height'; readonly sizing: Sizing }
  | { readonly type: 'padding'; readonly sides: Partial<Sides> }
  | { readonly type: 'child-gap'; readonly value: number }
  | { readonly type: 'direction'; readonly value: Direction }
  | { readonly type: 'align-x'; readonly value: AlignX }
  | { readonly type: 'align-y'; readonly value: AlignY }
  | { readonly type: 'color'; readonly value: ValueRef<Color> }
  | { readonly type: 'radius'; readonly corners: Partial<Corners> }
  | { readonly type: 'border-color'; readonly value: ValueRef<Color> }
  | { readonly type: 'border-width'; readonly sides: Partial<Sides> }
  | { readonly type: 'border-between-children'; readonly value: number }
  | {
      readonly type: 'scroll';
      readonly vertical: boolean;
      readonly horizontal: boolean;
    }
  | { readonly type: 'image'; readonly src: ValueRef<string> }
  | { readonly type: 'floating'; readonly patch: Partial<FloatingSpec> };

export type InteractionVariant = 'hovered' | 'clicked' | 'rightClicked';

export interface StyleSpec {
  readonly base: StyleProps;
  readonly hovered: readonly ConfigCommand[];
  readonly clicked: readonly ConfigCommand[];
  readonly rightClicked: readonly ConfigCommand[];
  readonly onClick?: ValueRef<string>;
  readonly onRightClick?: ValueRef<string>;
}

export type TextAlign = 'left' | 'center' | 'right';

export interface TextStyleSpec {
  readonly fontId: number;
  readonly fontSize: number;
  /** 0 means "use fontSize" */
  readonly lineHeight: number;
  readonly align: TextAlign;
  readonly color: ValueRef<Color>;
}

export interface ElementTemplate {
  readonly kind: 'element';
  readonly path: string;
  readonly style: StyleSpec;
  readonly children: readonly TemplateNode[];
}

export interface TextTemplate {
  readonly kind: 'text';
  readonly path: string;
  readonly style: TextStyleSpec;
  readonly content: ValueRef<string>;
}

export interface ListTemplate {
  readonly kind: 'list';
  readonly path: string;
  readonly sourceKey: string;
  readonly itemBindings: Readonly<Record<string, LocalBinding>>;
  readonly body: readonly TemplateNode[];
}

export interface ConditionalTemplate {
  readonly kind: 'conditional';
  readonly predicateKey: string;
  readonly negate: boolean;
  readonly body: TemplateNode;
}

export type TemplateNode =
  | ElementTemplate
  | TextTemplate
  | ListTemplate
  | ConditionalTemplate;

export interface IntermediateTemplate {
  readonly page: string;
  readonly roots: readonly TemplateNode[];
  /** Names of the reusables declared in the compilation unit */
  readonly reusables: readonly string[];
}
