export interface InteractionFlags {
  readonly hovered: boolean;
  readonly clicked: boolean;
  readonly rightClicked: boolean;
}

/** Read-only view of the tracker's state, as of the previous update */
export interface InteractionView {
  get(id: string): InteractionFlags | undefined;
  has(id: string): boolean;
  readonly size: number;
  ids(): IterableIterator<string>;
}

/** Pointer position in viewport coordinates; `buttons` is 1 primary, 2 secondary */
export interface PointerState {
  readonly x: number;
  readonly y: number;
  readonly buttons: number;
}

export interface InteractionDelta {
  /** Ids whose `clicked` went false -> true */
  readonly pressed: readonly string[];
  /** Ids whose `rightClicked` went false -> true */
  readonly rightPressed: readonly string[];
  /** Ids whose `clicked` or `rightClicked` went true -> false */
  readonly released: readonly string[];
  readonly entered: readonly string[];
  readonly left: readonly string[];
}

export const EMPTY_VIEW: InteractionView = {
  get: () => undefined,
  has: () => false,
  size: 0,
  ids: () => new Map<string, never>().keys(),
};
