/**
 * Interaction State Tracker
 *
 * The only state that outlives a frame. update() is the single transition
 * function: it hit-tests the new layout, derives the next flags for every
 * element, prunes ids the layout no longer contains, and swaps in a fresh
 * map. Views handed out earlier keep reading the map they were made from.
 */

import type { LayoutNode, LayoutTree } from '../layout/types';
import type {
  InteractionDelta,
  InteractionFlags,
  InteractionView,
  PointerState,
} from './types';

const PRIMARY = 1;
const SECONDARY = 2;

const IDLE: InteractionFlags = Object.freeze({
  hovered: false,
  clicked: false,
  rightClicked: false,
});

function contains(
  rect: { x: number; y: number; width: number; height: number },
  x: number,
  y: number
): boolean {
  return x >= rect.x && x < rect.x + rect.width && y >= rect.y && y < rect.y + rect.height;
}

/** Nodes inside a floating subtree that lets the pointer through */
function passThrough(root: LayoutNode): Set<LayoutNode> {
  const out = new Set<LayoutNode>();
  const walk = (node: LayoutNode, inside: boolean) => {
    const skip = node.floating ? !node.floating.capturePointer : inside;
    if (skip) out.add(node);
    for (const child of node.children) walk(child, skip);
  };
  walk(root, false);
  return out;
}

/**
 * Last element in paint order under the pointer, inside its clip.
 * Returns undefined when nothing is hit.
 */
export function hitTest(layout: LayoutTree, x: number, y: number): LayoutNode | undefined {
  const skipped = passThrough(layout.root);
  for (let i = layout.drawOrder.length - 1; i >= 0; i--) {
    const node = layout.drawOrder[i];
    if (!node || node.kind !== 'element' || skipped.has(node)) continue;
    if (!contains(node.rect, x, y)) continue;
    if (node.clip && !contains(node.clip, x, y)) continue;
    return node;
  }
  return undefined;
}

export class InteractionTracker {
  private state = new Map<string, InteractionFlags>();
  private buttons = 0;

  /** Snapshot of the current state; stays valid across later updates */
  view(): InteractionView {
    const state = this.state;
    return {
      get: (id) => state.get(id),
      has: (id) => state.has(id),
      size: state.size,
      ids: () => state.keys(),
    };
  }

  update(layout: LayoutTree, pointer: PointerState | null): InteractionDelta {
    const buttons = pointer ? pointer.buttons : 0;
    const hit = pointer ? hitTest(layout, pointer.x, pointer.y) : undefined;
    const primaryEdge = (buttons & PRIMARY) !== 0 && (this.buttons & PRIMARY) === 0;
    const secondaryEdge = (buttons & SECONDARY) !== 0 && (this.buttons & SECONDARY) === 0;

    const previous = this.state;
    const next = new Map<string, InteractionFlags>();
    const delta: Record<keyof InteractionDelta, string[]> = {
      pressed: [],
      rightPressed: [],
      released: [],
      entered: [],
      left: [],
    };

    const record = (id: string, before: InteractionFlags, after: InteractionFlags) => {
      if (!before.clicked && after.clicked) delta.pressed.push(id);
      if (!before.rightClicked && after.rightClicked) delta.rightPressed.push(id);
      if ((before.clicked && !after.clicked) || (before.rightClicked && !after.rightClicked)) {
        delta.released.push(id);
      }
      if (!before.hovered && after.hovered) delta.entered.push(id);
      if (before.hovered && !after.hovered) delta.left.push(id);
    };

    for (const node of layout.drawOrder) {
      if (node.kind !== 'element' || next.has(node.id)) continue;
      const before = previous.get(node.id) ?? IDLE;
      const hovered = hit !== undefined && hit.id === node.id;
      const after: InteractionFlags = {
        hovered,
        clicked:
          hovered &&
          (buttons & PRIMARY) !== 0 &&
          (before.clicked || primaryEdge),
        rightClicked:
          hovered &&
          (buttons & SECONDARY) !== 0 &&
          (before.rightClicked || secondaryEdge),
      };
      record(node.id, before, after);
      next.set(node.id, Object.freeze(after));
    }

    // Pruned ids read as idle in this frame's delta.
    for (const [id, before] of previous) {
      if (!next.has(id)) record(id, before, IDLE);
    }

    this.state = next;
    this.buttons = buttons;
    return delta;
  }

  /** Drops all state, e.g. when the active page changes */
  reset(): void {
    this.state = new Map();
    this.buttons = 0;
  }
}
