/**
 * Event Emitter
 *
 * Turns this frame's press transitions into named host events. The sink is
 * called synchronously in delta order; whatever it throws reaches the
 * caller untouched and no later event of the frame is sent.
 */

import type { InteractionDelta } from '../interaction/types';
import type { LayoutTree } from '../layout/types';

export type PointerButton = 'primary' | 'secondary';

export interface LayoutEvent {
  readonly name: string;
  readonly elementId: string;
  readonly button: PointerButton;
}

export type EventSink = (event: LayoutEvent) => void;

export function emit(
  layout: LayoutTree,
  delta: InteractionDelta,
  sink: EventSink
): LayoutEvent[] {
  const events: LayoutEvent[] = [];
  const fired = new Set<string>();

  const fire = (elementId: string, button: PointerButton) => {
    if (fired.has(elementId)) return;
    const node = layout.byId.get(elementId);
    const name = button === 'primary' ? node?.handlers.click : node?.handlers.rightClick;
    if (!name) return;
    fired.add(elementId);
    const event: LayoutEvent = Object.freeze({ name, elementId, button });
    events.push(event);
    sink(event);
  };

  for (const id of delta.pressed) fire(id, 'primary');
  for (const id of delta.rightPressed) fire(id, 'secondary');
  return events;
}
