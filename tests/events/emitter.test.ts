import { describe, it, expect, vi } from 'vitest';
import { emit, type LayoutEvent } from '../../src/events/emitter';
import { InteractionTracker } from '../../src/interaction/tracker';
import type { InteractionDelta } from '../../src/interaction/types';
import { el, fixture, layoutOf, page } from '../helpers/layout';

const NO_CHANGE: InteractionDelta = {
  pressed: [],
  rightPressed: [],
  released: [],
  entered: [],
  left: [],
};

describe('emit', () => {
  it('should emit the bound event of the pressed list item', () => {
    const tree = layoutOf(fixture('documents.xml'), {
      Documents: [{ title: 'one' }, { title: 'two' }, { title: 'three' }],
    });
    const tracker = new InteractionTracker();
    const sink = vi.fn();

    const events = emit(tree, tracker.update(tree, { x: 50, y: 30, buttons: 1 }), sink);

    expect(events).toEqual([{ name: 'Clicked', elementId: 'e0.0.0[1]', button: 'primary' }]);
    expect(sink).toHaveBeenCalledTimes(1);
    expect(sink).toHaveBeenCalledWith(events[0]);
  });

  it('should emit nothing while the button is held', () => {
    const tree = layoutOf(fixture('documents.xml'), { Documents: [{ title: 'one' }] });
    const tracker = new InteractionTracker();
    const sink = vi.fn();

    emit(tree, tracker.update(tree, { x: 5, y: 5, buttons: 1 }), sink);
    emit(tree, tracker.update(tree, { x: 5, y: 5, buttons: 1 }), sink);

    expect(sink).toHaveBeenCalledTimes(1);
  });

  const handlers = page(
    el('both', '<clicked emit="Open"/><right-clicked emit="Menu"/>') +
      el('plain', '') +
      el('right-only', '<right-clicked emit="Menu"/>')
  );

  it('should send at most one event per element, primary first', () => {
    const tree = layoutOf(handlers);
    const sink = vi.fn();

    const events = emit(
      tree,
      { ...NO_CHANGE, pressed: ['both'], rightPressed: ['both', 'right-only'] },
      sink
    );

    expect(events).toEqual([
      { name: 'Open', elementId: 'both', button: 'primary' },
      { name: 'Menu', elementId: 'right-only', button: 'secondary' },
    ]);
  });

  it('should skip ids without a handler or missing from the layout', () => {
    const tree = layoutOf(handlers);
    const sink = vi.fn();

    const events = emit(
      tree,
      { ...NO_CHANGE, pressed: ['plain', 'right-only', 'gone'] },
      sink
    );

    expect(events).toEqual([]);
    expect(sink).not.toHaveBeenCalled();
  });

  it('should let sink errors propagate and stop the frame', () => {
    const tree = layoutOf(handlers);
    const seen: LayoutEvent[] = [];
    const sink = (event: LayoutEvent) => {
      seen.push(event);
      throw new Error('host failed');
    };

    expect(() =>
      emit(tree, { ...NO_CHANGE, pressed: ['both'], rightPressed: ['right-only'] }, sink)
    ).toThrow('host failed');
    expect(seen.map((e) => e.elementId)).toEqual(['both']);
  });
});
