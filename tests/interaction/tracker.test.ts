import { describe, it, expect, beforeEach } from 'vitest';
import { hitTest, InteractionTracker } from '../../src/interaction/tracker';
import type { LayoutTree } from '../../src/layout/types';
import { el, layoutOf, page } from '../helpers/layout';

const FIXED = (w: number, h: number) =>
  `<width-fixed at="${w}"/><height-fixed at="${h}"/>`;

/** `a` at {0, 0} and `b` at {100, 0}, both 100x100 */
const twoBoxes = (): LayoutTree =>
  layoutOf(page(el('root', '', el('a', FIXED(100, 100)) + el('b', FIXED(100, 100)))));

const at = (x: number, y: number, buttons = 0) => ({ x, y, buttons });

describe('hitTest', () => {
  it('should return the topmost element under the pointer', () => {
    const tree = twoBoxes();
    expect(hitTest(tree, 50, 50)?.id).toBe('a');
    expect(hitTest(tree, 150, 50)?.id).toBe('b');
    expect(hitTest(tree, 250, 50)).toBeUndefined();
  });

  it('should treat rect edges as half open', () => {
    const tree = twoBoxes();
    expect(hitTest(tree, 100, 0)?.id).toBe('b');
    expect(hitTest(tree, 0, 100)).toBeUndefined();
  });

  it('should ignore the parts of an element its clip hides', () => {
    const tree = layoutOf(
      page(
        el(
          'scroller',
          '<scroll vertical="true"/>' + FIXED(50, 50),
          el('inner', FIXED(100, 100))
        )
      )
    );
    expect(hitTest(tree, 25, 25)?.id).toBe('inner');
    expect(hitTest(tree, 75, 25)).toBeUndefined();
  });

  it('should let the pointer through floating subtrees that do not capture it', () => {
    const markup = (capture: string) =>
      page(
        el(
          'base',
          FIXED(100, 100),
          el(
            'overlay',
            `<floating-capture-pointer state="${capture}"/>` + FIXED(100, 100),
            el('deep', FIXED(10, 10))
          )
        )
      );

    expect(hitTest(layoutOf(markup('false')), 5, 5)?.id).toBe('base');
    expect(hitTest(layoutOf(markup('true')), 5, 5)?.id).toBe('deep');
    expect(hitTest(layoutOf(markup('true')), 50, 50)?.id).toBe('overlay');
  });
});

describe('InteractionTracker', () => {
  let tracker: InteractionTracker;
  let tree: LayoutTree;

  beforeEach(() => {
    tracker = new InteractionTracker();
    tree = twoBoxes();
  });

  it('should hover exactly one element', () => {
    const delta = tracker.update(tree, at(50, 50));
    const view = tracker.view();

    expect(delta.entered).toEqual(['a']);
    expect(view.get('a')).toEqual({ hovered: true, clicked: false, rightClicked: false });
    expect(view.get('root')?.hovered).toBe(false);
    expect(view.get('b')?.hovered).toBe(false);
  });

  it('should report leave and enter when the pointer moves across', () => {
    tracker.update(tree, at(50, 50));
    const delta = tracker.update(tree, at(150, 50));

    expect(delta.left).toEqual(['a']);
    expect(delta.entered).toEqual(['b']);
  });

  it('should press on the button edge, hold and release', () => {
    tracker.update(tree, at(150, 50));

    expect(tracker.update(tree, at(150, 50, 1)).pressed).toEqual(['b']);
    expect(tracker.view().get('b')?.clicked).toBe(true);

    expect(tracker.update(tree, at(150, 50, 1)).pressed).toEqual([]);
    expect(tracker.view().get('b')?.clicked).toBe(true);

    const released = tracker.update(tree, at(150, 50, 0));
    expect(released.released).toEqual(['b']);
    expect(tracker.view().get('b')?.clicked).toBe(false);
  });

  it('should not press an element entered with the button already down', () => {
    tracker.update(tree, at(150, 50, 1));
    const delta = tracker.update(tree, at(50, 50, 1));

    expect(delta.released).toEqual(['b']);
    expect(delta.left).toEqual(['b']);
    expect(delta.entered).toEqual(['a']);
    expect(delta.pressed).toEqual([]);
    expect(tracker.view().get('a')?.clicked).toBe(false);
  });

  it('should track the secondary button separately', () => {
    const delta = tracker.update(tree, at(50, 50, 2));

    expect(delta.rightPressed).toEqual(['a']);
    expect(delta.pressed).toEqual([]);
    expect(tracker.view().get('a')).toEqual({ hovered: true, clicked: false, rightClicked: true });
  });

  it('should clear hover when the pointer leaves the surface', () => {
    tracker.update(tree, at(50, 50));
    const delta = tracker.update(tree, null);

    expect(delta.left).toEqual(['a']);
    expect(tracker.view().get('a')?.hovered).toBe(false);
  });

  it('should prune ids the layout no longer contains', () => {
    tracker.update(tree, at(50, 50, 1));
    const delta = tracker.update(layoutOf(page(el('root', ''))), at(50, 50, 1));
    const view = tracker.view();

    expect(delta.left).toEqual(['a']);
    expect(delta.released).toEqual(['a']);
    expect(view.size).toBe(1);
    expect(view.has('a')).toBe(false);
    expect([...view.ids()]).toEqual(['root']);
  });

  it('should hand out views that keep their own snapshot', () => {
    tracker.update(tree, at(50, 50));
    const earlier = tracker.view();
    tracker.update(tree, at(150, 50));

    expect(earlier.get('a')?.hovered).toBe(true);
    expect(tracker.view().get('a')?.hovered).toBe(false);
  });

  it('should start over after reset', () => {
    tracker.update(tree, at(50, 50, 1));
    tracker.reset();

    expect(tracker.view().size).toBe(0);
    expect(tracker.update(tree, at(50, 50, 1)).pressed).toEqual(['a']);
  });
});
