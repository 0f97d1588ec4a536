import { describe, it, expect } from 'vitest';
import { el, layoutOf, nodeOf, page, rectOf } from '../helpers/layout';

const FIXED = (w: number, h: number) =>
  `<width-fixed at="${w}"/><height-fixed at="${h}"/>`;

describe('positioning', () => {
  it('should center a child on both axes', () => {
    const tree = layoutOf(
      page(
        el(
          'box',
          FIXED(200, 100) + '<align-children-x to="center"/><align-children-y to="center"/>',
          el('child', FIXED(50, 20))
        )
      )
    );
    expect(rectOf(tree, 'child')).toEqual({ x: 75, y: 40, width: 50, height: 20 });
  });

  it('should offset the whole run by the leftover space when aligned to the end', () => {
    const tree = layoutOf(
      page(
        el(
          'row',
          FIXED(200, 100) +
            '<child-gap is="10"/><align-children-x to="right"/><align-children-y to="bottom"/>',
          el('a', FIXED(50, 20)) + el('b', FIXED(30, 40))
        )
      )
    );

    expect(rectOf(tree, 'a')).toEqual({ x: 110, y: 80, width: 50, height: 20 });
    expect(rectOf(tree, 'b')).toEqual({ x: 170, y: 60, width: 30, height: 40 });
  });

  it('should stack top to bottom from the padding edge with gaps', () => {
    const tree = layoutOf(
      page(
        el(
          'col',
          '<direction is="ttb"/><padding-top is="5"/><padding-left is="3"/><child-gap is="2"/>',
          el('a', FIXED(10, 10)) + el('b', FIXED(10, 10)) + el('c', FIXED(10, 10))
        )
      )
    );

    expect(['a', 'b', 'c'].map((id) => rectOf(tree, id).y)).toEqual([5, 17, 29]);
    expect(['a', 'b', 'c'].map((id) => rectOf(tree, id).x)).toEqual([3, 3, 3]);
  });

  it('should not apply alignment offsets when children overflow', () => {
    const tree = layoutOf(
      page(
        el(
          'row',
          FIXED(50, 10) + '<align-children-x to="center"/>',
          el('a', FIXED(40, 10)) + el('b', FIXED(40, 10))
        )
      )
    );
    expect(rectOf(tree, 'a').x).toBe(0);
    expect(rectOf(tree, 'b').x).toBe(40);
  });

  it('should place top-level nodes left to right in the viewport', () => {
    const tree = layoutOf(page(el('a', FIXED(10, 10)) + el('b', FIXED(20, 10))));
    expect(rectOf(tree, 'b')).toEqual({ x: 10, y: 0, width: 20, height: 10 });
    expect(tree.root.rect).toEqual({ x: 0, y: 0, width: 800, height: 600 });
  });
});

describe('scroll containers', () => {
  const markup = page(
    el(
      'list',
      FIXED(100, 50) + '<direction is="ttb"/><scroll vertical="true"/>',
      el('a', FIXED(100, 40), el('deep', FIXED(10, 10))) +
        el('b', FIXED(100, 40)) +
        el('c', FIXED(100, 40))
    )
  );

  it('should shift children by the host scroll offset on enabled axes only', () => {
    const tree = layoutOf(markup, {}, undefined, undefined, {
      scrollOffsets: { list: { x: -5, y: -30 } },
    });

    expect(rectOf(tree, 'list')).toEqual({ x: 0, y: 0, width: 100, height: 50 });
    expect(['a', 'b', 'c'].map((id) => rectOf(tree, id).y)).toEqual([-30, 10, 50]);
    expect(rectOf(tree, 'a').x).toBe(0);
    expect(nodeOf(tree, 'list').scroll).toEqual({
      vertical: true,
      horizontal: false,
      offset: { x: 0, y: -30 },
      contentSize: { width: 100, height: 120 },
    });
  });

  it('should clip descendants to the container', () => {
    const tree = layoutOf(markup);
    const clip = { x: 0, y: 0, width: 100, height: 50 };

    expect(nodeOf(tree, 'list').clip).toBeNull();
    expect(nodeOf(tree, 'a').clip).toEqual(clip);
    expect(nodeOf(tree, 'c').clip).toEqual(clip);
    expect(nodeOf(tree, 'deep').clip).toEqual(clip);
  });

  it('should intersect nested clips', () => {
    const tree = layoutOf(
      page(
        el(
          'outer',
          FIXED(100, 100) + '<scroll vertical="true"/><padding-left is="60"/>',
          el('inner', FIXED(100, 50) + '<scroll horizontal="true"/>', el('leaf', FIXED(10, 10)))
        )
      )
    );
    expect(nodeOf(tree, 'leaf').clip).toEqual({ x: 60, y: 0, width: 40, height: 50 });
  });
});
