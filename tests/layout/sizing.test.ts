import { describe, it, expect } from 'vitest';
import { compileOrThrow } from '../../src/compiler/compile';
import { createBindingContext } from '../../src/bindings/context';
import { solve } from '../../src/layout/solve';
import { el, fixture, layoutOf, nodeOf, page, rectOf } from '../helpers/layout';

const FIXED = (w: number, h: number) =>
  `<width-fixed at="${w}"/><height-fixed at="${h}"/>`;

describe('sizing', () => {
  it('should resolve header and grow body in an 800x600 viewport', () => {
    const tree = solve(
      compileOrThrow(fixture('dashboard.xml')),
      createBindingContext({ title: 'Overview' }),
      { width: 800, height: 600 }
    );

    expect(rectOf(tree, 'root')).toEqual({ x: 0, y: 0, width: 800, height: 600 });
    expect(rectOf(tree, 'header')).toEqual({ x: 16, y: 16, width: 768, height: 60 });
    expect(rectOf(tree, 'body')).toEqual({ x: 16, y: 92, width: 768, height: 492 });
  });

  it('should keep fixed sizes regardless of viewport', () => {
    const markup = page(el('a', FIXED(120, 30), el('b', FIXED(40, 10))));
    for (const viewport of [
      { width: 800, height: 600 },
      { width: 50, height: 20 },
      { width: 0, height: 0 },
    ]) {
      const tree = layoutOf(markup, {}, viewport);
      expect(rectOf(tree, 'a')).toMatchObject({ width: 120, height: 30 });
      expect(rectOf(tree, 'b')).toMatchObject({ width: 40, height: 10 });
    }
  });

  it('should fill the main axis exactly with grow children', () => {
    const tree = layoutOf(
      page(
        el(
          'row',
          '<width-fixed at="300"/><padding-all is="10"/><child-gap is="5"/>',
          el('a', '<width-fixed at="50"/>') + el('b', '<width-grow/>') + el('c', '<width-grow/>')
        )
      )
    );

    expect(rectOf(tree, 'a')).toMatchObject({ x: 10, width: 50 });
    expect(rectOf(tree, 'b')).toMatchObject({ x: 65, width: 110 });
    expect(rectOf(tree, 'c')).toMatchObject({ x: 180, width: 110 });
    const sum = ['a', 'b', 'c'].reduce((total, id) => total + rectOf(tree, id).width, 0);
    expect(sum).toBe(300 - 2 * 10 - 2 * 5);
  });

  it('should redistribute what a capped grow child cannot take', () => {
    const tree = layoutOf(
      page(
        el(
          'row',
          '<width-fixed at="300"/>',
          el('a', '<width-grow max="50"/>') + el('b', '<width-grow/>') + el('c', '<width-grow/>')
        )
      )
    );

    expect(rectOf(tree, 'a').width).toBe(50);
    expect(rectOf(tree, 'b').width).toBe(125);
    expect(rectOf(tree, 'c').width).toBe(125);
  });

  it('should give grow children nothing in a full or overflowing container', () => {
    const full = layoutOf(
      page(el('row', '<width-fixed at="100"/>', el('a', '<width-fixed at="100"/>') + el('g', '<width-grow/>')))
    );
    const over = layoutOf(
      page(
        el(
          'row',
          '<width-fixed at="100"/>',
          el('a', '<width-fixed at="80"/>') + el('b', '<width-fixed at="80"/>') + el('g', '<width-grow/>')
        )
      )
    );

    expect(rectOf(full, 'g').width).toBe(0);
    expect(rectOf(over, 'g').width).toBe(0);
  });

  it('should stretch cross-axis grow children within min and max', () => {
    const tree = layoutOf(
      page(
        el(
          'row',
          FIXED(200, 100) + '<padding-all is="10"/>',
          el('a', '<height-grow/>') + el('b', '<height-grow max="30"/>') + el('c', '<height-fit/>')
        )
      )
    );

    expect(rectOf(tree, 'a').height).toBe(80);
    expect(rectOf(tree, 'b').height).toBe(30);
    expect(rectOf(tree, 'c').height).toBe(0);
  });

  it('should size percent children against the inner extent', () => {
    const tree = layoutOf(
      page(
        el(
          'row',
          FIXED(400, 100) + '<child-gap is="20"/>',
          el('half', '<width-percent at="0.5"/><height-percent at="0.5"/>') +
            el('rest', '<width-fixed at="100"/>')
        )
      )
    );

    expect(rectOf(tree, 'half')).toEqual({ x: 0, y: 0, width: 190, height: 50 });
    expect(rectOf(tree, 'rest')).toMatchObject({ x: 210, width: 100 });
  });

  it('should clamp fit sizes to min and max', () => {
    const tree = layoutOf(
      page(
        el('wide', '<width-fit min="100"/>') +
          el('narrow', '<width-fit max="50"/>', el('inner', FIXED(80, 10)))
      )
    );

    expect(rectOf(tree, 'wide').width).toBe(100);
    expect(rectOf(tree, 'narrow').width).toBe(50);
  });

  it('should size an empty container to its padding', () => {
    const tree = layoutOf(page(el('empty', '<padding-all is="12"/>')));
    expect(rectOf(tree, 'empty')).toEqual({ x: 0, y: 0, width: 24, height: 24 });
  });

  it('should sum children, gaps and padding on the main axis and take the max across', () => {
    const tree = layoutOf(
      page(
        el(
          'col',
          '<direction is="ttb"/><padding-all is="4"/><child-gap is="6"/>',
          el('a', FIXED(30, 10)) + el('b', FIXED(50, 20))
        )
      )
    );
    expect(rectOf(tree, 'col')).toEqual({ x: 0, y: 0, width: 58, height: 44 });
  });

  it('should clamp negative and NaN bound sizes to zero', () => {
    const tree = layoutOf(
      page(
        el('neg', '<width-fixed from="w"/><height-fixed from="h"/>') +
          el('padded', '<padding-all is="-5"/>')
      ),
      { w: -20, h: Number.NaN }
    );

    expect(rectOf(tree, 'neg')).toMatchObject({ width: 0, height: 0 });
    expect(rectOf(tree, 'padded')).toMatchObject({ width: 0, height: 0 });
  });

  it('should measure text with the default measurer', () => {
    const tree = layoutOf(
      page(
        el(
          'label',
          '',
          '<text-element><text-config><font-size is="10"/></text-config><content>Hello</content></text-element>'
        )
      )
    );
    const text = nodeOf(tree, 'label').children[0];

    expect(text?.kind).toBe('text');
    expect(text?.id).toBe('label.t0');
    expect(text?.rect.width).toBeCloseTo(30);
    expect(text?.rect.height).toBe(10);
    expect(rectOf(tree, 'label').width).toBeCloseTo(30);
  });

  it('should use the host text measurer when given', () => {
    const tree = layoutOf(
      page(el('label', '<padding-all is="2"/>', '<text-element>abcd</text-element>')),
      {},
      undefined,
      undefined,
      { measureText: (text) => ({ width: text.length * 8, height: 12 }) }
    );
    expect(rectOf(tree, 'label')).toEqual({ x: 0, y: 0, width: 36, height: 16 });
  });

  it('should use line height and line count for multi-line text', () => {
    const tree = layoutOf(
      page(
        el(
          'label',
          '',
          '<text-element><text-config><font-size is="10"/><line-height is="14"/>' +
            '<dyn-content from="body"/></text-config></text-element>'
        )
      ),
      { body: 'ab\nabcd\nx' }
    );
    expect(rectOf(tree, 'label').height).toBe(42);
    expect(rectOf(tree, 'label').width).toBeCloseTo(24);
  });
});
