import { describe, it, expect } from 'vitest';
import { toRenderCommands } from '../../src/render/commands';
import { el, layoutOf, page } from '../helpers/layout';

const FIXED = (w: number, h: number) =>
  `<width-fixed at="${w}"/><height-fixed at="${h}"/>`;

const RED = '<color is="red"/>';

describe('toRenderCommands', () => {
  it('should draw background, then border, then text', () => {
    const commands = toRenderCommands(
      layoutOf(
        page(
          el(
            'card',
            '<color is="#ff0000"/><border-color is="blue"/><border-all is="2"/><padding-all is="4"/>',
            '<text-element>Hi</text-element>'
          )
        )
      )
    );

    expect(commands.map((c) => [c.type, c.id])).toEqual([
      ['rectangle', 'card'],
      ['border', 'card'],
      ['text', 'card.t0'],
    ]);
    expect(commands[2]).toMatchObject({
      content: 'Hi',
      rect: { x: 4, y: 4, width: 19.2, height: 16 },
    });
  });

  it('should skip transparent elements and empty text', () => {
    const commands = toRenderCommands(
      layoutOf(
        page(
          el(
            'box',
            FIXED(10, 10),
            '<text-element><text-config><dyn-content from="missing"/></text-config></text-element>'
          )
        )
      )
    );
    expect(commands).toEqual([]);
  });

  it('should draw an image in place of the background rectangle', () => {
    const commands = toRenderCommands(
      layoutOf(page(el('logo', '<image src="logoImage"/>' + RED + FIXED(32, 32))), {
        logoImage: 'logo.png',
      })
    );

    expect(commands).toHaveLength(1);
    expect(commands[0]).toMatchObject({
      type: 'image',
      image: 'logo.png',
      tint: { r: 255, g: 0, b: 0, a: 1 },
      rect: { x: 0, y: 0, width: 32, height: 32 },
    });
  });

  it('should wrap the flow descendants of a scroll container in a scissor', () => {
    const commands = toRenderCommands(
      layoutOf(
        page(
          el(
            'root',
            '<direction is="ttb"/>',
            el(
              'scroller',
              '<scroll vertical="true"/>' + FIXED(100, 50),
              el('c1', RED + FIXED(100, 40)) + el('c2', RED + FIXED(100, 40))
            ) + el('after', RED + FIXED(100, 10))
          )
        )
      )
    );

    expect(commands.map((c) => [c.type, c.id])).toEqual([
      ['scissor-start', 'scroller'],
      ['rectangle', 'c1'],
      ['rectangle', 'c2'],
      ['scissor-end', 'scroller'],
      ['rectangle', 'after'],
    ]);
    expect(commands[0]).toEqual({
      type: 'scissor-start',
      id: 'scroller',
      rect: { x: 0, y: 0, width: 100, height: 50 },
    });
  });

  it('should draw floating children outside the scissor', () => {
    const commands = toRenderCommands(
      layoutOf(
        page(
          el(
            'scroller',
            '<scroll vertical="true"/>' + FIXED(100, 50),
            el('inside', RED + FIXED(100, 20)) + el('pop', '<floating/>' + RED + FIXED(10, 10))
          )
        )
      )
    );

    expect(commands.map((c) => [c.type, c.id])).toEqual([
      ['scissor-start', 'scroller'],
      ['rectangle', 'inside'],
      ['scissor-end', 'scroller'],
      ['rectangle', 'pop'],
    ]);
  });

  it('should centre dividers in the gaps between children', () => {
    const commands = toRenderCommands(
      layoutOf(
        page(
          el(
            'stack',
            '<direction is="ttb"/><child-gap is="6"/><border-color is="black"/>' +
              '<border-between-children is="2"/>',
            el('x', FIXED(100, 20)) + el('y', FIXED(100, 20)) + el('z', FIXED(100, 20))
          )
        )
      )
    );

    expect(commands.map((c) => c.type === 'rectangle' && c.rect)).toEqual([
      { x: 0, y: 22, width: 100, height: 2 },
      { x: 0, y: 48, width: 100, height: 2 },
    ]);
    expect(commands.every((c) => c.id === 'stack')).toBe(true);
  });
});
