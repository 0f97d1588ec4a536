/**
 * Frame benchmark
 *
 * Measures one full frame (solve, tracker update, emit, render commands)
 * over a list page, and a bare solve of the same template.
 */

import { bench, describe } from 'vitest';
import { createBindingContext } from '../../src/bindings/context';
import { compileOrThrow } from '../../src/compiler/compile';
import { solve } from '../../src/layout/solve';
import { createEngine } from '../../src/runtime/engine';
import { fixture } from '../../tests/helpers/layout';

const VIEWPORT = { width: 1280, height: 720 };

function documents(count: number) {
  return createBindingContext({
    Documents: Array.from({ length: count }, (_, i) => ({ title: `Document ${i}` })),
  });
}

describe('frame', () => {
  const markup = fixture('documents.xml');
  const template = compileOrThrow(markup);

  for (const count of [10, 100, 1000]) {
    const bindings = documents(count);

    bench(`solve ${count} rows`, () => {
      solve(template, bindings, VIEWPORT);
    });

    const engine = createEngine({ onEvent: () => {} });
    engine.load(markup);
    let y = 0;
    bench(`engine.frame ${count} rows with a moving pointer`, () => {
      y = (y + 7) % VIEWPORT.height;
      engine.frame({
        page: 'Documents',
        bindings,
        viewport: VIEWPORT,
        pointer: { x: 50, y, buttons: y % 2 },
      });
    });
  }
});
