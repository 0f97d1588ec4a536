import { bench, describe } from 'vitest';
import { compile } from '../../src/compiler/compile';
import { fixture } from '../../tests/helpers/layout';

describe('compile', () => {
  const documents = fixture('documents.xml');
  const dashboard = fixture('dashboard.xml');

  bench('documents page with a reusable', () => {
    compile(documents);
  });

  bench('dashboard page', () => {
    compile(dashboard);
  });
});
