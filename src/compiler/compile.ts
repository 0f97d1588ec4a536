import { CompileError } from '../common/errors';
import { deepFreeze } from '../shared/util';
import { buildNodes } from './build';
import { readMarkup, requireAttr } from './markup';
import { assertAcyclic, buildArena, expandReusables } from './reusables';
import type { IntermediateTemplate } from './types';

export type CompileResult =
  | { data: IntermediateTemplate; error: null }
  | { data: null; error: CompileError };

/**
 * Compile markup into a deep-frozen Intermediate Template.
 *
 * Never throws for bad input; every failure comes back as a CompileError.
 *
 * @example
 * ```ts
 * const { data, error } = compile('<page name="Main"><element/></page>');
 * ```
 */
export function compile(markup: string): CompileResult {
  try {
    return { data: compileOrThrow(markup), error: null };
  } catch (err) {
    if (err instanceof CompileError) return { data: null, error: err };
    throw err;
  }
}

export function compileOrThrow(markup: string): IntermediateTemplate {
  const root = readMarkup(markup);
  if (root.name !== 'page') {
    throw new CompileError(
      'UNKNOWN_TAG',
      `Root element must be <page>, found <${root.name}>`,
      root.position
    );
  }
  const page = requireAttr(root, 'name').value;

  const reusables = root.children.filter((child) => child.name === 'reusable');
  const body = root.children.filter((child) => child.name !== 'reusable');

  const arena = buildArena(reusables, body);
  assertAcyclic(arena);

  const roots = buildNodes(expandReusables(body, arena), '');
  return deepFreeze({
    page,
    roots,
    reusables: arena.defs.map((def) => def.name),
  });
}
