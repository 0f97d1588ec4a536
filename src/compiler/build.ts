/**
 * Template builder: expanded markup -> Node Templates.
 */

import { CompileError } from '../common/errors';
import {
  applyConfig,
  DEFAULT_STYLE,
  literalColor,
  parseConfigCommands,
  refAttr,
} from './config';
import {
  invalidAttr,
  optionalAttr,
  parseBool,
  requireAttr,
  requireNumberAttr,
  type MarkupElement,
} from './markup';
import { readLocalBindings } from './reusables';
import {
  BLACK,
  type ConfigCommand,
  type ElementTemplate,
  type ListTemplate,
  type StyleProps,
  type StyleSpec,
  type TemplateNode,
  type TextStyleSpec,
  type TextTemplate,
  type ValueRef,
} from './types';

const NODE_TAGS = new Set(['element', 'text-element', 'list']);

export const DEFAULT_TEXT_STYLE: TextStyleSpec = {
  fontId: 0,
  fontSize: 16,
  lineHeight: 0,
  align: 'left',
  color: { type: 'literal', value: BLACK },
};

function childPath(parent: string, index: number): string {
  return parent === '' ? String(index) : `${parent}.${index}`;
}

/** Builds the node children of `elements`, numbering paths under `parentPath`. */
export function buildNodes(
  elements: readonly MarkupElement[],
  parentPath: string
): TemplateNode[] {
  const nodes: TemplateNode[] = [];
  let index = 0;
  for (const el of elements) {
    if (!NODE_TAGS.has(el.name)) {
      throw new CompileError(
        'UNKNOWN_TAG',
        `<${el.name}> is not a node tag`,
        el.position
      );
    }
    const node = buildNode(el, childPath(parentPath, index++));
    if (node) nodes.push(node);
  }
  return nodes;
}

// ─────────────────────────────────────────────────────────────────────────────
// Conditionals
// ─────────────────────────────────────────────────────────────────────────────

type Predicate =
  | { type: 'keep' }
  | { type: 'drop' }
  | { type: 'ref'; key: string; negate: boolean };

function predicate(el: MarkupElement, name: 'if' | 'if-not'): Predicate {
  const attr = optionalAttr(el, name);
  const negate = name === 'if-not';
  if (!attr) return { type: 'keep' };
  if (attr.bound === 'literal') {
    const value = parseBool(el, name, attr.value);
    return value !== negate ? { type: 'keep' } : { type: 'drop' };
  }
  if (attr.value === '') throw invalidAttr(el, name, attr.value, 'a binding key');
  return { type: 'ref', key: attr.value, negate };
}

function buildNode(el: MarkupElement, path: string): TemplateNode | null {
  const outer = predicate(el, 'if');
  const inner = predicate(el, 'if-not');
  if (outer.type === 'drop' || inner.type === 'drop') return null;

  let node: TemplateNode =
    el.name === 'list'
      ? buildList(el, path)
      : el.name === 'text-element'
        ? buildText(el, path)
        : buildElement(el, path);

  for (const p of [inner, outer]) {
    if (p.type === 'ref') {
      node = { kind: 'conditional', predicateKey: p.key, negate: p.negate, body: node };
    }
  }
  return node;
}

// ─────────────────────────────────────────────────────────────────────────────
// Elements
// ─────────────────────────────────────────────────────────────────────────────

function stateCommands(block: MarkupElement): ConfigCommand[] {
  return block.children.flatMap(parseConfigCommands);
}

function emitRef(block: MarkupElement): ValueRef<string> | undefined {
  const emit = optionalAttr(block, 'emit');
  return emit ? refAttr(block, 'emit', emit, (v) => v) : undefined;
}

export function buildStyle(
  config: MarkupElement | undefined,
  idAttr: string | undefined
): StyleSpec {
  let base: StyleProps = DEFAULT_STYLE;
  if (idAttr !== undefined) {
    base = applyConfig(base, { type: 'id', value: { type: 'literal', value: idAttr } });
  }
  let hovered: ConfigCommand[] = [];
  let clicked: ConfigCommand[] = [];
  let rightClicked: ConfigCommand[] = [];
  let onClick: ValueRef<string> | undefined;
  let onRightClick: ValueRef<string> | undefined;

  for (const tag of config?.children ?? []) {
    switch (tag.name) {
      case 'hovered':
        hovered = hovered.concat(stateCommands(tag));
        break;
      case 'clicked':
        clicked = clicked.concat(stateCommands(tag));
        onClick = emitRef(tag) ?? onClick;
        break;
      case 'right-clicked':
        rightClicked = rightClicked.concat(stateCommands(tag));
        onRightClick = emitRef(tag) ?? onRightClick;
        break;
      default:
        base = parseConfigCommands(tag).reduce(applyConfig, base);
    }
  }

  return {
    base,
    hovered,
    clicked,
    rightClicked,
    ...(onClick ? { onClick } : {}),
    ...(onRightClick ? { onRightClick } : {}),
  };
}

function singleChild(el: MarkupElement, tag: string): MarkupElement | undefined {
  const matches = el.children.filter((child) => child.name === tag);
  if (matches.length > 1) {
    throw new CompileError(
      'INVALID_ATTRIBUTE',
      `<${el.name}> may contain at most one <${tag}>`,
      matches[1]?.position
    );
  }
  return matches[0];
}

function buildElement(el: MarkupElement, path: string): ElementTemplate {
  const config = singleChild(el, 'element-config');
  const id = optionalAttr(el, 'id');
  return {
    kind: 'element',
    path,
    style: buildStyle(config, id?.value),
    children: buildNodes(
      el.children.filter((child) => child.name !== 'element-config'),
      path
    ),
  };
}

// ─────────────────────────────────────────────────────────────────────────────
// Text
// ─────────────────────────────────────────────────────────────────────────────

function buildTextStyle(config: MarkupElement | undefined): {
  style: TextStyleSpec;
  dynamic?: ValueRef<string>;
} {
  let style = DEFAULT_TEXT_STYLE;
  let dynamic: ValueRef<string> | undefined;

  for (const tag of config?.children ?? []) {
    switch (tag.name) {
      case 'font-id':
        style = { ...style, fontId: requireNumberAttr(tag, 'is') };
        break;
      case 'font-size':
        style = { ...style, fontSize: requireNumberAttr(tag, 'is') };
        break;
      case 'line-height':
        style = { ...style, lineHeight: requireNumberAttr(tag, 'is') };
        break;
      case 'text-align-left':
        style = { ...style, align: 'left' };
        break;
      case 'text-align-center':
        style = { ...style, align: 'center' };
        break;
      case 'text-align-right':
        style = { ...style, align: 'right' };
        break;
      case 'color': {
        const value = requireAttr(tag, 'is').value;
        style = { ...style, color: { type: 'literal', value: literalColor(tag, 'is', value) } };
        break;
      }
      case 'dyn-color':
        style = {
          ...style,
          color: refAttr(tag, 'from', requireAttr(tag, 'from'), (v) => literalColor(tag, 'from', v)),
        };
        break;
      case 'dyn-content':
        dynamic = refAttr(tag, 'from', requireAttr(tag, 'from'), (v) => v);
        break;
      default:
        throw new CompileError(
          'UNKNOWN_TAG',
          `<${tag.name}> is not a text config tag`,
          tag.position
        );
    }
  }
  return dynamic ? { style, dynamic } : { style };
}

function buildText(el: MarkupElement, path: string): TextTemplate {
  const config = singleChild(el, 'text-config');
  const contentEl = singleChild(el, 'content');
  for (const child of el.children) {
    if (child.name !== 'text-config' && child.name !== 'content') {
      throw new CompileError(
        'UNKNOWN_TAG',
        `<${child.name}> is not allowed inside <text-element>`,
        child.position
      );
    }
  }

  const { style, dynamic } = buildTextStyle(config);
  const literal = contentEl ? contentEl.text : el.text;
  if (dynamic && (contentEl || literal !== '')) {
    throw new CompileError(
      'INVALID_ATTRIBUTE',
      '<text-element> has both literal content and <dyn-content>',
      el.position
    );
  }

  return {
    kind: 'text',
    path,
    style,
    content: dynamic ?? { type: 'literal', value: literal },
  };
}

// ─────────────────────────────────────────────────────────────────────────────
// Lists
// ─────────────────────────────────────────────────────────────────────────────

function buildList(el: MarkupElement, path: string): ListTemplate {
  const src = requireAttr(el, 'src');
  if (src.bound === 'literal' || src.value === '') {
    throw invalidAttr(el, 'src', src.value, 'a list binding key');
  }
  return {
    kind: 'list',
    path,
    sourceKey: src.value,
    itemBindings: readLocalBindings(el, (child) => NODE_TAGS.has(child.name)),
    body: buildNodes(
      el.children.filter((child) => NODE_TAGS.has(child.name)),
      path
    ),
  };
}
