/**
 * Bind pass
 *
 * Instantiates the template against one frame's bindings: conditionals are
 * evaluated, lists expanded, the active interaction variant applied, every
 * ref resolved and every text measured. Produces the Box tree the sizing
 * passes work on.
 */

import type { BindingScope } from '../bindings/scope';
import { applyConfig } from '../compiler/config';
import {
  TRANSPARENT,
  type Color,
  type ElementTemplate,
  type Sizing,
  type StyleProps,
  type TemplateNode,
  type TextTemplate,
  type ValueRef,
} from '../compiler/types';
import { warnOnce } from '../dev/warnings';
import type { InteractionView } from '../interaction/types';
import { clamp, clampSize } from '../shared/util';
import type { Box, BoxSizing } from './box';
import type { LayoutFloating, LayoutHandlers, TextMeasurer } from './types';

export interface BindEnv {
  readonly interaction: InteractionView;
  readonly measure: TextMeasurer;
  /** First box bound under each stable id */
  readonly ids: Map<string, Box>;
  seq: number;
}

function finite(value: number): number {
  return Number.isFinite(value) ? value : 0;
}

function numberOf(ref: ValueRef<number>, scope: BindingScope, nodeId: string): number {
  return ref.type === 'literal' ? ref.value : scope.resolve('numeric', ref.key, nodeId);
}

function colorOf(ref: ValueRef<Color>, scope: BindingScope, nodeId: string): Color {
  return ref.type === 'literal' ? ref.value : scope.resolve('color', ref.key, nodeId);
}

function textOf(ref: ValueRef<string>, scope: BindingScope, nodeId: string): string {
  return ref.type === 'literal' ? ref.value : scope.resolve('text', ref.key, nodeId);
}

function sizingOf(sizing: Sizing, scope: BindingScope, nodeId: string): BoxSizing {
  switch (sizing.type) {
    case 'fixed':
      return { type: 'fixed', size: clampSize(numberOf(sizing.size, scope, nodeId)) };
    case 'percent':
      return { type: 'percent', fraction: clamp(finite(sizing.fraction), 0, 1) };
    case 'fit':
    case 'grow': {
      const min = clampSize(sizing.min);
      const max = Number.isNaN(sizing.max) ? Infinity : Math.max(min, sizing.max);
      return { type: sizing.type, min, max };
    }
  }
}

/** Id for diagnostics raised before a node exists (conditionals, lists) */
function pendingId(node: TemplateNode, suffix: string): string {
  return node.kind === 'conditional' ? pendingId(node.body, suffix) : `e${node.path}${suffix}`;
}

function resolveId(
  template: ElementTemplate,
  scope: BindingScope,
  suffix: string
): string {
  const fallback = `e${template.path}${suffix}`;
  const id = template.style.base.id;
  if (!id) return fallback;
  if (id.type === 'literal') return `${id.value}${suffix}`;
  const dynamic = scope.resolve('text', id.key, fallback);
  return dynamic === '' ? fallback : dynamic;
}

function register(box: Box, env: BindEnv): Box {
  if (env.ids.has(box.id)) {
    warnOnce(
      `duplicate-id:${box.id}`,
      `Element id '${box.id}' is used more than once in one frame; interaction state is shared between them.`
    );
  } else {
    env.ids.set(box.id, box);
  }
  return box;
}

function activeProps(template: ElementTemplate, id: string, env: BindEnv): StyleProps {
  const flags = env.interaction.get(id);
  const { style } = template;
  let props = style.base;
  if (flags?.hovered) props = style.hovered.reduce(applyConfig, props);
  if (flags?.clicked) props = style.clicked.reduce(applyConfig, props);
  if (flags?.rightClicked) props = style.rightClicked.reduce(applyConfig, props);
  return props;
}

function bindElement(
  template: ElementTemplate,
  parent: Box,
  scope: BindingScope,
  suffix: string,
  env: BindEnv
): void {
  const id = resolveId(template, scope, suffix);
  const props = activeProps(template, id, env);

  const image = props.image
    ? props.image.type === 'literal'
      ? props.image.value
      : scope.resolve('image', props.image.key, id)
    : null;

  let floating: LayoutFloating | null = null;
  if (props.floating) {
    const f = props.floating;
    floating = {
      zIndex: finite(f.zIndex),
      capturePointer: f.capturePointer,
      attachTo: f.attachTo,
      parentPoint: f.parentPoint,
      elementPoint: f.elementPoint,
      offset: {
        x: finite(numberOf(f.offsetX, scope, id)),
        y: finite(numberOf(f.offsetY, scope, id)),
      },
    };
  }

  const { onClick, onRightClick } = template.style;
  const handlers: LayoutHandlers = {
    ...(onClick
      ? { click: onClick.type === 'literal' ? onClick.value : scope.eventName(onClick.key) }
      : {}),
    ...(onRightClick
      ? {
          rightClick:
            onRightClick.type === 'literal' ? onRightClick.value : scope.eventName(onRightClick.key),
        }
      : {}),
  };

  const box = register(
    {
      kind: 'element',
      id,
      path: template.path,
      depth: parent.depth + 1,
      seq: env.seq++,
      sizing: {
        x: sizingOf(props.width, scope, id),
        y: sizingOf(props.height, scope, id),
      },
      direction: props.direction,
      padding: {
        top: clampSize(props.padding.top),
        right: clampSize(props.padding.right),
        bottom: clampSize(props.padding.bottom),
        left: clampSize(props.padding.left),
      },
      childGap: clampSize(props.childGap),
      alignX: props.alignX,
      alignY: props.alignY,
      paint: {
        color: props.color ? colorOf(props.color, scope, id) : TRANSPARENT,
        border: props.border
          ? {
              color: colorOf(props.border.color, scope, id),
              width: props.border.width,
              betweenChildren: clampSize(props.border.betweenChildren),
            }
          : null,
        radius: props.radius,
        image: image === '' ? null : image,
      },
      measured: { width: 0, height: 0 },
      scroll: props.scroll ?? null,
      floating,
      handlers,
      children: [],
      size: { x: 0, y: 0 },
      pos: { x: 0, y: 0 },
      content: { x: 0, y: 0 },
      clip: null,
      scrollOffset: { x: 0, y: 0 },
    },
    env
  );
  parent.children.push(box);
  bindNodes(template.children, box, scope, suffix, env);
}

function bindText(
  template: TextTemplate,
  parent: Box,
  scope: BindingScope,
  env: BindEnv
): void {
  const index = parent.children.length;
  const id = parent.id === '' ? `t${index}` : `${parent.id}.t${index}`;
  const spec = template.style;
  const style = {
    fontId: spec.fontId,
    fontSize: clampSize(spec.fontSize),
    lineHeight: clampSize(spec.lineHeight),
    align: spec.align,
    color: colorOf(spec.color, scope, id),
  };
  const content = textOf(template.content, scope, id);
  const measured = env.measure(content, style);

  parent.children.push({
    kind: 'text',
    id,
    path: template.path,
    depth: parent.depth + 1,
    seq: env.seq++,
    sizing: {
      x: { type: 'fit', min: 0, max: Infinity },
      y: { type: 'fit', min: 0, max: Infinity },
    },
    direction: 'ltr',
    padding: { top: 0, right: 0, bottom: 0, left: 0 },
    childGap: 0,
    alignX: 'left',
    alignY: 'top',
    paint: {
      color: TRANSPARENT,
      border: null,
      radius: { topLeft: 0, topRight: 0, bottomRight: 0, bottomLeft: 0 },
      image: null,
    },
    text: { content, style },
    measured: { width: clampSize(measured.width), height: clampSize(measured.height) },
    scroll: null,
    floating: null,
    handlers: {},
    children: [],
    size: { x: 0, y: 0 },
    pos: { x: 0, y: 0 },
    content: { x: 0, y: 0 },
    clip: null,
    scrollOffset: { x: 0, y: 0 },
  });
}

/** Binds `templates` in order, appending the resulting boxes to `parent`. */
export function bindNodes(
  templates: readonly TemplateNode[],
  parent: Box,
  scope: BindingScope,
  suffix: string,
  env: BindEnv
): void {
  for (const template of templates) {
    switch (template.kind) {
      case 'element':
        bindElement(template, parent, scope, suffix, env);
        break;
      case 'text':
        bindText(template, parent, scope, env);
        break;
      case 'conditional': {
        const value = scope.resolve('bool', template.predicateKey, pendingId(template.body, suffix));
        if (value !== template.negate) {
          bindNodes([template.body], parent, scope, suffix, env);
        }
        break;
      }
      case 'list': {
        const items = scope.resolve('list', template.sourceKey, `e${template.path}${suffix}`);
        items.forEach((item, i) => {
          bindNodes(
            template.body,
            parent,
            scope.child(item, template.itemBindings),
            `${suffix}[${i}]`,
            env
          );
        });
        break;
      }
    }
  }
}
