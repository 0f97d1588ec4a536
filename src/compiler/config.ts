/**
 * Config tags
 *
 * Each tag inside <element-config> (or a state block) becomes one or more
 * ConfigCommands. applyConfig folds a command into a StyleProps value and is
 * shared by the compiler (base props) and the solver (state overrides).
 */

import { CompileError } from '../common/errors';
import { parseColor } from '../shared/color';
import {
  ATTACH_POINTS,
  BLACK,
  type AttachPoint,
  type BorderSpec,
  type Color,
  type ConfigCommand,
  type Corners,
  type FloatingSpec,
  type Sides,
  type Sizing,
  type StyleProps,
  type ValueRef,
} from './types';
import {
  invalidAttr,
  numberAttr,
  optionalAttr,
  parseBool,
  parseNumber,
  requireAttr,
  requireNumberAttr,
  type MarkupAttribute,
  type MarkupElement,
} from './markup';

export const ZERO_SIDES: Sides = { top: 0, right: 0, bottom: 0, left: 0 };

export const ZERO_CORNERS: Corners = {
  topLeft: 0,
  topRight: 0,
  bottomRight: 0,
  bottomLeft: 0,
};

export const DEFAULT_STYLE: StyleProps = {
  width: { type: 'fit', min: 0, max: Infinity },
  height: { type: 'fit', min: 0, max: Infinity },
  direction: 'ltr',
  padding: ZERO_SIDES,
  childGap: 0,
  alignX: 'left',
  alignY: 'top',
  radius: ZERO_CORNERS,
};

const DEFAULT_BORDER: BorderSpec = {
  color: { type: 'literal', value: BLACK },
  width: ZERO_SIDES,
  betweenChildren: 0,
};

export const DEFAULT_FLOATING: FloatingSpec = {
  offsetX: { type: 'literal', value: 0 },
  offsetY: { type: 'literal', value: 0 },
  parentPoint: 'top-left',
  elementPoint: 'top-left',
  zIndex: 0,
  attachTo: { type: 'parent' },
  capturePointer: true,
};

export function applyConfig(
  props: StyleProps,
  command: ConfigCommand
): StyleProps {
  switch (command.type) {
    case 'id':
      return { ...props, id: command.value };
    case 'width':
      return { ...props, width: command.sizing };
    case 'height':
      return { ...props, height: command.sizing };
    case 'padding':
      return { ...props, padding: { ...props.padding, ...command.sides } };
    case 'child-gap':
      return { ...props, childGap: command.value };
    case 'direction':
      return { ...props, direction: command.value };
    case 'align-x':
      return { ...props, alignX: command.value };
    case 'align-y':
      return { ...props, alignY: command.value };
    case 'color':
      return { ...props, color: command.value };
    case 'radius':
      return { ...props, radius: { ...props.radius, ...command.corners } };
    case 'border-color':
      return {
        ...props,
        border: { ...(props.border ?? DEFAULT_BORDER), color: command.value },
      };
    case 'border-width': {
      const border = props.border ?? DEFAULT_BORDER;
      return {
        ...props,
        border: { ...border, width: { ...border.width, ...command.sides } },
      };
    }
    case 'border-between-children':
      return {
        ...props,
        border: { ...(props.border ?? DEFAULT_BORDER), betweenChildren: command.value },
      };
    case 'scroll':
      return {
        ...props,
        scroll: { vertical: command.vertical, horizontal: command.horizontal },
      };
    case 'image':
      return { ...props, image: command.src };
    case 'floating':
      return {
        ...props,
        floating: { ...(props.floating ?? DEFAULT_FLOATING), ...command.patch },
      };
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Attribute value helpers
// ─────────────────────────────────────────────────────────────────────────────

export function literalColor(el: MarkupElement, name: string, value: string): Color {
  const color = parseColor(value);
  if (!color) throw invalidAttr(el, name, value, 'a CSS color');
  return color;
}

/** A reference attribute: a key, or a literal substituted by a reusable */
export function refAttr<T>(
  el: MarkupElement,
  name: string,
  attr: MarkupAttribute,
  fromLiteral: (value: string) => T
): ValueRef<T> {
  if (attr.bound === 'literal') {
    return { type: 'literal', value: fromLiteral(attr.value) };
  }
  if (attr.value === '') throw invalidAttr(el, name, attr.value, 'a binding key');
  return { type: 'ref', key: attr.value };
}

function isOrFrom<T>(
  el: MarkupElement,
  fromLiteral: (value: string) => T
): ValueRef<T> {
  const stat = optionalAttr(el, 'is');
  const dyn = optionalAttr(el, 'from');
  if (stat && dyn) {
    throw new CompileError(
      'INVALID_ATTRIBUTE',
      `<${el.name}> takes either 'is' or 'from', not both`,
      el.position
    );
  }
  if (stat) return { type: 'literal', value: fromLiteral(stat.value) };
  if (dyn) return refAttr(el, 'from', dyn, fromLiteral);
  throw new CompileError(
    'MISSING_ATTRIBUTE',
    `<${el.name}> requires attribute 'is' or 'from'`,
    el.position
  );
}

function minMax(el: MarkupElement): { min: number; max: number } {
  return {
    min: numberAttr(el, 'min') ?? 0,
    max: numberAttr(el, 'max') ?? Infinity,
  };
}

function fixedSizing(el: MarkupElement): Sizing {
  const at = numberAttr(el, 'at');
  if (at !== undefined) return { type: 'fixed', size: { type: 'literal', value: at } };
  const from = optionalAttr(el, 'from');
  if (!from) {
    throw new CompileError(
      'MISSING_ATTRIBUTE',
      `<${el.name}> requires attribute 'at' or 'from'`,
      el.position
    );
  }
  return {
    type: 'fixed',
    size: refAttr(el, 'from', from, (v) => parseNumber(el, 'from', v)),
  };
}

function attachPoint(el: MarkupElement): AttachPoint {
  const at = optionalAttr(el, 'at');
  const candidate = at
    ? at.value
    : ATTACH_POINTS.find((point) => optionalAttr(el, point) !== undefined);
  const match = ATTACH_POINTS.find((point) => point === candidate);
  if (!match) {
    if (at) throw invalidAttr(el, 'at', at.value, `one of ${ATTACH_POINTS.join(', ')}`);
    throw new CompileError(
      'MISSING_ATTRIBUTE',
      `<${el.name}> requires an attach point (${ATTACH_POINTS.join(', ')})`,
      el.position
    );
  }
  return match;
}

function offsetRef(el: MarkupElement, axis: 'x' | 'y'): ValueRef<number> {
  const from = optionalAttr(el, `${axis}-from`);
  if (from) return refAttr(el, `${axis}-from`, from, (v) => parseNumber(el, `${axis}-from`, v));
  return { type: 'literal', value: numberAttr(el, axis) ?? 0 };
}

/** `<axis>` literal or `<axis>-from` key, as `<floating-size>` takes them */
function dimensionRef(el: MarkupElement, axis: 'width' | 'height'): ValueRef<number> {
  const from = optionalAttr(el, `${axis}-from`);
  if (from) return refAttr(el, `${axis}-from`, from, (v) => parseNumber(el, `${axis}-from`, v));
  return { type: 'literal', value: requireNumberAttr(el, axis) };
}

function oneOf<T extends string>(
  el: MarkupElement,
  name: string,
  allowed: readonly T[]
): T {
  const value = requireAttr(el, name).value;
  const match = allowed.find((candidate) => candidate === value);
  if (!match) throw invalidAttr(el, name, value, `one of ${allowed.join(', ')}`);
  return match;
}

// ─────────────────────────────────────────────────────────────────────────────
// <element-config> tags
// ─────────────────────────────────────────────────────────────────────────────

export function parseConfigCommands(el: MarkupElement): ConfigCommand[] {
  const is = () => requireNumberAttr(el, 'is');

  switch (el.name) {
    case 'id':
      return [{ type: 'id', value: isOrFrom(el, (v) => v) }];
    case 'grow':
      return [
        { type: 'width', sizing: { type: 'grow', min: 0, max: Infinity } },
        { type: 'height', sizing: { type: 'grow', min: 0, max: Infinity } },
      ];
    case 'width-fit':
      return [{ type: 'width', sizing: { type: 'fit', ...minMax(el) } }];
    case 'height-fit':
      return [{ type: 'height', sizing: { type: 'fit', ...minMax(el) } }];
    case 'width-grow':
      return [{ type: 'width', sizing: { type: 'grow', ...minMax(el) } }];
    case 'height-grow':
      return [{ type: 'height', sizing: { type: 'grow', ...minMax(el) } }];
    case 'width-fixed':
      return [{ type: 'width', sizing: fixedSizing(el) }];
    case 'height-fixed':
      return [{ type: 'height', sizing: fixedSizing(el) }];
    case 'width-percent':
      return [{ type: 'width', sizing: { type: 'percent', fraction: requireNumberAttr(el, 'at') } }];
    case 'height-percent':
      return [{ type: 'height', sizing: { type: 'percent', fraction: requireNumberAttr(el, 'at') } }];
    case 'padding-all': {
      const v = is();
      return [{ type: 'padding', sides: { top: v, right: v, bottom: v, left: v } }];
    }
    case 'padding-top':
      return [{ type: 'padding', sides: { top: is() } }];
    case 'padding-right':
      return [{ type: 'padding', sides: { right: is() } }];
    case 'padding-bottom':
      return [{ type: 'padding', sides: { bottom: is() } }];
    case 'padding-left':
      return [{ type: 'padding', sides: { left: is() } }];
    case 'child-gap':
      return [{ type: 'child-gap', value: is() }];
    case 'direction':
      return [{ type: 'direction', value: oneOf(el, 'is', ['ttb', 'ltr'] as const) }];
    case 'align-children-x':
      return [{ type: 'align-x', value: oneOf(el, 'to', ['left', 'center', 'right'] as const) }];
    case 'align-children-y':
      return [{ type: 'align-y', value: oneOf(el, 'to', ['top', 'center', 'bottom'] as const) }];
    case 'color': {
      const value = requireAttr(el, 'is').value;
      return [{ type: 'color', value: { type: 'literal', value: literalColor(el, 'is', value) } }];
    }
    case 'dyn-color':
      return [
        {
          type: 'color',
          value: refAttr(el, 'from', requireAttr(el, 'from'), (v) => literalColor(el, 'from', v)),
        },
      ];
    case 'radius-all': {
      const v = is();
      return [{ type: 'radius', corners: { topLeft: v, topRight: v, bottomRight: v, bottomLeft: v } }];
    }
    case 'radius-top-left':
      return [{ type: 'radius', corners: { topLeft: is() } }];
    case 'radius-top-right':
      return [{ type: 'radius', corners: { topRight: is() } }];
    case 'radius-bottom-right':
      return [{ type: 'radius', corners: { bottomRight: is() } }];
    case 'radius-bottom-left':
      return [{ type: 'radius', corners: { bottomLeft: is() } }];
    case 'border-color': {
      const value = requireAttr(el, 'is').value;
      return [{ type: 'border-color', value: { type: 'literal', value: literalColor(el, 'is', value) } }];
    }
    case 'border-dynamic-color':
      return [
        {
          type: 'border-color',
          value: refAttr(el, 'from', requireAttr(el, 'from'), (v) => literalColor(el, 'from', v)),
        },
      ];
    case 'border-all': {
      const v = is();
      return [{ type: 'border-width', sides: { top: v, right: v, bottom: v, left: v } }];
    }
    case 'border-top':
      return [{ type: 'border-width', sides: { top: is() } }];
    case 'border-right':
      return [{ type: 'border-width', sides: { right: is() } }];
    case 'border-bottom':
      return [{ type: 'border-width', sides: { bottom: is() } }];
    case 'border-left':
      return [{ type: 'border-width', sides: { left: is() } }];
    case 'border-between-children':
      return [{ type: 'border-between-children', value: is() }];
    case 'scroll': {
      const flag = (name: string) => {
        const attr = optionalAttr(el, name);
        return attr ? parseBool(el, name, attr.value) : false;
      };
      return [{ type: 'scroll', vertical: flag('vertical'), horizontal: flag('horizontal') }];
    }
    case 'image':
      return [{ type: 'image', src: refAttr(el, 'src', requireAttr(el, 'src'), (v) => v) }];
    case 'floating':
      return [{ type: 'floating', patch: {} }];
    case 'floating-offset':
      return [{ type: 'floating', patch: { offsetX: offsetRef(el, 'x'), offsetY: offsetRef(el, 'y') } }];
    case 'floating-size':
      return [
        { type: 'floating', patch: {} },
        { type: 'width', sizing: { type: 'fixed', size: dimensionRef(el, 'width') } },
        { type: 'height', sizing: { type: 'fixed', size: dimensionRef(el, 'height') } },
      ];
    case 'floating-z-index':
      return [{ type: 'floating', patch: { zIndex: requireNumberAttr(el, 'z') } }];
    case 'floating-attach-to-parent':
      return [{ type: 'floating', patch: { parentPoint: attachPoint(el) } }];
    case 'floating-attach-element':
      return [{ type: 'floating', patch: { elementPoint: attachPoint(el) } }];
    case 'floating-attach-to-root':
      return [{ type: 'floating', patch: { attachTo: { type: 'root' } } }];
    case 'floating-attach-to-element':
      return [
        {
          type: 'floating',
          patch: { attachTo: { type: 'element', id: requireAttr(el, 'id').value } },
        },
      ];
    case 'floating-capture-pointer': {
      const state = requireAttr(el, 'state');
      return [{ type: 'floating', patch: { capturePointer: parseBool(el, 'state', state.value) } }];
    }
    default:
      throw new CompileError(
        'UNKNOWN_TAG',
        `<${el.name}> is not a config tag`,
        el.position
      );
  }
}
