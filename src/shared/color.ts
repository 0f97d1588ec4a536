import { colord, extend } from 'colord';
import namesPlugin from 'colord/plugins/names';
import type { Color } from '../compiler/types';

extend([namesPlugin]);

/**
 * Parse any CSS color string (hex, rgb(), hsl(), named) into 0-255 channels
 * with alpha in 0..1. Returns null when the input is not a color.
 */
export function parseColor(input: string): Color | null {
  const parsed = colord(input.trim());
  if (!parsed.isValid()) return null;
  const { r, g, b, a } = parsed.toRgb();
  return Object.freeze({ r, g, b, a });
}
