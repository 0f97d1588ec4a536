import type { Size, TextMeasurer, TextStyle } from './types';

const GLYPH_ADVANCE = 0.6;

/**
 * Fixed-advance measurer used when the host supplies none. Lines split on
 * '\n'; no wrapping.
 */
export const monospaceMeasurer: TextMeasurer = (
  text: string,
  style: TextStyle
): Size => {
  const lines = text.split('\n');
  const longest = lines.reduce((max, line) => Math.max(max, line.length), 0);
  const lineHeight = style.lineHeight > 0 ? style.lineHeight : style.fontSize;
  return {
    width: longest * style.fontSize * GLYPH_ADVANCE,
    height: lines.length * lineHeight,
  };
};
