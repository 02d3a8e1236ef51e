/**
 * Color resolver: converts a cell color reference to a CSS hex color.
 *
 * Resolution never throws: malformed values become white, and indexed colors
 * outside the legacy palette become `null` ("no color").
 */

import { ColorRef } from '../model/Styles';
import { applyTint } from '../utils/color';
import indexedColors from './indexedColors.json';

const WHITE = '#FFFFFF';
const HEX6_RE = /^[0-9a-fA-F]{6}$/;
const ARGB_RE = /^(?:[0-9a-fA-F]{2})?[0-9a-fA-F]{6}$/;

/** Legacy indexed palette; 64 and 65 are the system foreground/background. */
const INDEXED_COLORS: readonly string[] = indexedColors;

function resolveIndexed(index: number): string | null {
  if (!Number.isInteger(index) || index < 0 || index >= INDEXED_COLORS.length) return null;
  const rgb = INDEXED_COLORS[index];
  return HEX6_RE.test(rgb) ? `#${rgb.toUpperCase()}` : null;
}

function resolveTheme(theme: number, tint: number, palette: readonly string[]): string {
  if (palette.length === 0) return WHITE;
  const base = theme >= 0 && theme < palette.length ? palette[theme] : palette[0];
  if (!HEX6_RE.test(base)) return WHITE;
  const tinted = applyTint(base, Number.isFinite(tint) ? tint : 0);
  return tinted ? `#${tinted}` : WHITE;
}

/**
 * Resolve a color reference against a theme palette.
 *
 * @param palette - Theme colors as 6-digit hex, `lt1, dk1, lt2, dk2, accent1..6`
 * @returns `#RRGGBB`, or `null` when the reference declares no usable color
 */
export function resolveColor(ref: ColorRef, palette: readonly string[]): string | null {
  switch (ref.type) {
    case 'auto':
      return '#000000';
    case 'rgb':
      return ARGB_RE.test(ref.rgb) ? `#${ref.rgb.slice(-6).toUpperCase()}` : WHITE;
    case 'indexed':
      return resolveIndexed(ref.index);
    case 'theme':
      return resolveTheme(ref.theme, ref.tint, palette);
  }
}
