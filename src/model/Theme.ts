/**
 * Theme parser: extracts the color palette cell styles refer to by index.
 */

import { SafeXmlNode } from '../parser/XmlParser';

/**
 * Palette slot order used by cell `theme="n"` references. Note the light/dark
 * pairs come light-first, unlike the order they appear in `a:clrScheme`.
 */
export const THEME_SLOTS = [
  'lt1',
  'dk1',
  'lt2',
  'dk2',
  'accent1',
  'accent2',
  'accent3',
  'accent4',
  'accent5',
  'accent6',
] as const;

const WHITE = 'FFFFFF';

/** Palette of a workbook without theme data: every slot is white. */
export function defaultThemePalette(): string[] {
  return THEME_SLOTS.map(() => WHITE);
}

/**
 * Extract a hex color from a color slot node.
 * `a:sysClr` values naming a window color carry the actual color in `lastClr`.
 */
function extractColor(node: SafeXmlNode): string {
  const srgb = node.child('srgbClr');
  if (srgb.exists()) {
    return srgb.attr('val') ?? WHITE;
  }
  const sys = node.child('sysClr');
  if (sys.exists()) {
    const val = sys.attr('val') ?? '';
    if (val.includes('window')) return sys.attr('lastClr') ?? sys.attr('val') ?? WHITE;
    return val || WHITE;
  }
  return WHITE;
}

/**
 * Parse a theme XML root (`a:theme`) into the 10-slot palette.
 * A missing color scheme yields the all-white palette.
 */
export function parseThemePalette(root: SafeXmlNode): string[] {
  const clrScheme = root.child('themeElements').child('clrScheme');
  if (!clrScheme.exists()) return defaultThemePalette();

  return THEME_SLOTS.map((slot) => {
    const slotNode = clrScheme.child(slot);
    return slotNode.exists() ? extractColor(slotNode) : WHITE;
  });
}
