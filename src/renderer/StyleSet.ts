/**
 * StyleSet: a mapping from CSS property to value over the closed set of
 * properties the renderer emits.
 */

import { BorderEdgeName } from '../model/Styles';

export type BorderProperty = `border-${BorderEdgeName}-${'width' | 'style' | 'color'}`;

export type CssProperty =
  | 'border-collapse'
  | BorderProperty
  | 'text-align'
  | 'vertical-align'
  | 'background-color'
  | 'font-size'
  | 'font-family'
  | 'color'
  | 'font-weight'
  | 'font-style'
  | 'text-decoration'
  | 'min-width'
  | 'visibility'
  | 'margin-left'
  | 'margin-top'
  | 'height';

/** Empty and null values are treated as undeclared. */
export type StyleSet = Partial<Record<CssProperty, string | null>>;

/** Declared properties sorted by name; undeclared (falsy) values dropped. */
export function styleEntries(style: StyleSet): Array<[CssProperty, string]> {
  const entries: Array<[CssProperty, string]> = [];
  for (const [prop, value] of Object.entries(style)) {
    if (isCssProperty(prop) && value) entries.push([prop, value]);
  }
  return entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
}

const CSS_PROPERTY_RE =
  /^(border-collapse|border-(top|right|bottom|left)-(width|style|color)|text-align|vertical-align|background-color|font-size|font-family|color|font-weight|font-style|text-decoration|min-width|visibility|margin-left|margin-top|height)$/;

function isCssProperty(name: string): name is CssProperty {
  return CSS_PROPERTY_RE.test(name);
}

/**
 * Serialize as an inline style: `prop: value` pairs sorted by property and
 * joined with `; `. A set with no declared values serializes to `""`.
 */
export function renderInlineStyles(style: StyleSet | undefined): string {
  if (!style) return '';
  return styleEntries(style)
    .map(([prop, value]) => `${prop}: ${value}`)
    .join('; ');
}

/**
 * Canonical key for structural equality: two sets with the same declared
 * properties and values share a key regardless of insertion order.
 */
export function styleKey(style: StyleSet): string {
  return JSON.stringify(styleEntries(style));
}
