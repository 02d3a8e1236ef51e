/**
 * Cell style resolver: turns a cell's border, alignment, fill and font
 * formatting into a StyleSet.
 */

import { AlignmentData, BORDER_EDGES, BorderSet, CellStyleData, FillData, FontData } from '../model/Styles';
import { getCell } from '../model/Worksheet';
import { RenderContext } from './RenderContext';
import { resolveColor } from './ColorResolver';
import { mapBorderStyle } from './BorderStyleMapper';
import { MergeRegion } from './SheetModel';
import { StyleSet } from './StyleSet';

/** Approximation for every pattern fill other than solid. */
export const PATTERN_FILL_COLOR = '#EEEEEE';

// ---------------------------------------------------------------------------
// Borders
// ---------------------------------------------------------------------------

function borderStyles(border: BorderSet | undefined, palette: readonly string[]): StyleSet {
  const styles: StyleSet = {};
  if (!border) return styles;
  for (const edge of BORDER_EDGES) {
    const spec = border[edge];
    const mapped = mapBorderStyle(spec?.style);
    if (!spec || !mapped) continue;
    styles[`border-${edge}-width`] = mapped.width;
    styles[`border-${edge}-style`] = mapped.style;
    const color = spec.color ? resolveColor(spec.color, palette) : null;
    if (color) styles[`border-${edge}-color`] = color;
  }
  return styles;
}

// ---------------------------------------------------------------------------
// Alignment
// ---------------------------------------------------------------------------

function horizontalAlign(value: string | undefined): string | null {
  switch (value) {
    case 'left':
    case 'center':
    case 'right':
    case 'justify':
      return value;
    case 'fill':
      return 'left';
    case 'centerContinuous':
      return 'center';
    case 'distributed':
      return 'justify';
    default:
      // `general` aligns by value type; leave it to the browser
      return null;
  }
}

function verticalAlign(value: string | undefined): string | null {
  switch (value) {
    case 'top':
    case 'bottom':
      return value;
    case 'center':
    case 'justify':
    case 'distributed':
      return 'middle';
    default:
      return null;
  }
}

function alignmentStyles(alignment: AlignmentData | undefined): StyleSet {
  const styles: StyleSet = {};
  const horizontal = horizontalAlign(alignment?.horizontal);
  if (horizontal) styles['text-align'] = horizontal;
  const vertical = verticalAlign(alignment?.vertical);
  if (vertical) styles['vertical-align'] = vertical;
  return styles;
}

// ---------------------------------------------------------------------------
// Fill and font
// ---------------------------------------------------------------------------

function fillStyles(fill: FillData | undefined, palette: readonly string[]): StyleSet {
  const pattern = fill?.patternType;
  if (!fill || !pattern || pattern === 'none') return {};
  if (pattern === 'solid') {
    const color = fill.fgColor ? resolveColor(fill.fgColor, palette) : null;
    return color ? { 'background-color': color } : {};
  }
  return { 'background-color': PATTERN_FILL_COLOR };
}

function fontStyles(font: FontData | undefined, palette: readonly string[]): StyleSet {
  const styles: StyleSet = {};
  if (!font) return styles;
  if (font.size) styles['font-size'] = `${font.size}px`;
  if (font.name) styles['font-family'] = font.name;
  const color = font.color ? resolveColor(font.color, palette) : null;
  if (color) styles.color = color;
  if (font.bold) styles['font-weight'] = 'bold';
  if (font.italic) styles['font-style'] = 'italic';
  if (font.underline && font.underline !== 'none') styles['text-decoration'] = 'underline';
  return styles;
}

/**
 * Resolve the StyleSet of a cell.
 *
 * When the cell anchors a merge region, the borders of every member cell are
 * overlaid in row-major order (a later member wins on the same property), so
 * borders drawn on the outer members of the block reach the merged cell.
 */
export function resolveCellStyle(
  style: CellStyleData,
  ctx: RenderContext,
  region?: MergeRegion,
): StyleSet {
  const { palette } = ctx;
  const styles: StyleSet = { 'border-collapse': 'collapse' };

  Object.assign(styles, borderStyles(style.border, palette));
  if (region) {
    for (const member of region.members) {
      const memberCell = getCell(ctx.sheet, member.row, member.column);
      if (memberCell) Object.assign(styles, borderStyles(memberCell.style.border, palette));
    }
  }

  Object.assign(styles, alignmentStyles(style.alignment));
  Object.assign(styles, fillStyles(style.fill, palette));
  Object.assign(styles, fontStyles(style.font, palette));
  return styles;
}
