/**
 * Styles parser: extracts number formats, fonts, fills, borders and cell
 * formats (`cellXfs`) from xl/styles.xml.
 */

import { SafeXmlNode } from '../parser/XmlParser';

/** A color reference as written in SpreadsheetML, before resolution. */
export type ColorRef =
  | { type: 'auto' }
  | { type: 'rgb'; rgb: string }
  | { type: 'indexed'; index: number }
  | { type: 'theme'; theme: number; tint: number };

export type BorderEdgeName = 'top' | 'right' | 'bottom' | 'left';

export const BORDER_EDGES: readonly BorderEdgeName[] = ['top', 'right', 'bottom', 'left'];

export interface BorderEdge {
  /** Line style name (thin, medium, dashed, ...). */
  style?: string;
  color?: ColorRef;
}

export type BorderSet = Partial<Record<BorderEdgeName, BorderEdge>>;

export interface FillData {
  /** `solid`, `none`, `gray125`, ... */
  patternType?: string;
  fgColor?: ColorRef;
}

export interface FontData {
  /** Size in points. */
  size?: number;
  name?: string;
  color?: ColorRef;
  bold?: boolean;
  italic?: boolean;
  /** Underline kind (`single`, `double`, ...); `none` means no underline. */
  underline?: string;
}

export interface AlignmentData {
  horizontal?: string;
  vertical?: string;
}

/** The resolved formatting of one cell: everything a cell format record points at. */
export interface CellStyleData {
  font?: FontData;
  fill?: FillData;
  border?: BorderSet;
  alignment?: AlignmentData;
  numberFormat?: string;
}

export interface StylesData {
  numberFormats: Map<number, string>;
  fonts: FontData[];
  fills: FillData[];
  borders: BorderSet[];
  cellXfs: CellStyleData[];
}

/** Built-in number format ids that carry a fixed format code. */
const BUILTIN_NUMBER_FORMATS: Record<number, string> = {
  0: 'General',
  1: '0',
  2: '0.00',
  3: '#,##0',
  4: '#,##0.00',
  9: '0%',
  10: '0.00%',
  11: '0.00E+00',
  12: '# ?/?',
  13: '# ??/??',
  14: 'mm-dd-yy',
  15: 'd-mmm-yy',
  16: 'd-mmm',
  17: 'mmm-yy',
  18: 'h:mm AM/PM',
  19: 'h:mm:ss AM/PM',
  20: 'h:mm',
  21: 'h:mm:ss',
  22: 'm/d/yy h:mm',
  37: '#,##0 ;(#,##0)',
  38: '#,##0 ;[Red](#,##0)',
  39: '#,##0.00;(#,##0.00)',
  40: '#,##0.00;[Red](#,##0.00)',
  45: 'mm:ss',
  46: '[h]:mm:ss',
  47: 'mmss.0',
  48: '##0.0E+0',
  49: '@',
};

/**
 * Parse a color element (`<color>`, `<fgColor>`).
 * Returns undefined when the element is missing or declares nothing usable.
 */
export function parseColor(node: SafeXmlNode): ColorRef | undefined {
  if (!node.exists()) return undefined;
  if (node.boolAttr('auto')) return { type: 'auto' };

  const rgb = node.attr('rgb');
  if (rgb !== undefined) return { type: 'rgb', rgb };

  const theme = node.numAttr('theme');
  if (theme !== undefined) return { type: 'theme', theme, tint: node.numAttr('tint') ?? 0 };

  const indexed = node.numAttr('indexed');
  if (indexed !== undefined) return { type: 'indexed', index: indexed };

  return undefined;
}

/** `<b/>` is on; `<b val="0"/>` is off. */
function flag(node: SafeXmlNode): boolean {
  return node.exists() && node.boolAttr('val', true);
}

function parseFont(node: SafeXmlNode): FontData {
  const font: FontData = {};
  const size = node.child('sz').numAttr('val');
  if (size !== undefined) font.size = size;
  const name = node.child('name').attr('val');
  if (name) font.name = name;
  const color = parseColor(node.child('color'));
  if (color) font.color = color;
  if (flag(node.child('b'))) font.bold = true;
  if (flag(node.child('i'))) font.italic = true;
  const u = node.child('u');
  if (u.exists()) font.underline = u.attr('val') ?? 'single';
  return font;
}

function parseFill(node: SafeXmlNode): FillData {
  const pattern = node.child('patternFill');
  if (!pattern.exists()) return {};
  const fill: FillData = {};
  const patternType = pattern.attr('patternType');
  if (patternType) fill.patternType = patternType;
  const fg = parseColor(pattern.child('fgColor'));
  if (fg) fill.fgColor = fg;
  return fill;
}

function parseBorder(node: SafeXmlNode): BorderSet {
  const border: BorderSet = {};
  for (const edge of BORDER_EDGES) {
    const edgeNode = node.child(edge);
    const style = edgeNode.attr('style');
    const color = parseColor(edgeNode.child('color'));
    if (style === undefined && color === undefined) continue;
    border[edge] = { style, color };
  }
  return border;
}

function parseAlignment(node: SafeXmlNode): AlignmentData | undefined {
  if (!node.exists()) return undefined;
  const alignment: AlignmentData = {};
  const horizontal = node.attr('horizontal');
  if (horizontal) alignment.horizontal = horizontal;
  const vertical = node.attr('vertical');
  if (vertical) alignment.vertical = vertical;
  return alignment;
}

/** Number format code for an id: custom formats first, then the built-in table. */
export function numberFormatCode(
  id: number,
  custom: Map<number, string>,
): string | undefined {
  return custom.get(id) ?? BUILTIN_NUMBER_FORMATS[id];
}

/**
 * Parse a styles root (`styleSheet`) into StylesData.
 */
export function parseStyles(root: SafeXmlNode): StylesData {
  const numberFormats = new Map<number, string>();
  for (const numFmt of root.child('numFmts').children('numFmt')) {
    const id = numFmt.numAttr('numFmtId');
    const code = numFmt.attr('formatCode');
    if (id !== undefined && code !== undefined) numberFormats.set(id, code);
  }

  const fonts = root.child('fonts').children('font').map(parseFont);
  const fills = root.child('fills').children('fill').map(parseFill);
  const borders = root.child('borders').children('border').map(parseBorder);

  const cellXfs = root
    .child('cellXfs')
    .children('xf')
    .map((xf): CellStyleData => {
      const style: CellStyleData = {};
      const font = fonts[xf.numAttr('fontId') ?? 0];
      if (font) style.font = font;
      const fill = fills[xf.numAttr('fillId') ?? 0];
      if (fill) style.fill = fill;
      const border = borders[xf.numAttr('borderId') ?? 0];
      if (border) style.border = border;
      const alignment = parseAlignment(xf.child('alignment'));
      if (alignment) style.alignment = alignment;
      const numberFormat = numberFormatCode(xf.numAttr('numFmtId') ?? 0, numberFormats);
      if (numberFormat) style.numberFormat = numberFormat;
      return style;
    });

  return { numberFormats, fonts, fills, borders, cellXfs };
}

/** Styles of a workbook without a styles part. */
export function emptyStyles(): StylesData {
  return { numberFormats: new Map(), fonts: [], fills: [], borders: [], cellXfs: [] };
}
