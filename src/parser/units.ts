/**
 * Unit conversion utilities for SpreadsheetML / DrawingML.
 *
 *   - EMU (English Metric Units): 1 inch = 914400 EMU, used for drawing anchors
 *   - Column widths: number of characters of the default font
 *   - Row heights: points
 */

/** EMU per pixel at 96 DPI. */
export const EMU_PER_PX = 9525;

/** Default row height in px when a row declares no custom height. */
export const DEFAULT_ROW_HEIGHT = 19;

/** Default column width, in tenths of characters, when none is declared. */
export const DEFAULT_COLUMN_WIDTH = 0.89;

/** Pixels per column-width unit. */
export const COLUMN_WIDTH_PX = 96;

/** EMU to whole pixels (at 96 DPI). */
export function emuToPx(emu: number): number {
  return Math.round(emu / EMU_PER_PX);
}

/** Round to two decimals. */
export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Pixel width of a column: the declared character width scaled down by ten,
 * rounded to two decimals, at 96 px per unit. Undeclared widths use 0.89.
 */
export function columnWidthToPx(width: number | undefined, customWidth: boolean): number {
  const units = customWidth && width !== undefined ? round2(width / 10) : DEFAULT_COLUMN_WIDTH;
  return COLUMN_WIDTH_PX * units;
}

/** Row height in px: the declared custom height rounded to two decimals, or 19. */
export function rowHeightToPx(height: number | undefined, customHeight: boolean): number {
  return customHeight && height !== undefined ? round2(height) : DEFAULT_ROW_HEIGHT;
}
