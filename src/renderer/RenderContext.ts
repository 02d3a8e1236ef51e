/**
 * Render context: the workbook-level inputs every stage of a sheet render
 * reads: theme palette, cell formatter, locale and formula display.
 */

import { WorkbookData } from '../model/Workbook';
import { SheetData } from '../model/Worksheet';
import { CellFormatter, formatCellValue } from '../format/formatCell';

export interface RenderContext {
  workbook: WorkbookData;
  sheet: SheetData;
  /** 1-based position of the sheet in the workbook; part of generated class names. */
  sheetId: number;
  palette: readonly string[];
  locale: string;
  /** Show `=FORMULA` for formula cells instead of their cached value. */
  parseFormula: boolean;
  formatter: CellFormatter;
}

export interface RenderContextOptions {
  locale?: string;
  parseFormula?: boolean;
  formatter?: CellFormatter;
}

export function createRenderContext(
  workbook: WorkbookData,
  sheetIndex: number,
  options: RenderContextOptions = {},
): RenderContext {
  const sheet = workbook.sheets[sheetIndex];
  if (!sheet) {
    throw new Error(`Worksheet not found: ${sheetIndex}`);
  }
  return {
    workbook,
    sheet,
    sheetId: sheetIndex + 1,
    palette: workbook.themePalette,
    locale: options.locale ?? 'en',
    parseFormula: options.parseFormula ?? false,
    formatter: options.formatter ?? formatCellValue,
  };
}
