import { parseZip } from '../parser/ZipParser';
import type { ZipParseLimits } from '../parser/ZipParser';
import { buildWorkbook, WorkbookData } from '../model/Workbook';
import { createRenderContext } from '../renderer/RenderContext';
import { buildSheetModel } from '../renderer/GridBuilder';
import { dedupeStyles } from '../renderer/StyleDeduplicator';
import { renderSheetHtml } from '../renderer/HtmlRenderer';
import type { AppendHeadersHook, AppendLineNoHook } from '../renderer/HtmlRenderer';
import type { SheetRenderModel } from '../renderer/SheetModel';
import type { CellFormatter } from '../format/formatCell';

/** Sheet name, or 0-based sheet index. */
export type SheetSelector = string | number;

export interface ConvertOptions {
  /** Passed to the cell formatter and used as the document language. Default `en`. */
  locale?: string;
  /** Sheet to render. Defaults to the workbook's active sheet. */
  sheet?: SheetSelector;
  /** Show `=FORMULA` for formula cells instead of their cached value. Default false. */
  parseFormula?: boolean;
  /** Replaces the default number/date formatter. Must return HTML-safe text. */
  formatter?: CellFormatter;
  appendHeaders?: AppendHeadersHook;
  appendLineNo?: AppendLineNoHook;
  /** Optional ZIP parsing limits for controlling resource usage and DoS surface. */
  zipLimits?: ZipParseLimits;
}

export type XlsxInput = ArrayBuffer | Uint8Array | Blob;

/**
 * Resolve a sheet selector to a 0-based index.
 *
 * A string matches a sheet name first, then falls back to a numeric index
 * (`"1"` → second sheet). Throws when no sheet matches.
 */
export function selectSheet(workbook: WorkbookData, selector?: SheetSelector): number {
  if (selector === undefined) {
    if (workbook.sheets.length === 0) throw new Error('Worksheet not found: workbook has no sheets');
    return workbook.activeSheet;
  }

  if (typeof selector === 'string') {
    const byName = workbook.sheets.findIndex((s) => s.name === selector);
    if (byName >= 0) return byName;
    if (!/^\d+$/.test(selector.trim())) throw new Error(`Worksheet not found: ${selector}`);
  }

  const index = Number(selector);
  if (!Number.isInteger(index) || index < 0 || index >= workbook.sheets.length) {
    throw new Error(`Worksheet not found: ${selector}`);
  }
  return index;
}

/**
 * Build the deduplicated render model of one sheet.
 */
export function buildWorksheetModel(
  workbook: WorkbookData,
  options: ConvertOptions = {},
): SheetRenderModel {
  const sheetIndex = selectSheet(workbook, options.sheet);
  const ctx = createRenderContext(workbook, sheetIndex, options);
  return dedupeStyles(buildSheetModel(ctx), ctx.sheetId);
}

/**
 * Render one sheet of a parsed workbook as an HTML document.
 */
export function renderWorkbook(workbook: WorkbookData, options: ConvertOptions = {}): string {
  const model = buildWorksheetModel(workbook, options);
  return renderSheetHtml(model, {
    locale: options.locale,
    appendHeaders: options.appendHeaders,
    appendLineNo: options.appendLineNo,
  });
}

/** Load an .xlsx archive into WorkbookData. */
export async function loadWorkbook(
  input: XlsxInput,
  zipLimits?: ZipParseLimits,
): Promise<WorkbookData> {
  const buffer = input instanceof ArrayBuffer || input instanceof Uint8Array ? input : await input.arrayBuffer();
  const files = await parseZip(buffer, zipLimits);
  return buildWorkbook(files);
}

/**
 * Convert an .xlsx archive to an HTML document of one sheet.
 */
export async function convertXlsxToHtml(
  input: XlsxInput,
  options: ConvertOptions = {},
): Promise<string> {
  const workbook = await loadWorkbook(input, options.zipLimits);
  return renderWorkbook(workbook, options);
}
