/**
 * Worksheet parser: cells, row/column dimensions, merges and data validations
 * from an `xl/worksheets/sheet*.xml` part.
 */

import { SafeXmlNode } from '../parser/XmlParser';
import { coordinate, parseCellRef, parseRange } from '../parser/cellRef';
import { CellStyleData, StylesData } from './Styles';
import type { ImageAnchorData } from './Drawing';

export type CellValue = string | number | boolean | Date | null;

export interface CellData {
  row: number;
  column: number;
  /** Cached value; formulas are never evaluated. */
  value: CellValue;
  formula?: string;
  /** The value came from a rich-text string made of several runs. */
  richText?: boolean;
  style: CellStyleData;
}

export interface RowDimension {
  height?: number;
  customHeight: boolean;
  hidden: boolean;
}

export interface ColumnDimension {
  min: number;
  max: number;
  width?: number;
  customWidth: boolean;
  hidden: boolean;
}

export interface DataValidationData {
  type?: string;
  sqref: string;
  formula1?: string;
}

export type SheetState = 'visible' | 'hidden' | 'veryHidden';

export interface SheetData {
  name: string;
  state: SheetState;
  /** Cells keyed by A1 coordinate. Absent cells are empty and unstyled. */
  cells: Map<string, CellData>;
  maxRow: number;
  maxColumn: number;
  rowDimensions: Map<number, RowDimension>;
  columnDimensions: ColumnDimension[];
  /** Merged ranges as written, e.g. "A1:C2". */
  mergeRanges: string[];
  dataValidations: DataValidationData[];
  /** Floating images in drawing order. */
  images: ImageAnchorData[];
}

export interface SharedString {
  text: string;
  rich: boolean;
}

export interface WorksheetParseContext {
  sharedStrings: SharedString[];
  styles: StylesData;
}

export interface ParsedWorksheet {
  sheet: SheetData;
  /** Relationship id of the sheet's drawing part, if any. */
  drawingRId?: string;
}

/** Look up a cell by 1-based position. */
export function getCell(sheet: SheetData, row: number, column: number): CellData | undefined {
  return sheet.cells.get(coordinate(row, column));
}

/**
 * Parse the shared string table (`sst`). Rich-text items concatenate their runs;
 * phonetic runs are ignored.
 */
export function parseSharedStrings(root: SafeXmlNode): SharedString[] {
  return root.children('si').map((si) => {
    const runs = si.children('r');
    if (runs.length > 0) {
      return { text: runs.map((r) => r.child('t').text()).join(''), rich: true };
    }
    return { text: si.child('t').text(), rich: false };
  });
}

function readValue(
  c: SafeXmlNode,
  ctx: WorksheetParseContext,
): { value: CellValue; richText?: boolean } {
  const type = c.attr('t') ?? 'n';
  const v = c.child('v');
  const raw = v.exists() ? v.text() : undefined;

  switch (type) {
    case 's': {
      const item = raw !== undefined ? ctx.sharedStrings[Number(raw)] : undefined;
      if (!item) return { value: null };
      return item.rich ? { value: item.text, richText: true } : { value: item.text };
    }
    case 'inlineStr': {
      const is = c.child('is');
      const runs = is.children('r');
      if (runs.length > 0) {
        return { value: runs.map((r) => r.child('t').text()).join(''), richText: true };
      }
      return { value: is.child('t').text() };
    }
    case 'b':
      return { value: raw === undefined ? null : raw === '1' || raw === 'true' };
    case 'str':
    case 'e':
      return { value: raw ?? null };
    case 'd': {
      if (raw === undefined) return { value: null };
      const date = new Date(raw);
      return { value: Number.isNaN(date.getTime()) ? raw : date };
    }
    default: {
      if (raw === undefined || raw.trim() === '') return { value: null };
      const n = Number(raw);
      return { value: Number.isNaN(n) ? raw : n };
    }
  }
}

/**
 * Parse a worksheet root (`worksheet`) into SheetData.
 * Cells without an `r` attribute continue from the previous cell of their row.
 */
export function parseWorksheet(
  root: SafeXmlNode,
  name: string,
  ctx: WorksheetParseContext,
  state: SheetState = 'visible',
): ParsedWorksheet {
  const cells = new Map<string, CellData>();
  const rowDimensions = new Map<number, RowDimension>();
  let maxRow = 0;
  let maxColumn = 0;

  let rowNumber = 0;
  for (const rowNode of root.child('sheetData').children('row')) {
    rowNumber = rowNode.numAttr('r') ?? rowNumber + 1;

    const customHeight = rowNode.boolAttr('customHeight');
    const hidden = rowNode.boolAttr('hidden');
    const height = rowNode.numAttr('ht');
    if (customHeight || hidden || height !== undefined) {
      rowDimensions.set(rowNumber, { height, customHeight, hidden });
    }

    let columnNumber = 0;
    for (const c of rowNode.children('c')) {
      const ref = c.attr('r');
      const address = ref ? parseCellRef(ref) : undefined;
      const row = address?.row ?? rowNumber;
      const column = address?.column ?? columnNumber + 1;
      columnNumber = column;

      const styleIndex = c.numAttr('s') ?? 0;
      const { value, richText } = readValue(c, ctx);
      const cell: CellData = {
        row,
        column,
        value,
        style: ctx.styles.cellXfs[styleIndex] ?? {},
      };
      const formula = c.child('f').text();
      if (formula) cell.formula = formula;
      if (richText) cell.richText = true;

      cells.set(coordinate(row, column), cell);
      maxRow = Math.max(maxRow, row);
      maxColumn = Math.max(maxColumn, column);
    }
  }

  const columnDimensions: ColumnDimension[] = [];
  for (const col of root.child('cols').children('col')) {
    const min = col.numAttr('min');
    const max = col.numAttr('max');
    if (!min || !max) continue;
    columnDimensions.push({
      min,
      max,
      width: col.numAttr('width'),
      customWidth: col.boolAttr('customWidth'),
      hidden: col.boolAttr('hidden'),
    });
  }
  columnDimensions.sort((a, b) => a.min - b.min);

  const mergeRanges: string[] = [];
  for (const mergeCell of root.child('mergeCells').children('mergeCell')) {
    const ref = mergeCell.attr('ref');
    const range = ref ? parseRange(ref) : undefined;
    if (!ref || !range) continue;
    mergeRanges.push(ref);
    maxRow = Math.max(maxRow, range.end.row);
    maxColumn = Math.max(maxColumn, range.end.column);
  }

  const dataValidations: DataValidationData[] = [];
  for (const dv of root.child('dataValidations').children('dataValidation')) {
    const sqref = dv.attr('sqref');
    if (!sqref) continue;
    const formula1 = dv.child('formula1');
    dataValidations.push({
      type: dv.attr('type'),
      sqref,
      formula1: formula1.exists() ? formula1.text() : undefined,
    });
  }

  return {
    sheet: {
      name,
      state,
      cells,
      maxRow,
      maxColumn,
      rowDimensions,
      columnDimensions,
      mergeRanges,
      dataValidations,
      images: [],
    },
    drawingRId: root.child('drawing').attr('id'),
  };
}
