/**
 * Data-validation helpers: cell location parsing and dropdown option lists.
 */

import { parseCellRef, parseRange, parseSqref, rangeCells, rangeContains, splitSheetRef } from '../parser/cellRef';
import { WorkbookData } from '../model/Workbook';
import { SheetData, getCell } from '../model/Worksheet';

export interface CellLocation {
  sheetName?: string;
  coord: string;
}

const CELL_LOCATION_RE = /^#(?:([\p{L}\p{N}_]+)[.!])?([A-Za-z]+\d+)$/u;

/**
 * Parse a hyperlink-style cell location.
 *
 *   parseCellLocation('#Sheet1!C1') → { sheetName: 'Sheet1', coord: 'C1' }
 *   parseCellLocation('#Sheet1.C1') → { sheetName: 'Sheet1', coord: 'C1' }
 *   parseCellLocation('#C1')        → { coord: 'C1' }
 */
export function parseCellLocation(location: string): CellLocation | null {
  const match = CELL_LOCATION_RE.exec(location);
  if (!match) return null;
  const [, sheetName, coord] = match;
  return sheetName ? { sheetName, coord } : { coord };
}

/**
 * Values of a range formula such as `Lists!$A$1:$A$3`, as strings in row-major
 * order; empty cells give `''`. Unqualified ranges read from `fallback`.
 */
function valuesForRange(
  workbook: WorkbookData,
  fallback: SheetData,
  formula: string,
): string[] | null {
  const { sheetName, ref } = splitSheetRef(formula.replace(/^=/, ''));
  const range = parseRange(ref);
  if (!range) return null;
  const sheet = sheetName === undefined ? fallback : workbook.sheets.find((s) => s.name === sheetName);
  if (!sheet) return null;
  return rangeCells(range).map(({ row, column }) => {
    const value = getCell(sheet, row, column)?.value ?? null;
    return value === null ? '' : String(value);
  });
}

function splitListFormula(formula: string): string[] {
  let list = formula;
  if (list.startsWith('"')) list = list.slice(1);
  if (list.endsWith('"')) list = list.slice(0, -1);
  return list.split(',');
}

/**
 * Dropdown options of a cell, from the first data validation covering it that
 * has a formula. The formula may name a defined range, be a range itself, or be
 * a quoted comma-separated list. Returns null when no validation applies.
 */
export function dropdownOptionsForCell(
  workbook: WorkbookData,
  sheet: SheetData,
  coordinate: string,
): string[] | null {
  const address = parseCellRef(coordinate);
  if (!address) return null;

  for (const dv of sheet.dataValidations) {
    const inRange = parseSqref(dv.sqref).some((r) => rangeContains(r, address.row, address.column));
    if (!inRange) continue;
    const formula = dv.formula1;
    // A validation without a formula has no options to offer
    if (!formula) continue;

    const definedName = workbook.definedNames.get(formula);
    if (definedName !== undefined) {
      return valuesForRange(workbook, sheet, definedName) ?? splitListFormula(definedName);
    }
    return valuesForRange(workbook, sheet, formula) ?? splitListFormula(formula);
  }

  return null;
}
