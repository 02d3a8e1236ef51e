/**
 * A1-style cell reference helpers.
 *
 * Rows and columns are 1-based throughout, matching the worksheet XML.
 */

export interface CellAddress {
  row: number;
  column: number;
}

export interface CellRange {
  start: CellAddress;
  end: CellAddress;
}

const CELL_RE = /^\$?([A-Za-z]{1,3})\$?(\d+)$/;

/** "A" → 1, "Z" → 26, "AA" → 27. Returns 0 for an empty or invalid string. */
export function columnIndexFromLetters(letters: string): number {
  let index = 0;
  for (const ch of letters.toUpperCase()) {
    const code = ch.charCodeAt(0);
    if (code < 65 || code > 90) return 0;
    index = index * 26 + (code - 64);
  }
  return index;
}

/** 1 → "A", 27 → "AA". */
export function columnLetters(index: number): string {
  let n = index;
  let out = '';
  while (n > 0) {
    const rem = (n - 1) % 26;
    out = String.fromCharCode(65 + rem) + out;
    n = Math.floor((n - 1) / 26);
  }
  return out;
}

/** Build the A1 coordinate of a cell. */
export function coordinate(row: number, column: number): string {
  return `${columnLetters(column)}${row}`;
}

/** Parse "B3" or "$B$3". */
export function parseCellRef(ref: string): CellAddress | undefined {
  const m = CELL_RE.exec(ref.trim());
  if (!m) return undefined;
  const column = columnIndexFromLetters(m[1]);
  const row = Number(m[2]);
  if (column < 1 || row < 1) return undefined;
  return { row, column };
}

/** Strip an optional sheet qualifier: "'My Sheet'!A1:B2" → ["My Sheet", "A1:B2"]. */
export function splitSheetRef(ref: string): { sheetName?: string; ref: string } {
  const bang = ref.lastIndexOf('!');
  if (bang < 0) return { ref };
  let sheetName = ref.substring(0, bang);
  if (sheetName.startsWith("'") && sheetName.endsWith("'") && sheetName.length >= 2) {
    sheetName = sheetName.slice(1, -1).replace(/''/g, "'");
  }
  return { sheetName, ref: ref.substring(bang + 1) };
}

/**
 * Parse "A1:C4" (or a single cell "B2", which becomes a 1×1 range).
 * Corners are normalized so `start` is the top-left.
 */
export function parseRange(ref: string): CellRange | undefined {
  const parts = ref.trim().split(':');
  if (parts.length > 2) return undefined;
  const a = parseCellRef(parts[0]);
  const b = parts.length === 2 ? parseCellRef(parts[1]) : a;
  if (!a || !b) return undefined;
  return {
    start: { row: Math.min(a.row, b.row), column: Math.min(a.column, b.column) },
    end: { row: Math.max(a.row, b.row), column: Math.max(a.column, b.column) },
  };
}

/** Parse a space-separated list of ranges (a `sqref` attribute). Invalid items are skipped. */
export function parseSqref(sqref: string): CellRange[] {
  const ranges: CellRange[] = [];
  for (const item of sqref.split(/\s+/)) {
    if (!item) continue;
    const range = parseRange(item);
    if (range) ranges.push(range);
  }
  return ranges;
}

export function rangeContains(range: CellRange, row: number, column: number): boolean {
  return (
    row >= range.start.row &&
    row <= range.end.row &&
    column >= range.start.column &&
    column <= range.end.column
  );
}

/** All addresses of a range in row-major order. */
export function rangeCells(range: CellRange): CellAddress[] {
  const cells: CellAddress[] = [];
  for (let row = range.start.row; row <= range.end.row; row++) {
    for (let column = range.start.column; column <= range.end.column; column++) {
      cells.push({ row, column });
    }
  }
  return cells;
}
