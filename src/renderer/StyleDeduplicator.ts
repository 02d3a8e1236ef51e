/**
 * Style deduplicator: moves inline styles shared by two or more cells into
 * class rules.
 */

import { GridCell, GridRow, SheetRenderModel } from './SheetModel';
import { StyleSet, styleKey } from './StyleSet';

interface StyleTally {
  count: number;
  /** Class name derived from the first occurrence in reading order. */
  className: string;
}

/**
 * Class name for a style first seen at 0-based (row, column) of the model.
 */
export function styleClassName(sheetId: number, rowIndex: number, colIndex: number): string {
  return `s${sheetId}-r${rowIndex}-c${colIndex}`;
}

function tallyStyles(rows: GridRow[], sheetId: number): Map<string, StyleTally> {
  const tally = new Map<string, StyleTally>();
  rows.forEach((row, rowIndex) => {
    row.cells.forEach((cell, colIndex) => {
      const key = styleKey(cell.style);
      const entry = tally.get(key);
      if (entry) {
        entry.count++;
      } else {
        tally.set(key, { count: 1, className: styleClassName(sheetId, rowIndex, colIndex) });
      }
    });
  });
  return tally;
}

/**
 * Deduplicate the model's cell styles. Returns a new model; the input is not
 * modified. Styles used by a single cell stay inline.
 */
export function dedupeStyles(model: SheetRenderModel, sheetId: number): SheetRenderModel {
  const tally = tallyStyles(model.rows, sheetId);
  const styles = new Map<string, StyleSet>(model.styles);

  const rows = model.rows.map(
    (row): GridRow => ({
      row: row.row,
      cells: row.cells.map((cell): GridCell => {
        const entry = tally.get(styleKey(cell.style));
        if (!entry || entry.count < 2) return cell;
        if (!styles.has(entry.className)) styles.set(entry.className, cell.style);
        return { ...cell, attrs: { ...cell.attrs, class: entry.className }, style: {} };
      }),
    }),
  );

  return { ...model, rows, styles };
}
