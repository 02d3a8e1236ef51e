/**
 * Grid builder: lays a worksheet out as rows of cells with merge spans,
 * row heights, column specs and anchored images.
 */

import { coordinate, parseRange, parseSqref, rangeCells, rangeContains, CellRange } from '../parser/cellRef';
import { columnWidthToPx, emuToPx, rowHeightToPx } from '../parser/units';
import { ImageAnchorData } from '../model/Drawing';
import { SheetData, getCell } from '../model/Worksheet';
import { bytesToDataUri } from '../utils/media';
import { RenderContext } from './RenderContext';
import { resolveCellStyle } from './CellStyleResolver';
import {
  ColumnSpec,
  GridCell,
  GridRow,
  ImagePlacement,
  MergeRegion,
  SheetRenderModel,
  imageKey,
} from './SheetModel';

export interface MergeLayout {
  /** Regions keyed by the A1 coordinate of their anchor. */
  regions: Map<string, MergeRegion>;
  /** Coordinates of merge members other than the anchors. */
  suppressed: Set<string>;
}

/**
 * Build merge regions from the sheet's merged ranges. A cell covered by more
 * than one range keeps the first.
 */
export function buildMergeLayout(sheet: SheetData): MergeLayout {
  const regions = new Map<string, MergeRegion>();
  const suppressed = new Set<string>();
  const claimed = new Set<string>();

  for (const ref of sheet.mergeRanges) {
    const range = parseRange(ref);
    if (!range) continue;
    const members = rangeCells(range);
    if (members.some((m) => claimed.has(coordinate(m.row, m.column)))) continue;

    const anchor = range.start;
    regions.set(coordinate(anchor.row, anchor.column), {
      anchor,
      colspan: range.end.column - range.start.column + 1,
      rowspan: range.end.row - range.start.row + 1,
      members,
    });
    for (const m of members) {
      const coord = coordinate(m.row, m.column);
      claimed.add(coord);
      if (m.row !== anchor.row || m.column !== anchor.column) suppressed.add(coord);
    }
  }

  return { regions, suppressed };
}

/**
 * Expand column dimensions into one spec per column index, up to `maxColumn`.
 * A declared width of exactly 0 collapses the column but keeps its slot.
 */
export function buildColumnSpecs(sheet: SheetData): ColumnSpec[] {
  const cols: ColumnSpec[] = [];
  for (const dim of sheet.columnDimensions) {
    const width = columnWidthToPx(dim.width, dim.customWidth);
    const visibility = dim.width === 0 ? 'collapse' : 'visible';
    for (let index = dim.min; index <= dim.max && index <= sheet.maxColumn; index++) {
      cols.push({
        index,
        hidden: dim.hidden,
        width,
        style: { 'min-width': `${width}px`, visibility },
      });
    }
  }
  return cols;
}

function toPlacement(image: ImageAnchorData): ImagePlacement {
  const x = emuToPx(image.from.colOff);
  const y = emuToPx(image.from.rowOff);
  return {
    col: image.from.col + 1,
    row: image.from.row + 1,
    offset: { x, y },
    width: image.extent ? emuToPx(image.extent.cx) : (image.size?.width ?? 0),
    height: image.extent ? emuToPx(image.extent.cy) : (image.size?.height ?? 0),
    src: bytesToDataUri(image.data, image.path),
    style: { 'margin-left': `${x}px`, 'margin-top': `${y}px` },
  };
}

/** Images grouped by `"col:row"` of their anchor cell, in drawing order. */
export function buildImagePlacements(sheet: SheetData): Map<string, ImagePlacement[]> {
  const images = new Map<string, ImagePlacement[]>();
  for (const image of sheet.images) {
    const placement = toPlacement(image);
    const key = imageKey(placement.col, placement.row);
    const list = images.get(key);
    if (list) {
      list.push(placement);
    } else {
      images.set(key, [placement]);
    }
  }
  return images;
}

function listValidationRanges(sheet: SheetData): CellRange[] {
  return sheet.dataValidations
    .filter((dv) => dv.type === 'list')
    .flatMap((dv) => parseSqref(dv.sqref));
}

function isEmptyRow(sheet: SheetData, row: number): boolean {
  for (let column = 1; column <= sheet.maxColumn; column++) {
    const value = getCell(sheet, row, column)?.value ?? null;
    if (value !== null) return false;
  }
  return true;
}

/**
 * Build the render model of the context's sheet, before style deduplication.
 *
 * Leading all-empty rows and hidden rows are left out; empty rows after the
 * first non-empty one are kept. Cells of hidden columns stay in the model and
 * are dropped by the HTML renderer.
 */
export function buildSheetModel(ctx: RenderContext): SheetRenderModel {
  const { sheet } = ctx;
  const { regions, suppressed } = buildMergeLayout(sheet);
  const listRanges = listValidationRanges(sheet);

  const rows: GridRow[] = [];
  const rowHeights = new Map<number, number>();
  let foundData = false;

  for (let row = 1; row <= sheet.maxRow; row++) {
    if (!foundData && isEmptyRow(sheet, row)) continue;
    foundData = true;

    const dim = sheet.rowDimensions.get(row);
    if (dim?.hidden) continue;
    rowHeights.set(row, rowHeightToPx(dim?.height, dim?.customHeight ?? false));

    const cells: GridCell[] = [];
    for (let column = 1; column <= sheet.maxColumn; column++) {
      const id = coordinate(row, column);
      if (suppressed.has(id)) continue;

      const cell = getCell(sheet, row, column);
      const style = cell?.style ?? {};
      const value = cell?.value ?? null;
      const formatted = ctx.formatter({
        value,
        numberFormat: style.numberFormat,
        locale: ctx.locale,
        formula: cell?.formula,
        parseFormula: ctx.parseFormula,
        richText: cell?.richText ?? false,
      });

      const region = regions.get(id);
      const gridCell: GridCell = {
        row,
        column,
        value,
        formattedValue: formatted.replace(/\n/g, '<br/>'),
        isListCandidate: listRanges.some((range) => rangeContains(range, row, column)),
        attrs: { id },
        style: resolveCellStyle(style, ctx, region),
      };
      if (region && region.colspan > 1) gridCell.attrs.colspan = region.colspan;
      if (region && region.rowspan > 1) gridCell.attrs.rowspan = region.rowspan;
      cells.push(gridCell);
    }
    rows.push({ row, cells });
  }

  return {
    title: sheet.name,
    rows,
    cols: buildColumnSpecs(sheet),
    images: buildImagePlacements(sheet),
    styles: new Map(),
    rowHeights,
  };
}
