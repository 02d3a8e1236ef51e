/**
 * Sheet render model: the grid handed from the builder and deduplicator to
 * the HTML renderer.
 */

import { CellAddress } from '../parser/cellRef';
import { CellValue } from '../model/Worksheet';
import { StyleSet } from './StyleSet';

/** A rectangular merged block; only its top-left anchor is rendered. */
export interface MergeRegion {
  anchor: CellAddress;
  colspan: number;
  rowspan: number;
  /** Every cell of the block in row-major order, anchor included. */
  members: CellAddress[];
}

export interface CellAttrs {
  /** A1 coordinate of the cell. */
  id: string;
  colspan?: number;
  rowspan?: number;
  class?: string;
}

export interface GridCell {
  row: number;
  column: number;
  value: CellValue;
  /** Display HTML: formatter output with newlines turned into `<br/>`. */
  formattedValue: string;
  /** The cell lies inside a list data validation. */
  isListCandidate: boolean;
  attrs: CellAttrs;
  style: StyleSet;
}

export interface GridRow {
  /** 1-based sheet row number. */
  row: number;
  cells: GridCell[];
}

export interface ColumnSpec {
  /** 1-based column index. */
  index: number;
  hidden: boolean;
  /** Width in px. */
  width: number;
  style: StyleSet;
}

export interface ImagePlacement {
  /** 1-based anchor column and row. */
  col: number;
  row: number;
  offset: { x: number; y: number };
  width: number;
  height: number;
  /** `data:` URI of the image bytes. */
  src: string;
  style: StyleSet;
}

export interface SheetRenderModel {
  title: string;
  rows: GridRow[];
  cols: ColumnSpec[];
  /** `"col:row"` → images anchored at that cell, in drawing order. */
  images: Map<string, ImagePlacement[]>;
  /** Shared class name → style rule. */
  styles: Map<string, StyleSet>;
  /** Row number → height in px, for every emitted row. */
  rowHeights: Map<number, number>;
}

/** Key of the image map for a 1-based cell position. */
export function imageKey(col: number, row: number): string {
  return `${col}:${row}`;
}
