export {
  convertXlsxToHtml,
  renderWorkbook,
  buildWorksheetModel,
  loadWorkbook,
  selectSheet,
} from './core/Converter';
export type { ConvertOptions, SheetSelector, XlsxInput } from './core/Converter';

export { parseZip } from './parser/ZipParser';
export type { ZipParseLimits, XlsxFiles } from './parser/ZipParser';

export { buildWorkbook } from './model/Workbook';
export type { WorkbookData } from './model/Workbook';

// Render pipeline
export { resolveColor } from './renderer/ColorResolver';
export { mapBorderStyle } from './renderer/BorderStyleMapper';
export type { CssBorderStyle } from './renderer/BorderStyleMapper';
export { resolveCellStyle } from './renderer/CellStyleResolver';
export { buildSheetModel } from './renderer/GridBuilder';
export { dedupeStyles } from './renderer/StyleDeduplicator';
export { renderSheetHtml, renderTable } from './renderer/HtmlRenderer';
export type {
  AppendHeadersHook,
  AppendLineNoHook,
  HtmlRenderOptions,
} from './renderer/HtmlRenderer';
export { createRenderContext } from './renderer/RenderContext';
export type { RenderContext } from './renderer/RenderContext';
export { renderInlineStyles } from './renderer/StyleSet';
export type { CssProperty, StyleSet } from './renderer/StyleSet';
export type {
  SheetRenderModel,
  GridRow,
  GridCell,
  ColumnSpec,
  ImagePlacement,
  MergeRegion,
} from './renderer/SheetModel';

// Formatting and validation helpers
export { formatCellValue } from './format/formatCell';
export type { CellFormatter, FormatRequest } from './format/formatCell';
export { parseCellLocation, dropdownOptionsForCell } from './utils/validation';
export type { CellLocation } from './utils/validation';

// Model types
export type {
  SheetData,
  CellData,
  CellValue,
  RowDimension,
  ColumnDimension,
  DataValidationData,
} from './model/Worksheet';
export type { ImageAnchorData, AnchorMarker } from './model/Drawing';
export type {
  ColorRef,
  BorderEdge,
  BorderSet,
  FillData,
  FontData,
  AlignmentData,
  CellStyleData,
} from './model/Styles';
