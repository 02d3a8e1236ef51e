/**
 * HTML renderer: serializes a sheet render model into a standalone HTML
 * document with one `<style>` block and one `<table>`.
 */

import { escapeHtml } from '../format/formatCell';
import { GridCell, ImagePlacement, SheetRenderModel, imageKey } from './SheetModel';
import { StyleSet, renderInlineStyles } from './StyleSet';

export type AttrValue = string | number | boolean | null | undefined;

/** Called after `<colgroup>`; push extra markup (e.g. header rows) onto `html`. */
export type AppendHeadersHook = (model: SheetRenderModel, html: string[]) => void;

/** Called right after each `<tr>`; push extra cells (e.g. a line number) onto `rowHtml`. */
export type AppendLineNoHook = (model: SheetRenderModel, rowHtml: string[], rowIndex: number) => void;

export interface HtmlRenderOptions {
  /** `lang` of the document. Default `en`. */
  locale?: string;
  appendHeaders?: AppendHeadersHook;
  appendLineNo?: AppendLineNoHook;
}

const TABLE_OPEN =
  '<table style="border-collapse: collapse" border="0" cellspacing="0" cellpadding="0">';

/**
 * Serialize attributes sorted by name. Falsy values are dropped and `true`
 * renders as a bare attribute name.
 */
export function renderAttrs(attrs: Record<string, AttrValue>): string {
  return Object.keys(attrs)
    .sort()
    .flatMap((name) => {
      const value = attrs[name];
      if (!value) return [];
      if (value === true) return [name];
      return [`${name}="${escapeHtml(String(value))}"`];
    })
    .join(' ');
}

function openTag(
  name: string,
  attrs: Record<string, AttrValue>,
  style: StyleSet | undefined,
  selfClosing = false,
): string {
  const attrText = renderAttrs(attrs);
  const styleText = renderInlineStyles(style);
  let tag = `<${name}`;
  if (attrText) tag += ` ${attrText}`;
  if (styleText) tag += ` style="${escapeHtml(styleText)}"`;
  return tag + (selfClosing ? '/>' : '>');
}

/** One `.class { prop: value; ... }` rule per shared style. */
export function renderStylesheet(styles: Map<string, StyleSet>): string {
  const rules: string[] = [];
  for (const [className, style] of styles) {
    rules.push(`.${className} { ${renderInlineStyles(style)} }`);
  }
  return rules.join('\n');
}

function renderImage(image: ImagePlacement): string {
  return openTag('img', { height: image.height, src: image.src, width: image.width }, image.style, true);
}

function cellImages(model: SheetRenderModel, cell: GridCell): ImagePlacement[] {
  const span = cell.attrs.colspan ?? 1;
  const images: ImagePlacement[] = [];
  for (let col = cell.column; col < cell.column + span; col++) {
    images.push(...(model.images.get(imageKey(col, cell.row)) ?? []));
  }
  return images;
}

function renderCell(model: SheetRenderModel, cell: GridCell): string {
  const { id, colspan, rowspan } = cell.attrs;
  const attrs: Record<string, AttrValue> = { id, colspan, rowspan, class: cell.attrs.class };
  const images = cellImages(model, cell).map(renderImage).join('\n');
  return `${openTag('td', attrs, cell.style)}${cell.formattedValue}${images}</td>`;
}

/**
 * Serialize the model's table: colgroup, optional header hook output, then one
 * `<tr>` per row. Cells of hidden columns are skipped.
 */
export function renderTable(model: SheetRenderModel, options: HtmlRenderOptions = {}): string {
  const html: string[] = [TABLE_OPEN, '<colgroup>'];
  const hiddenColumns = new Set<number>();
  for (const col of model.cols) {
    if (col.hidden) hiddenColumns.add(col.index);
    html.push(openTag('col', {}, col.style));
  }
  html.push('</colgroup>');

  options.appendHeaders?.(model, html);

  model.rows.forEach((row, rowIndex) => {
    const height = model.rowHeights.get(row.row);
    const rowHtml = [openTag('tr', {}, { height: height !== undefined ? `${height}px` : null })];
    options.appendLineNo?.(model, rowHtml, rowIndex);
    for (const cell of row.cells) {
      if (hiddenColumns.has(cell.column)) continue;
      rowHtml.push(renderCell(model, cell));
    }
    rowHtml.push('</tr>');
    html.push(rowHtml.join('\n'));
  });

  html.push('</table>');
  return html.join('\n');
}

/**
 * Serialize the model as a complete HTML document. Cell text is inserted as
 * is: escaping is the formatter's job.
 */
export function renderSheetHtml(model: SheetRenderModel, options: HtmlRenderOptions = {}): string {
  return [
    '<!DOCTYPE html>',
    `<html lang="${escapeHtml(options.locale ?? 'en')}">`,
    '<head>',
    '<meta charset="UTF-8">',
    `<title>${escapeHtml(model.title)}</title>`,
    '<style>',
    renderStylesheet(model.styles),
    '</style>',
    '</head>',
    '<body>',
    renderTable(model, options),
    '</body>',
    '</html>',
    '',
  ].join('\n');
}
