/**
 * Top-level workbook builder: assembles the theme palette, styles, shared
 * strings, worksheets and their drawings into a single WorkbookData structure.
 */

import { XlsxFiles } from '../parser/ZipParser';
import { parseXml } from '../parser/XmlParser';
import { findRelByType, parseRels, partDir, relsPathFor, resolveRelTarget } from '../parser/RelParser';
import { defaultThemePalette, parseThemePalette } from './Theme';
import { emptyStyles, parseStyles } from './Styles';
import { SheetData, SheetState, parseSharedStrings, parseWorksheet } from './Worksheet';
import { parseDrawing } from './Drawing';

export interface WorkbookData {
  /** Worksheets in tab order. */
  sheets: SheetData[];
  /** 0-based index of the active tab. */
  activeSheet: number;
  /** Theme colors as 6-digit hex, in `lt1, dk1, lt2, dk2, accent1..6` order. */
  themePalette: string[];
  /** Workbook-scoped defined names → formula text, e.g. `Lists!$A$1:$A$3`. */
  definedNames: Map<string, string>;
}

function sheetState(raw: string | undefined): SheetState {
  return raw === 'hidden' || raw === 'veryHidden' ? raw : 'visible';
}

/**
 * Build the complete WorkbookData from extracted XLSX parts.
 *
 * Resolves workbook → worksheet → drawing → media relationships; sheets whose
 * part is missing are skipped.
 */
export function buildWorkbook(files: XlsxFiles): WorkbookData {
  if (!files.workbook) {
    throw new Error('Invalid XLSX: missing xl/workbook.xml');
  }

  const workbookRoot = parseXml(files.workbook);
  const workbookRels = parseRels(files.workbookRels);

  // --- Theme ---
  const themeRel = findRelByType(workbookRels, 'theme');
  const themePath = themeRel ? resolveRelTarget('xl', themeRel.target) : undefined;
  const themeXml: string | undefined =
    (themePath !== undefined ? files.themes.get(themePath) : undefined) ??
    Array.from(files.themes.values())[0];
  const themePalette = themeXml ? parseThemePalette(parseXml(themeXml)) : defaultThemePalette();

  // --- Styles and shared strings ---
  const styles = files.styles ? parseStyles(parseXml(files.styles)) : emptyStyles();
  const sharedStrings = files.sharedStrings
    ? parseSharedStrings(parseXml(files.sharedStrings))
    : [];

  // --- Defined names ---
  const definedNames = new Map<string, string>();
  for (const dn of workbookRoot.child('definedNames').children('definedName')) {
    const name = dn.attr('name');
    // Sheet-scoped names are not addressable from other sheets
    if (!name || dn.attr('localSheetId') !== undefined) continue;
    definedNames.set(name, dn.text());
  }

  // --- Worksheets ---
  const sheets: SheetData[] = [];
  for (const sheetNode of workbookRoot.child('sheets').children('sheet')) {
    const name = sheetNode.attr('name');
    const rId = sheetNode.attr('id');
    const rel = rId ? workbookRels.get(rId) : undefined;
    if (!name || !rel) continue;

    const sheetPath = resolveRelTarget('xl', rel.target);
    const sheetXml = files.worksheets.get(sheetPath);
    if (sheetXml === undefined) {
      console.warn(`Missing worksheet part: ${sheetPath}`);
      continue;
    }

    const { sheet, drawingRId } = parseWorksheet(
      parseXml(sheetXml),
      name,
      { sharedStrings, styles },
      sheetState(sheetNode.attr('state')),
    );

    if (drawingRId) {
      const sheetRels = parseRels(files.worksheetRels.get(relsPathFor(sheetPath)));
      const drawingRel = sheetRels.get(drawingRId);
      if (drawingRel) {
        const drawingPath = resolveRelTarget(partDir(sheetPath), drawingRel.target);
        const drawingXml = files.drawings.get(drawingPath);
        if (drawingXml !== undefined) {
          const drawingRels = parseRels(files.drawingRels.get(relsPathFor(drawingPath)));
          sheet.images = parseDrawing(parseXml(drawingXml), drawingRels, drawingPath, files.media);
        }
      }
    }

    sheets.push(sheet);
  }

  const activeTab = workbookRoot.child('bookViews').child('workbookView').numAttr('activeTab') ?? 0;
  let activeSheet = activeTab >= 0 && activeTab < sheets.length ? activeTab : 0;
  // A hidden sheet cannot be the shown tab
  if (sheets.length > 0 && sheets[activeSheet].state !== 'visible') {
    const firstVisible = sheets.findIndex((s) => s.state === 'visible');
    if (firstVisible >= 0) activeSheet = firstVisible;
  }

  return { sheets, activeSheet, themePalette, definedNames };
}
