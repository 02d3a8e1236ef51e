/**
 * Parser for .rels (Relationship) parts of an XLSX package.
 * A rels part maps relationship IDs (rId1, rId2, ...) to target parts.
 */

import { parseXml } from './XmlParser';

export interface RelEntry {
  type: string;
  target: string;
  targetMode?: string;
}

/**
 * Parse a .rels XML string into a Map of relationship ID -> RelEntry.
 *
 * ```xml
 * <Relationships xmlns="...">
 *   <Relationship Id="rId1" Type="http://.../worksheet" Target="worksheets/sheet1.xml"/>
 * </Relationships>
 * ```
 */
export function parseRels(xmlString: string | undefined): Map<string, RelEntry> {
  const result = new Map<string, RelEntry>();
  if (!xmlString) return result;

  const root = parseXml(xmlString);
  for (const rel of root.children('Relationship')) {
    const id = rel.attr('Id');
    const type = rel.attr('Type');
    const target = rel.attr('Target');
    if (id && type !== undefined && target !== undefined) {
      result.set(id, { type, target, targetMode: rel.attr('TargetMode') });
    }
  }

  return result;
}

/** First relationship whose type URI ends with `/{typeSuffix}`. */
export function findRelByType(
  rels: Map<string, RelEntry>,
  typeSuffix: string,
): RelEntry | undefined {
  for (const entry of rels.values()) {
    if (entry.type.endsWith(`/${typeSuffix}`)) return entry;
  }
  return undefined;
}

/** Directory part of a package path: "xl/worksheets/sheet1.xml" → "xl/worksheets". */
export function partDir(partPath: string): string {
  const idx = partPath.lastIndexOf('/');
  return idx >= 0 ? partPath.substring(0, idx) : '';
}

/** Rels part of a package part: "xl/worksheets/sheet1.xml" → "xl/worksheets/_rels/sheet1.xml.rels". */
export function relsPathFor(partPath: string): string {
  const dir = partDir(partPath);
  const fileName = partPath.substring(partPath.lastIndexOf('/') + 1);
  return dir ? `${dir}/_rels/${fileName}.rels` : `_rels/${fileName}.rels`;
}

/**
 * Resolve a relative target against the directory of the part that owns the rels.
 *
 *   resolveRelTarget('xl', 'worksheets/sheet1.xml')         → 'xl/worksheets/sheet1.xml'
 *   resolveRelTarget('xl/drawings', '../media/image1.png')  → 'xl/media/image1.png'
 *   resolveRelTarget('xl', '/xl/theme/theme1.xml')          → 'xl/theme/theme1.xml'
 */
export function resolveRelTarget(basePath: string, target: string): string {
  if (target.startsWith('/')) {
    return target.slice(1);
  }

  const resolved = basePath.replace(/\\/g, '/').split('/').filter(Boolean);
  for (const part of target.replace(/\\/g, '/').split('/').filter(Boolean)) {
    if (part === '..') {
      resolved.pop();
    } else if (part !== '.') {
      resolved.push(part);
    }
  }

  return resolved.join('/');
}
