/**
 * XLSX zip archive parser.
 * Extracts and categorizes the parts of a .xlsx (which is a zip archive).
 */

import JSZip from 'jszip';
import type { JSZipObject } from 'jszip';

export interface XlsxFiles {
  contentTypes: string;
  workbook: string;
  workbookRels: string;
  sharedStrings?: string;
  styles?: string;
  themes: Map<string, string>; // xl/theme/theme*.xml
  worksheets: Map<string, string>; // xl/worksheets/sheet*.xml
  worksheetRels: Map<string, string>;
  drawings: Map<string, string>; // xl/drawings/drawing*.xml
  drawingRels: Map<string, string>;
  media: Map<string, Uint8Array>; // xl/media/*
}

export interface ZipParseLimits {
  /** Maximum number of non-directory entries in the zip archive. */
  maxEntries?: number;
  /** Maximum uncompressed size for any single entry (bytes). */
  maxEntryUncompressedBytes?: number;
  /** Maximum total uncompressed size across all entries (bytes). */
  maxTotalUncompressedBytes?: number;
  /** Maximum uncompressed size across media entries under `xl/media/` (bytes). */
  maxMediaBytes?: number;
  /** Maximum concurrent zip entry reads during parsing. */
  maxConcurrency?: number;
}

function throwZipLimitExceeded(reason: string): never {
  throw new Error(`XLSX zip limit exceeded: ${reason}`);
}

/** jszip keeps the central-directory size on a private field; absent for some producers. */
function readUncompressedSize(file: JSZipObject): number | undefined {
  const data = (file as unknown as { _data?: { uncompressedSize?: number } })._data;
  const size = data?.uncompressedSize;
  return typeof size === 'number' && Number.isFinite(size) ? size : undefined;
}

async function mapWithConcurrency<T>(
  items: T[],
  concurrency: number,
  mapper: (item: T) => Promise<void>,
): Promise<void> {
  if (items.length === 0) return;
  const workerCount = Math.min(concurrency, items.length);
  let cursor = 0;

  const workers = Array.from({ length: workerCount }, async () => {
    while (true) {
      const index = cursor++;
      if (index >= items.length) return;
      await mapper(items[index]);
    }
  });

  await Promise.all(workers);
}

const XML_PARTS: Array<[RegExp, keyof Pick<
  XlsxFiles,
  'themes' | 'worksheets' | 'worksheetRels' | 'drawings' | 'drawingRels'
>]> = [
  [/^xl\/theme\/theme\d+\.xml$/, 'themes'],
  [/^xl\/worksheets\/_rels\/[^/]+\.xml\.rels$/, 'worksheetRels'],
  [/^xl\/worksheets\/[^/]+\.xml$/, 'worksheets'],
  [/^xl\/drawings\/_rels\/[^/]+\.xml\.rels$/, 'drawingRels'],
  [/^xl\/drawings\/[^/]+\.xml$/, 'drawings'],
];

/**
 * Parse a .xlsx file buffer and extract the parts the renderer needs.
 */
export async function parseZip(
  buffer: ArrayBuffer | Uint8Array,
  limits: ZipParseLimits = {},
): Promise<XlsxFiles> {
  const maxConcurrency = limits.maxConcurrency ?? 8;
  if (!Number.isInteger(maxConcurrency) || maxConcurrency < 1) {
    throwZipLimitExceeded(`maxConcurrency ${limits.maxConcurrency} must be an integer >= 1`);
  }

  const zip = await JSZip.loadAsync(buffer);
  const entries = Object.entries(zip.files).filter(([, file]) => !file.dir);

  if (limits.maxEntries !== undefined && entries.length > limits.maxEntries) {
    throwZipLimitExceeded(`entries ${entries.length} > maxEntries ${limits.maxEntries}`);
  }

  const knownSizeByPath = new Map<string, number>();
  let knownTotalBytes = 0;
  let knownMediaBytes = 0;

  for (const [rawPath, file] of entries) {
    const normalizedPath = rawPath.replace(/\\/g, '/');
    const size = readUncompressedSize(file);
    if (size === undefined) continue;

    knownSizeByPath.set(normalizedPath, size);

    if (limits.maxEntryUncompressedBytes !== undefined && size > limits.maxEntryUncompressedBytes) {
      throwZipLimitExceeded(
        `${normalizedPath} is ${size} bytes > maxEntryUncompressedBytes ${limits.maxEntryUncompressedBytes}`,
      );
    }

    knownTotalBytes += size;
    if (
      limits.maxTotalUncompressedBytes !== undefined &&
      knownTotalBytes > limits.maxTotalUncompressedBytes
    ) {
      throwZipLimitExceeded(
        `total uncompressed bytes ${knownTotalBytes} > maxTotalUncompressedBytes ${limits.maxTotalUncompressedBytes}`,
      );
    }

    if (normalizedPath.startsWith('xl/media/')) {
      knownMediaBytes += size;
      if (limits.maxMediaBytes !== undefined && knownMediaBytes > limits.maxMediaBytes) {
        throwZipLimitExceeded(
          `media bytes ${knownMediaBytes} > maxMediaBytes ${limits.maxMediaBytes}`,
        );
      }
    }
  }

  const result: XlsxFiles = {
    contentTypes: '',
    workbook: '',
    workbookRels: '',
    themes: new Map(),
    worksheets: new Map(),
    worksheetRels: new Map(),
    drawings: new Map(),
    drawingRels: new Map(),
    media: new Map(),
  };

  let unknownMediaBytes = 0;

  await mapWithConcurrency(entries, maxConcurrency, async ([path, file]) => {
    const normalizedPath = path.replace(/\\/g, '/');

    switch (normalizedPath) {
      case '[Content_Types].xml':
        result.contentTypes = await file.async('string');
        return;
      case 'xl/workbook.xml':
        result.workbook = await file.async('string');
        return;
      case 'xl/_rels/workbook.xml.rels':
        result.workbookRels = await file.async('string');
        return;
      case 'xl/sharedStrings.xml':
        result.sharedStrings = await file.async('string');
        return;
      case 'xl/styles.xml':
        result.styles = await file.async('string');
        return;
    }

    // --- Media (binary) ---
    if (normalizedPath.startsWith('xl/media/')) {
      const bytes = await file.async('uint8array');
      if (!knownSizeByPath.has(normalizedPath)) {
        const size = bytes.byteLength;
        if (
          limits.maxEntryUncompressedBytes !== undefined &&
          size > limits.maxEntryUncompressedBytes
        ) {
          throwZipLimitExceeded(
            `${normalizedPath} is ${size} bytes > maxEntryUncompressedBytes ${limits.maxEntryUncompressedBytes}`,
          );
        }
        unknownMediaBytes += size;
        if (
          limits.maxMediaBytes !== undefined &&
          knownMediaBytes + unknownMediaBytes > limits.maxMediaBytes
        ) {
          throwZipLimitExceeded(
            `media bytes ${knownMediaBytes + unknownMediaBytes} > maxMediaBytes ${limits.maxMediaBytes}`,
          );
        }
      }
      result.media.set(normalizedPath, bytes);
      return;
    }

    for (const [pattern, key] of XML_PARTS) {
      if (pattern.test(normalizedPath)) {
        result[key].set(normalizedPath, await file.async('string'));
        return;
      }
    }
  });

  return result;
}
