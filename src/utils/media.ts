/**
 * Media utilities: MIME type detection and data URI encoding for embedded images.
 */

/**
 * Determine MIME type from file extension.
 * Covers the image formats spreadsheet drawings embed.
 */
export function getMimeType(path: string): string {
  const ext = path.split('.').pop()?.toLowerCase() || '';
  const mimeMap: Record<string, string> = {
    png: 'image/png',
    jpg: 'image/jpeg',
    jpeg: 'image/jpeg',
    gif: 'image/gif',
    svg: 'image/svg+xml',
    bmp: 'image/bmp',
    tiff: 'image/tiff',
    tif: 'image/tiff',
    emf: 'image/x-emf',
    wmf: 'image/x-wmf',
    webp: 'image/webp',
  };
  return mimeMap[ext] || 'application/octet-stream';
}

/**
 * Encode image bytes as a `data:` URI, so the HTML output stays self-contained.
 *
 * @param path - Part path of the image; only its extension is used
 */
export function bytesToDataUri(data: Uint8Array, path: string): string {
  const base64 = Buffer.from(data.buffer, data.byteOffset, data.byteLength).toString('base64');
  return `data:${getMimeType(path)};base64,${base64}`;
}
