/**
 * Intrinsic image size reader: decodes just enough of a PNG, GIF or JPEG
 * header to learn its pixel dimensions.
 */

export interface ImageSize {
  width: number;
  height: number;
}

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];
const GIF_SIGNATURE = [0x47, 0x49, 0x46]; // "GIF"

// JPEG start-of-frame markers carry the frame size; C4/C8/CC are not frames.
const JPEG_SOF_MARKERS = new Set([
  0xc0, 0xc1, 0xc2, 0xc3, 0xc5, 0xc6, 0xc7, 0xc9, 0xca, 0xcb, 0xcd, 0xce, 0xcf,
]);

function startsWith(data: Uint8Array, signature: number[]): boolean {
  if (data.length < signature.length) return false;
  return signature.every((byte, i) => data[i] === byte);
}

function readJpegSize(data: Uint8Array, view: DataView): ImageSize | undefined {
  let offset = 2;
  while (offset + 9 <= data.length) {
    if (data[offset] !== 0xff) {
      offset++;
      continue;
    }
    const marker = data[offset + 1];
    // Fill bytes and standalone markers have no length field
    if (marker === 0xff) {
      offset++;
      continue;
    }
    if (marker === 0xd8 || marker === 0x01 || (marker >= 0xd0 && marker <= 0xd7)) {
      offset += 2;
      continue;
    }
    const segmentLength = view.getUint16(offset + 2);
    if (JPEG_SOF_MARKERS.has(marker)) {
      return { height: view.getUint16(offset + 5), width: view.getUint16(offset + 7) };
    }
    if (segmentLength < 2) return undefined;
    offset += 2 + segmentLength;
  }
  return undefined;
}

/**
 * Read the pixel size of an image. Returns undefined for unsupported or
 * truncated data.
 */
export function readImageSize(data: Uint8Array): ImageSize | undefined {
  const view = new DataView(data.buffer, data.byteOffset, data.byteLength);

  if (startsWith(data, PNG_SIGNATURE)) {
    if (data.length < 24) return undefined;
    // IHDR is always the first chunk
    return { width: view.getUint32(16), height: view.getUint32(20) };
  }

  if (startsWith(data, GIF_SIGNATURE)) {
    if (data.length < 10) return undefined;
    return { width: view.getUint16(6, true), height: view.getUint16(8, true) };
  }

  if (data.length >= 4 && data[0] === 0xff && data[1] === 0xd8) {
    return readJpegSize(data, view);
  }

  return undefined;
}
