// ============================================================================
// Spreadsheet Color Utilities
// RGB ↔ HLS conversion and theme tinting on the 0-240 HLS scale
// ============================================================================

/** Spreadsheet tint math runs in integer HLS with this maximum per component. */
export const HLSMAX = 240;

const RGBMAX = 255;

const HEX_RE = /^[0-9a-fA-F]+$/;

export interface Rgb {
  r: number;
  g: number;
  b: number;
}

export interface Hls {
  h: number;
  l: number;
  s: number;
}

// ---------------------------------------------------------------------------
// Basic Color Conversions
// ---------------------------------------------------------------------------

/** Round to the nearest integer, ties to even. */
export function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  const diff = value - floor;
  if (diff > 0.5) return floor + 1;
  if (diff < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
}

/** Wrap a fraction into [0, 1). */
function wrapUnit(value: number): number {
  const wrapped = value % 1;
  return wrapped < 0 ? wrapped + 1 : wrapped;
}

/**
 * Parse a 6-digit hex color (`RRGGBB`, optionally `#`-prefixed or with a leading
 * alpha byte) into RGB components in 0-1. Returns undefined for non-hex input.
 */
export function parseHexColor(hex: string): Rgb | undefined {
  let cleaned = hex.replace(/^#/, '');
  if (!HEX_RE.test(cleaned)) return undefined;
  if (cleaned.length > 6) cleaned = cleaned.slice(-6);
  if (cleaned.length !== 6) return undefined;
  const num = parseInt(cleaned, 16);
  return {
    r: ((num >> 16) & 0xff) / RGBMAX,
    g: ((num >> 8) & 0xff) / RGBMAX,
    b: (num & 0xff) / RGBMAX,
  };
}

/**
 * Format RGB components in 0-1 as an upper-case 6-digit hex string, no `#`.
 */
export function rgbToHex({ r, g, b }: Rgb): string {
  const channel = (v: number): string =>
    Math.max(0, Math.min(RGBMAX, roundHalfEven(v * RGBMAX)))
      .toString(16)
      .padStart(2, '0');
  return (channel(r) + channel(g) + channel(b)).toUpperCase();
}

/**
 * RGB (0-1) to HLS (0-1 each). Hue is a fraction of the full circle.
 */
export function rgbToHls({ r, g, b }: Rgb): Hls {
  const max = Math.max(r, g, b);
  const min = Math.min(r, g, b);
  const l = (max + min) / 2;
  if (max === min) return { h: 0, l, s: 0 };

  const d = max - min;
  const s = l <= 0.5 ? d / (max + min) : d / (2 - max - min);
  const rc = (max - r) / d;
  const gc = (max - g) / d;
  const bc = (max - b) / d;
  let h: number;
  if (r === max) {
    h = bc - gc;
  } else if (g === max) {
    h = 2 + rc - bc;
  } else {
    h = 4 + gc - rc;
  }
  return { h: wrapUnit(h / 6), l, s };
}

function hueChannel(m1: number, m2: number, hue: number): number {
  const h = wrapUnit(hue);
  if (h < 1 / 6) return m1 + (m2 - m1) * h * 6;
  if (h < 0.5) return m2;
  if (h < 2 / 3) return m1 + (m2 - m1) * (2 / 3 - h) * 6;
  return m1;
}

/**
 * HLS (0-1 each) to RGB (0-1).
 */
export function hlsToRgb({ h, l, s }: Hls): Rgb {
  if (s === 0) return { r: l, g: l, b: l };
  const m2 = l <= 0.5 ? l * (1 + s) : l + s - l * s;
  const m1 = 2 * l - m2;
  return {
    r: hueChannel(m1, m2, h + 1 / 3),
    g: hueChannel(m1, m2, h),
    b: hueChannel(m1, m2, h - 1 / 3),
  };
}

// ---------------------------------------------------------------------------
// Theme Tint
// ---------------------------------------------------------------------------

/** RGB (0-1) to integer HLS on the 0-240 scale. */
export function rgbToMsHls(rgb: Rgb): Hls {
  const { h, l, s } = rgbToHls(rgb);
  return {
    h: roundHalfEven(h * HLSMAX),
    l: roundHalfEven(l * HLSMAX),
    s: roundHalfEven(s * HLSMAX),
  };
}

/** Integer HLS on the 0-240 scale to RGB (0-1). */
export function msHlsToRgb({ h, l, s }: Hls): Rgb {
  return hlsToRgb({ h: h / HLSMAX, l: l / HLSMAX, s: s / HLSMAX });
}

/**
 * Apply a tint in [-1, 1] to a 0-240 luminance. Negative tints darken towards
 * black, positive tints lighten towards white.
 */
export function tintLuminance(tint: number, lum: number): number {
  if (tint < 0) {
    return roundHalfEven(lum * (1 + tint));
  }
  return roundHalfEven(lum * (1 - tint) + (HLSMAX - HLSMAX * (1 - tint)));
}

/**
 * Tint a 6-digit hex color. Returns an upper-case hex string without `#`,
 * or undefined when the input is not a hex color.
 */
export function applyTint(hex: string, tint: number): string | undefined {
  const rgb = parseHexColor(hex);
  if (!rgb) return undefined;
  const hls = rgbToMsHls(rgb);
  return rgbToHex(msHlsToRgb({ ...hls, l: tintLuminance(tint, hls.l) }));
}
