/**
 * Default cell formatter: turns a cached cell value and its number format into
 * display text. Output is HTML-escaped; the renderer inserts it verbatim.
 */

import { CellValue } from '../model/Worksheet';

export interface FormatRequest {
  value: CellValue;
  /** Number format code, e.g. `0.00%` or `yyyy-mm-dd`. */
  numberFormat?: string;
  locale: string;
  formula?: string;
  /** Show `=FORMULA` instead of the cached value when the cell has a formula. */
  parseFormula: boolean;
  /** The value was written as rich-text runs and may hold line breaks. */
  richText?: boolean;
}

export type CellFormatter = (request: FormatRequest) => string;

const MS_PER_DAY = 86_400_000;
// Day 0 of the 1900 date system, shifted for the phantom 1900-02-29 (serial 60)
const EPOCH_1900 = Date.UTC(1899, 11, 30);

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

/** Strip quoted literals, `[...]` tokens and backslash escapes from a format section. */
function formatTokens(section: string): string {
  return section
    .replace(/"[^"]*"/g, '')
    .replace(/\[[^\]]*\]/g, '')
    .replace(/\\./g, '')
    .replace(/_./g, '');
}

function isDateFormat(tokens: string): boolean {
  return /[dmyhs]/i.test(tokens);
}

/** Date from a 1900-system serial number, rounded to the second. */
export function serialToDate(serial: number): Date {
  const days = serial < 60 ? serial + 1 : serial;
  const ms = Math.round((days * MS_PER_DAY) / 1000) * 1000;
  return new Date(EPOCH_1900 + ms);
}

const pad = (n: number): string => String(n).padStart(2, '0');

function isoDate(date: Date): string {
  return `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`;
}

function isoTime(date: Date): string {
  return `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`;
}

function formatDateValue(date: Date, tokens: string): string {
  const hasTime = /[hs]/i.test(tokens);
  const hasDate = /[dy]/i.test(tokens) || (!hasTime && /m/i.test(tokens));
  if (hasDate && hasTime) return `${isoDate(date)} ${isoTime(date)}`;
  if (hasTime) return isoTime(date);
  return isoDate(date);
}

function numberFormatter(locale: string, options: Intl.NumberFormatOptions): Intl.NumberFormat {
  try {
    return new Intl.NumberFormat(locale, options);
  } catch (err) {
    if (!(err instanceof RangeError)) throw err;
    // Unknown locale tag
    return new Intl.NumberFormat('en', options);
  }
}

function formatNumber(value: number, numberFormat: string | undefined, locale: string): string {
  if (!numberFormat || numberFormat === 'General' || numberFormat === '@') {
    return String(value);
  }

  const tokens = formatTokens(numberFormat.split(';')[0]);

  if (isDateFormat(tokens)) {
    return formatDateValue(serialToDate(value), tokens);
  }

  if (/E[+-]/i.test(tokens) || !/[0#?]/.test(tokens)) {
    return String(value);
  }

  const decimals = (/\.([0#?]+)/.exec(tokens)?.[1] ?? '').replace(/[#?]/g, '').length;
  const options: Intl.NumberFormatOptions = {
    minimumFractionDigits: decimals,
    maximumFractionDigits: decimals,
    useGrouping: /[0#?],[0#?]/.test(tokens),
  };

  if (tokens.includes('%')) {
    return `${numberFormatter(locale, options).format(value * 100)}%`;
  }
  return numberFormatter(locale, options).format(value);
}

/**
 * Format a cell value for display.
 *
 * - `null` → empty string; booleans → `TRUE` / `FALSE`
 * - date/time formats → ISO `yyyy-mm-dd`, `hh:mm:ss` or both
 * - percent formats → value × 100 with the format's decimals and `%`
 * - fixed decimals or thousands separators → locale-aware number
 * - anything else → the value as written
 */
export const formatCellValue: CellFormatter = ({
  value,
  numberFormat,
  locale,
  formula,
  parseFormula,
}) => {
  if (parseFormula && formula) return escapeHtml(`=${formula}`);
  if (value === null) return '';
  if (typeof value === 'boolean') return value ? 'TRUE' : 'FALSE';
  if (value instanceof Date) {
    const tokens = numberFormat ? formatTokens(numberFormat.split(';')[0]) : '';
    return formatDateValue(value, isDateFormat(tokens) ? tokens : 'yyyy-mm-dd');
  }
  if (typeof value === 'number') return escapeHtml(formatNumber(value, numberFormat, locale));
  return escapeHtml(value);
};
