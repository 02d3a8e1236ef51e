/**
 * Border style mapper: spreadsheet border line styles to CSS width/style pairs.
 */

export interface CssBorderStyle {
  width: string;
  style: string;
}

const BORDER_STYLES: Record<string, CssBorderStyle> = {
  thin: { width: '1px', style: 'solid' },
  medium: { width: '2px', style: 'solid' },
  thick: { width: '3px', style: 'solid' },
  hair: { width: '1px', style: 'dotted' },
  dotted: { width: '1px', style: 'dotted' },
  dashed: { width: '1px', style: 'dashed' },
  double: { width: '3px', style: 'double' },
  mediumDashed: { width: '2px', style: 'dashed' },
  dashDot: { width: '1px', style: 'dashed' },
  mediumDashDot: { width: '2px', style: 'dashed' },
  dashDotDot: { width: '1px', style: 'dotted' },
  mediumDashDotDot: { width: '2px', style: 'dotted' },
  slantDashDot: { width: '2px', style: 'dashed' },
};

/**
 * Map a border line style name. Unknown, `none` and absent names return null:
 * the edge has no border.
 */
export function mapBorderStyle(name: string | undefined): CssBorderStyle | null {
  if (!name || !Object.prototype.hasOwnProperty.call(BORDER_STYLES, name)) return null;
  return BORDER_STYLES[name];
}
