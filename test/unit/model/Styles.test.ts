import { describe, expect, it } from 'vitest';
import { emptyStyles, numberFormatCode, parseColor, parseStyles } from '../../../src/model/Styles';
import { xmlNode } from '../helpers/xmlNode';

const STYLES_XML = `
<styleSheet>
  <numFmts count="1">
    <numFmt numFmtId="164" formatCode="yyyy-mm-dd"/>
  </numFmts>
  <fonts count="2">
    <font><sz val="11"/><color theme="1"/><name val="Calibri"/></font>
    <font><b/><i val="0"/><u/><sz val="14"/><color rgb="FFFF0000"/><name val="Arial"/></font>
  </fonts>
  <fills count="3">
    <fill><patternFill patternType="none"/></fill>
    <fill><patternFill patternType="gray125"/></fill>
    <fill><patternFill patternType="solid"><fgColor theme="4" tint="0.5"/><bgColor indexed="64"/></patternFill></fill>
  </fills>
  <borders count="2">
    <border><left/><right/><top/><bottom/><diagonal/></border>
    <border><left style="thin"><color auto="1"/></left><top style="medium"/><bottom><color rgb="FF00FF00"/></bottom></border>
  </borders>
  <cellXfs count="3">
    <xf numFmtId="0" fontId="0" fillId="0" borderId="0"/>
    <xf numFmtId="164" fontId="1" fillId="2" borderId="1" applyAlignment="1">
      <alignment horizontal="center" vertical="top" wrapText="1"/>
    </xf>
    <xf numFmtId="10" fontId="0" fillId="1" borderId="0"/>
  </cellXfs>
</styleSheet>`;

describe('parseColor', () => {
  it('prefers auto, then rgb, then theme, then indexed', () => {
    expect(parseColor(xmlNode('<color auto="1" rgb="FF000000"/>'))).toEqual({ type: 'auto' });
    expect(parseColor(xmlNode('<color rgb="FF112233" theme="1"/>'))).toEqual({
      type: 'rgb',
      rgb: 'FF112233',
    });
    expect(parseColor(xmlNode('<color theme="4" tint="-0.25"/>'))).toEqual({
      type: 'theme',
      theme: 4,
      tint: -0.25,
    });
    expect(parseColor(xmlNode('<color indexed="10"/>'))).toEqual({ type: 'indexed', index: 10 });
  });

  it('defaults tint to 0', () => {
    expect(parseColor(xmlNode('<color theme="2"/>'))).toEqual({ type: 'theme', theme: 2, tint: 0 });
  });

  it('returns undefined for a missing or empty color', () => {
    expect(parseColor(xmlNode('<font/>').child('color'))).toBeUndefined();
    expect(parseColor(xmlNode('<color/>'))).toBeUndefined();
  });
});

describe('parseStyles', () => {
  const styles = parseStyles(xmlNode(STYLES_XML));

  it('reads custom number formats', () => {
    expect(styles.numberFormats.get(164)).toBe('yyyy-mm-dd');
  });

  it('reads fonts', () => {
    expect(styles.fonts[0]).toEqual({
      size: 11,
      name: 'Calibri',
      color: { type: 'theme', theme: 1, tint: 0 },
    });
    expect(styles.fonts[1]).toEqual({
      size: 14,
      name: 'Arial',
      color: { type: 'rgb', rgb: 'FFFF0000' },
      bold: true,
      underline: 'single',
    });
  });

  it('reads pattern fills', () => {
    expect(styles.fills[0]).toEqual({ patternType: 'none' });
    expect(styles.fills[1]).toEqual({ patternType: 'gray125' });
    expect(styles.fills[2]).toEqual({
      patternType: 'solid',
      fgColor: { type: 'theme', theme: 4, tint: 0.5 },
    });
  });

  it('reads only the border edges that declare something', () => {
    expect(styles.borders[0]).toEqual({});
    expect(styles.borders[1]).toEqual({
      left: { style: 'thin', color: { type: 'auto' } },
      top: { style: 'medium', color: undefined },
      bottom: { style: undefined, color: { type: 'rgb', rgb: 'FF00FF00' } },
    });
  });

  it('resolves cell formats to their font, fill, border, alignment and number format', () => {
    expect(styles.cellXfs).toHaveLength(3);
    const xf = styles.cellXfs[1];
    expect(xf.font).toBe(styles.fonts[1]);
    expect(xf.fill).toBe(styles.fills[2]);
    expect(xf.border).toBe(styles.borders[1]);
    expect(xf.alignment).toEqual({ horizontal: 'center', vertical: 'top' });
    expect(xf.numberFormat).toBe('yyyy-mm-dd');
  });

  it('uses built-in number formats by id', () => {
    expect(styles.cellXfs[0].numberFormat).toBe('General');
    expect(styles.cellXfs[2].numberFormat).toBe('0.00%');
    expect(styles.cellXfs[0].alignment).toBeUndefined();
  });
});

describe('numberFormatCode', () => {
  it('prefers custom formats over built-in ones', () => {
    const custom = new Map([[14, 'dd/mm/yyyy']]);
    expect(numberFormatCode(14, custom)).toBe('dd/mm/yyyy');
    expect(numberFormatCode(14, new Map())).toBe('mm-dd-yy');
  });

  it('returns undefined for unknown ids', () => {
    expect(numberFormatCode(500, new Map())).toBeUndefined();
  });
});

describe('emptyStyles', () => {
  it('has no cell formats', () => {
    expect(emptyStyles().cellXfs).toEqual([]);
  });
});
