import { describe, expect, it } from 'vitest';
import { defaultThemePalette, parseThemePalette, THEME_SLOTS } from '../../../src/model/Theme';
import { parseXml, SafeXmlNode } from '../../../src/parser/XmlParser';

type ColorDef = { type: 'srgb' | 'sys'; val: string; lastClr?: string };

function makeThemeXml(colors?: Record<string, ColorDef>): SafeXmlNode {
  const scheme = colors ?? {
    dk1: { type: 'sys', val: 'windowText', lastClr: '000000' },
    lt1: { type: 'sys', val: 'window', lastClr: 'FFFFFF' },
    dk2: { type: 'srgb', val: '44546A' },
    lt2: { type: 'srgb', val: 'E7E6E6' },
    accent1: { type: 'srgb', val: '4472C4' },
    accent2: { type: 'srgb', val: 'ED7D31' },
    accent3: { type: 'srgb', val: 'A5A5A5' },
    accent4: { type: 'srgb', val: 'FFC000' },
    accent5: { type: 'srgb', val: '5B9BD5' },
    accent6: { type: 'srgb', val: '70AD47' },
    hlink: { type: 'srgb', val: '0563C1' },
  };

  const colorNodes = Object.entries(scheme)
    .map(([slot, def]) => {
      if (def.type === 'srgb') return `<a:${slot}><a:srgbClr val="${def.val}"/></a:${slot}>`;
      const last = def.lastClr ? ` lastClr="${def.lastClr}"` : '';
      return `<a:${slot}><a:sysClr val="${def.val}"${last}/></a:${slot}>`;
    })
    .join('\n');

  return parseXml(`
    <a:theme xmlns:a="http://schemas.openxmlformats.org/drawingml/2006/main" name="Office Theme">
      <a:themeElements>
        <a:clrScheme name="Office">${colorNodes}</a:clrScheme>
      </a:themeElements>
    </a:theme>
  `);
}

describe('parseThemePalette', () => {
  it('orders slots light-first: lt1, dk1, lt2, dk2, accent1..6', () => {
    expect(parseThemePalette(makeThemeXml())).toEqual([
      'FFFFFF',
      '000000',
      'E7E6E6',
      '44546A',
      '4472C4',
      'ED7D31',
      'A5A5A5',
      'FFC000',
      '5B9BD5',
      '70AD47',
    ]);
  });

  it('has exactly ten slots and ignores hyperlink colors', () => {
    expect(parseThemePalette(makeThemeXml())).toHaveLength(THEME_SLOTS.length);
    expect(THEME_SLOTS).toHaveLength(10);
  });

  it('uses lastClr for window system colors', () => {
    const palette = parseThemePalette(
      makeThemeXml({ lt1: { type: 'sys', val: 'window', lastClr: 'FAFAFA' } }),
    );
    expect(palette[0]).toBe('FAFAFA');
  });

  it('falls back to val when a window color has no lastClr', () => {
    const palette = parseThemePalette(makeThemeXml({ dk1: { type: 'sys', val: 'windowText' } }));
    expect(palette[1]).toBe('windowText');
  });

  it('fills missing slots with white', () => {
    const palette = parseThemePalette(makeThemeXml({ accent2: { type: 'srgb', val: '123456' } }));
    expect(palette[5]).toBe('123456');
    expect(palette.filter((c) => c === 'FFFFFF')).toHaveLength(9);
  });

  it('returns the all-white palette when there is no color scheme', () => {
    const root = parseXml(
      '<a:theme xmlns:a="http://schemas.openxmlformats.org/drawingml/2006/main"><a:themeElements/></a:theme>',
    );
    expect(parseThemePalette(root)).toEqual(defaultThemePalette());
  });
});

describe('defaultThemePalette', () => {
  it('is ten white slots', () => {
    expect(defaultThemePalette()).toEqual(Array(10).fill('FFFFFF'));
  });
});
