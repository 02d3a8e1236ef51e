import { describe, expect, it } from 'vitest';
import {
  findRelByType,
  parseRels,
  partDir,
  relsPathFor,
  resolveRelTarget,
} from '../../../src/parser/RelParser';

const REL_NS = 'http://schemas.openxmlformats.org/package/2006/relationships';
const DOC_REL = 'http://schemas.openxmlformats.org/officeDocument/2006/relationships';

describe('parseRels', () => {
  it('parses TargetMode for external relationships', () => {
    const xml = `
      <Relationships xmlns="${REL_NS}">
        <Relationship
          Id="rId1"
          Type="${DOC_REL}/hyperlink"
          Target="https://example.com"
          TargetMode="External"
        />
      </Relationships>
    `;

    expect(parseRels(xml).get('rId1')).toEqual({
      type: `${DOC_REL}/hyperlink`,
      target: 'https://example.com',
      targetMode: 'External',
    });
  });

  it('parses multiple relationships', () => {
    const xml = `
      <Relationships xmlns="${REL_NS}">
        <Relationship Id="rId1" Type="${DOC_REL}/worksheet" Target="worksheets/sheet1.xml"/>
        <Relationship Id="rId2" Type="${DOC_REL}/theme" Target="theme/theme1.xml"/>
      </Relationships>
    `;
    const rels = parseRels(xml);
    expect(rels.size).toBe(2);
    expect(rels.get('rId1')?.target).toBe('worksheets/sheet1.xml');
    expect(rels.get('rId2')?.target).toBe('theme/theme1.xml');
  });

  it('returns empty map for empty or missing input', () => {
    expect(parseRels('').size).toBe(0);
    expect(parseRels(undefined).size).toBe(0);
  });

  it('skips relationships with missing Id', () => {
    const xml = `
      <Relationships xmlns="${REL_NS}">
        <Relationship Type="${DOC_REL}/worksheet" Target="worksheets/sheet1.xml"/>
      </Relationships>
    `;
    expect(parseRels(xml).size).toBe(0);
  });

  it('handles relationship without TargetMode', () => {
    const xml = `
      <Relationships xmlns="${REL_NS}">
        <Relationship Id="rId1" Type="${DOC_REL}/worksheet" Target="worksheets/sheet1.xml"/>
      </Relationships>
    `;
    expect(parseRels(xml).get('rId1')?.targetMode).toBeUndefined();
  });
});

describe('findRelByType', () => {
  const rels = parseRels(`
    <Relationships xmlns="${REL_NS}">
      <Relationship Id="rId1" Type="${DOC_REL}/worksheet" Target="worksheets/sheet1.xml"/>
      <Relationship Id="rId2" Type="${DOC_REL}/theme" Target="theme/theme1.xml"/>
      <Relationship Id="rId3" Type="${DOC_REL}/sharedStrings" Target="sharedStrings.xml"/>
    </Relationships>
  `);

  it('matches on the last segment of the type URI', () => {
    expect(findRelByType(rels, 'theme')?.target).toBe('theme/theme1.xml');
  });

  it('does not match a partial segment', () => {
    expect(findRelByType(rels, 'Strings')).toBeUndefined();
  });
});

describe('part paths', () => {
  it('partDir returns the directory of a part', () => {
    expect(partDir('xl/worksheets/sheet1.xml')).toBe('xl/worksheets');
    expect(partDir('workbook.xml')).toBe('');
  });

  it('relsPathFor returns the rels part beside a part', () => {
    expect(relsPathFor('xl/worksheets/sheet1.xml')).toBe('xl/worksheets/_rels/sheet1.xml.rels');
    expect(relsPathFor('xl/drawings/drawing1.xml')).toBe('xl/drawings/_rels/drawing1.xml.rels');
  });
});

describe('resolveRelTarget', () => {
  it('resolves relative path', () => {
    expect(resolveRelTarget('xl', 'worksheets/sheet1.xml')).toBe('xl/worksheets/sheet1.xml');
  });

  it('resolves .. in target path', () => {
    expect(resolveRelTarget('xl/drawings', '../media/image1.png')).toBe('xl/media/image1.png');
  });

  it('resolves absolute target (leading /)', () => {
    expect(resolveRelTarget('xl/worksheets', '/xl/drawings/drawing1.xml')).toBe(
      'xl/drawings/drawing1.xml',
    );
  });

  it('handles backslashes', () => {
    expect(resolveRelTarget('xl\\worksheets', '..\\drawings\\drawing1.xml')).toBe(
      'xl/drawings/drawing1.xml',
    );
  });

  it('resolves . in target path', () => {
    expect(resolveRelTarget('xl', './styles.xml')).toBe('xl/styles.xml');
  });
});
