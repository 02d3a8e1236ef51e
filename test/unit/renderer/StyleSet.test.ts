import { describe, it, expect } from 'vitest';
import { renderInlineStyles, styleEntries, styleKey } from '../../../src/renderer/StyleSet';

describe('styleEntries', () => {
  it('sorts declared properties and drops empty ones', () => {
    expect(
      styleEntries({ color: '#FF0000', 'background-color': null, 'font-size': '11px', 'text-align': '' }),
    ).toEqual([
      ['color', '#FF0000'],
      ['font-size', '11px'],
    ]);
  });
});

describe('renderInlineStyles', () => {
  it('joins sorted pairs with "; "', () => {
    expect(renderInlineStyles({ 'font-weight': 'bold', 'border-collapse': 'collapse', color: '#000000' })).toBe(
      'border-collapse: collapse; color: #000000; font-weight: bold',
    );
  });

  it('renders an empty string when nothing is declared', () => {
    expect(renderInlineStyles({ color: null, 'font-size': '', 'text-align': null })).toBe('');
    expect(renderInlineStyles({})).toBe('');
    expect(renderInlineStyles(undefined)).toBe('');
  });
});

describe('styleKey', () => {
  it('ignores insertion order and undeclared values', () => {
    expect(styleKey({ color: '#000000', 'font-weight': 'bold' })).toBe(
      styleKey({ 'font-weight': 'bold', color: '#000000', 'text-align': null }),
    );
  });

  it('distinguishes different values', () => {
    expect(styleKey({ color: '#000000' })).not.toBe(styleKey({ color: '#000001' }));
  });
});
