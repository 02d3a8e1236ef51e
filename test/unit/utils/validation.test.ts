import { describe, it, expect } from 'vitest';
import { dropdownOptionsForCell, parseCellLocation } from '../../../src/utils/validation';
import { createSheet, createWorkbook } from '../helpers/mockContext';

describe('parseCellLocation', () => {
  it('splits a sheet-qualified location', () => {
    expect(parseCellLocation('#Sheet1!C1')).toEqual({ sheetName: 'Sheet1', coord: 'C1' });
    expect(parseCellLocation('#Sheet1.C1')).toEqual({ sheetName: 'Sheet1', coord: 'C1' });
  });

  it('accepts sheet names in any script', () => {
    expect(parseCellLocation('#Лист1!C1')).toEqual({ sheetName: 'Лист1', coord: 'C1' });
    expect(parseCellLocation('#売上_2024.B7')).toEqual({ sheetName: '売上_2024', coord: 'B7' });
  });

  it('returns only the coordinate for an unqualified location', () => {
    expect(parseCellLocation('#C1')).toEqual({ coord: 'C1' });
  });

  it('rejects locations that are not cell links', () => {
    expect(parseCellLocation('Sheet1!C1')).toBeNull();
    expect(parseCellLocation('#Sheet1!C')).toBeNull();
    expect(parseCellLocation('#My Sheet!A1')).toBeNull();
  });
});

describe('dropdownOptionsForCell', () => {
  const lists = createSheet({ A1: 'Red', A3: 3 }, { name: 'Lists' });
  const form = createSheet(
    { D1: 'alpha', D2: 'beta' },
    {
      name: 'Form',
      dataValidations: [
        { type: 'whole', sqref: 'A1:A9' },
        { type: 'list', sqref: 'A1:A2', formula1: '"Yes,No,Maybe"' },
        { type: 'list', sqref: 'B1', formula1: 'Lists!$A$1:$A$3' },
        { type: 'list', sqref: 'B2', formula1: '$D$1:$D$2' },
        { type: 'list', sqref: 'C1 C3', formula1: 'Colors' },
        { type: 'list', sqref: 'C2', formula1: 'Sizes' },
      ],
    },
  );
  const workbook = createWorkbook([form, lists], {
    definedNames: new Map([
      ['Colors', 'Lists!$A$1:$A$3'],
      ['Sizes', '"S,M,L"'],
    ]),
  });

  it('splits a quoted list, skipping validations without a formula', () => {
    expect(dropdownOptionsForCell(workbook, form, 'A2')).toEqual(['Yes', 'No', 'Maybe']);
  });

  it('reads the values of a range on another sheet, empty cells as empty strings', () => {
    expect(dropdownOptionsForCell(workbook, form, 'B1')).toEqual(['Red', '', '3']);
  });

  it('reads an unqualified range from the same sheet', () => {
    expect(dropdownOptionsForCell(workbook, form, 'B2')).toEqual(['alpha', 'beta']);
  });

  it('follows defined names to their range', () => {
    expect(dropdownOptionsForCell(workbook, form, 'C3')).toEqual(['Red', '', '3']);
  });

  it('splits a defined name that holds a list', () => {
    expect(dropdownOptionsForCell(workbook, form, 'C2')).toEqual(['S', 'M', 'L']);
  });

  it('returns null outside every list validation', () => {
    expect(dropdownOptionsForCell(workbook, form, 'A5')).toBeNull();
    expect(dropdownOptionsForCell(workbook, form, 'Z99')).toBeNull();
  });

  it('returns null for an invalid coordinate', () => {
    expect(dropdownOptionsForCell(workbook, form, 'not a cell')).toBeNull();
  });
});
