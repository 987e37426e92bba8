import { describe, it, expect } from 'vitest';
import ExcelJS from 'exceljs';
import { uploadTemplateTable } from '../../reports/export-tables.js';
import { ImportValidationError } from '../import-errors.js';
import { normalizeCell, readSpreadsheet, writeSpreadsheet } from '../spreadsheet.js';

describe('normalizeCell', () => {
  it('should pass plain values through', () => {
    expect(normalizeCell('abc')).toBe('abc');
    expect(normalizeCell(12)).toBe(12);
    expect(normalizeCell(undefined)).toBeNull();
  });

  it('should flatten rich text and hyperlinks', () => {
    expect(normalizeCell({ richText: [{ text: 'Rice ' }, { text: 'Ball' }] })).toBe('Rice Ball');
    expect(normalizeCell({ text: 'Menu', hyperlink: 'https://example.com' })).toBe('Menu');
  });

  it('should use formula results', () => {
    expect(normalizeCell({ formula: 'A1*2', result: 24, date1904: false })).toBe(24);
  });
});

describe('spreadsheet codec', () => {
  it('should read back a written table', async () => {
    const data = await writeSpreadsheet(uploadTemplateTable());

    const table = await readSpreadsheet(data);

    expect(table.headers).toEqual(['Product Code', 'Product Name', 'Price', 'Quantity', 'Recommended']);
    expect(table.rows[0]).toEqual({
      rowNumber: 2,
      cells: {
        'Product Code': '0000000000001',
        'Product Name': 'Sample rice ball',
        Price: 1200,
        Quantity: 10,
        Recommended: 20,
      },
    });
    expect(table.rows).toHaveLength(2);
  });

  it('should style the header row of a Data sheet', async () => {
    const data = await writeSpreadsheet({
      columns: [{ key: 'code', header: 'Product Code' }],
      rows: [{ code: 'A' }],
    });

    const workbook = new ExcelJS.Workbook();
    await workbook.xlsx.load(data);
    const sheet = workbook.getWorksheet('Data');

    expect(sheet?.getRow(1).getCell(1).font?.bold).toBe(true);
    expect(sheet?.getRow(2).getCell(1).value).toBe('A');
  });

  it('should drop fully blank rows', async () => {
    const data = await writeSpreadsheet({
      columns: [
        { key: 'code', header: 'code' },
        { key: 'name', header: 'name' },
      ],
      rows: [{ code: 'A', name: 'Gum' }, {}, { code: 'B', name: 'Candy' }],
    });

    const table = await readSpreadsheet(data);

    expect(table.rows.map((row) => row.cells.code)).toEqual(['A', 'B']);
  });

  it('should reject data that is not a workbook', async () => {
    const data = new ArrayBuffer(16);

    await expect(readSpreadsheet(data)).rejects.toThrow(ImportValidationError);
    await expect(readSpreadsheet(data)).rejects.toThrow('The file is not a readable .xlsx workbook');
  });
});
