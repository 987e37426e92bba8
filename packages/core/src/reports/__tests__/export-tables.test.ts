import { describe, it, expect } from 'vitest';
import { loadDefaultCatalog } from '../../catalog/category-catalog.js';
import { resolveColumns } from '../../imports/column-normalizer.js';
import { computeReorderList } from '../reorder-report.js';
import { productsTable, purchaseOrderTable, uploadTemplateTable } from '../export-tables.js';
import { product } from './fixtures.js';

const catalog = loadDefaultCatalog();

describe('productsTable', () => {
  it('should add the category label', () => {
    const table = productsTable([product({ code: 'A', category: '55' })], catalog);

    expect(table.rows[0]).toMatchObject({ code: 'A', category: '55', categoryLabel: 'Candy/Gum' });
  });

  it('should use headers the importer recognizes', () => {
    const headers = productsTable([], catalog).columns.map((column) => column.header);

    expect(resolveColumns(headers).columns).toEqual({
      code: 'Product Code',
      name: 'Product Name',
      price: 'Price',
      quantity: 'Quantity',
      recommended: 'Recommended',
    });
  });
});

describe('purchaseOrderTable', () => {
  it('should order the shortage with the local order date and an empty note', () => {
    const items = computeReorderList([product({ code: 'A', quantity: 2, recommended: 15 })], catalog);

    const table = purchaseOrderTable(items, new Date('2024-06-30T22:00:00.000Z'), 'Asia/Seoul');

    expect(table.rows).toEqual([
      {
        code: 'A',
        name: 'Item A',
        categoryLabel: 'Gimbap',
        quantity: 2,
        recommended: 15,
        orderQuantity: 13,
        orderDate: '2024-07-01',
        note: '',
      },
    ]);
  });
});

describe('uploadTemplateTable', () => {
  it('should resolve every import column', () => {
    const table = uploadTemplateTable();

    expect(resolveColumns(table.columns.map((column) => column.header)).missing).toEqual([]);
    expect(table.rows).toHaveLength(2);
  });
});
