/**
 * Export tables
 *
 * Column layouts for the spreadsheet downloads. Headers of the product table
 * and the upload template are names the importer recognizes, so an export
 * can be uploaded again unchanged.
 */

import type { CategoryCatalog } from '../catalog/category-catalog.js';
import { calendarParts } from '../ledger/clock.js';
import type { Product, TransactionRecord } from '../ledger/ledger-types.js';
import type { SheetTable } from '../imports/spreadsheet.js';
import type { ReorderItem } from './reorder-report.js';

export function productsTable(products: readonly Product[], catalog: CategoryCatalog): SheetTable {
  return {
    columns: [
      { key: 'code', header: 'Product Code', width: 16 },
      { key: 'name', header: 'Product Name', width: 30 },
      { key: 'category', header: 'Category' },
      { key: 'categoryLabel', header: 'Category Name', width: 24 },
      { key: 'price', header: 'Price' },
      { key: 'quantity', header: 'Quantity' },
      { key: 'recommended', header: 'Recommended' },
      { key: 'updatedAt', header: 'Updated At', width: 26 },
    ],
    rows: products.map((product) => ({
      code: product.code,
      name: product.name,
      category: product.category,
      categoryLabel: catalog.label(product.category),
      price: product.price,
      quantity: product.quantity,
      recommended: product.recommended,
      updatedAt: product.updatedAt,
    })),
  };
}

export function transactionsTable(records: readonly TransactionRecord[]): SheetTable {
  return {
    columns: [
      { key: 'occurredAt', header: 'Occurred At', width: 26 },
      { key: 'type', header: 'Type', width: 14 },
      { key: 'code', header: 'Product Code', width: 16 },
      { key: 'name', header: 'Product Name', width: 30 },
      { key: 'quantity', header: 'Quantity' },
      { key: 'before', header: 'Before' },
      { key: 'after', header: 'After' },
      { key: 'weekday', header: 'Weekday' },
      { key: 'month', header: 'Month' },
    ],
    rows: records.map((record) => ({ ...record })),
  };
}

/**
 * Purchase order sheet: one line per reorder item, ordering the full shortage
 */
export function purchaseOrderTable(
  items: readonly ReorderItem[],
  orderedAt: Date,
  timeZone: string
): SheetTable {
  const { date } = calendarParts(orderedAt, timeZone);

  return {
    columns: [
      { key: 'code', header: 'Product Code', width: 16 },
      { key: 'name', header: 'Product Name', width: 30 },
      { key: 'categoryLabel', header: 'Category', width: 24 },
      { key: 'quantity', header: 'On Hand' },
      { key: 'recommended', header: 'Recommended' },
      { key: 'orderQuantity', header: 'Order Quantity' },
      { key: 'orderDate', header: 'Order Date' },
      { key: 'note', header: 'Note', width: 20 },
    ],
    rows: items.map((item) => ({
      code: item.code,
      name: item.name,
      categoryLabel: item.categoryLabel,
      quantity: item.quantity,
      recommended: item.recommended,
      orderQuantity: item.shortage,
      orderDate: date,
      note: '',
    })),
  };
}

export function uploadTemplateTable(): SheetTable {
  return {
    columns: [
      { key: 'code', header: 'Product Code', width: 16 },
      { key: 'name', header: 'Product Name', width: 30 },
      { key: 'price', header: 'Price' },
      { key: 'quantity', header: 'Quantity' },
      { key: 'recommended', header: 'Recommended' },
    ],
    rows: [
      { code: '0000000000001', name: 'Sample rice ball', price: 1200, quantity: 10, recommended: 20 },
      { code: '0000000000002', name: 'Sample sandwich', price: 1300, quantity: 15, recommended: 25 },
    ],
  };
}
