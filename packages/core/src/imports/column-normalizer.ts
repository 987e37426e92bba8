/**
 * Header matching for uploaded tables
 *
 * Headers are compared after trimming, lower-casing, and folding spaces/hyphens to underscores.
 */

import { IMPORT_FIELDS, REQUIRED_IMPORT_FIELDS } from './import-types.js';
import type { ImportField } from './import-types.js';

const COLUMN_ALIASES: Record<ImportField, readonly string[]> = {
  code: ['code', 'product_code', 'item_code', 'sku', 'barcode'],
  name: ['name', 'product_name', 'item_name', 'product'],
  price: ['price', 'unit_price', 'selling_price', 'retail_price'],
  quantity: ['quantity', 'qty', 'stock', 'on_hand', 'stock_quantity'],
  recommended: ['recommended', 'recommended_quantity', 'recommended_stock', 'target_stock'],
};

/**
 * Older store exports carry the opening balance instead of a quantity column
 */
const LEGACY_QUANTITY_ALIASES: readonly string[] = [
  'carryover',
  'carryover_quantity',
  'carried_over',
  'carried_over_quantity',
];

export function normalizeHeader(header: string): string {
  return header.trim().toLowerCase().replace(/[\s-]+/g, '_');
}

export interface ColumnMapping {
  /** Field → header as written in the file */
  columns: Partial<Record<ImportField, string>>;
  missing: ImportField[];
  quantitySource: 'quantity' | 'legacy' | null;
}

function findHeader(headers: readonly string[], aliases: readonly string[]): string | undefined {
  return headers.find((header) => aliases.includes(normalizeHeader(header)));
}

export function resolveColumns(headers: readonly string[]): ColumnMapping {
  const columns: Partial<Record<ImportField, string>> = {};

  for (const field of IMPORT_FIELDS) {
    const header = findHeader(headers, COLUMN_ALIASES[field]);
    if (header !== undefined) {
      columns[field] = header;
    }
  }

  let quantitySource: ColumnMapping['quantitySource'] = columns.quantity ? 'quantity' : null;
  if (!columns.quantity) {
    const legacy = findHeader(headers, LEGACY_QUANTITY_ALIASES);
    if (legacy !== undefined) {
      columns.quantity = legacy;
      quantitySource = 'legacy';
    }
  }

  return {
    columns,
    missing: REQUIRED_IMPORT_FIELDS.filter((field) => !columns[field]),
    quantitySource,
  };
}
