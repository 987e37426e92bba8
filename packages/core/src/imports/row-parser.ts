/**
 * Row coercion for uploaded tables
 *
 * Turns a raw row into a typed ImportedRow or a skip/reject reason.
 * Blank numeric cells count as 0. Non-numeric cells count as 0 with a warning
 * under the lenient policy and reject the row under the strict policy.
 */

import type { RowPolicy } from '../config.js';
import { resolveRecommended } from '../ledger/recommended.js';
import type { RecommendedRule } from '../ledger/recommended.js';
import type { ColumnMapping } from './column-normalizer.js';
import type { CellValue, ImportedRow, RawRow, RowResult } from './import-types.js';

const NUMERIC_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

/**
 * Cell → trimmed text; integral numbers print without a decimal part
 */
export function coerceText(value: CellValue): string {
  if (value === null) {
    return '';
  }
  if (value instanceof Date) {
    return value.toISOString().slice(0, 10);
  }
  return String(value).trim();
}

export type NumericCell =
  | { kind: 'number'; value: number }
  | { kind: 'blank' }
  | { kind: 'invalid'; text: string };

export function coerceNumber(value: CellValue): NumericCell {
  if (value === null) {
    return { kind: 'blank' };
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? { kind: 'number', value } : { kind: 'invalid', text: String(value) };
  }
  if (typeof value === 'string') {
    const text = value.trim();
    if (text === '') {
      return { kind: 'blank' };
    }
    const compact = text.replace(/[,\s]/g, '');
    if (!NUMERIC_PATTERN.test(compact)) {
      return { kind: 'invalid', text };
    }
    // "1e400" matches the pattern but overflows
    const parsed = Number(compact);
    return Number.isFinite(parsed) ? { kind: 'number', value: parsed } : { kind: 'invalid', text };
  }
  return { kind: 'invalid', text: coerceText(value) };
}

export interface RowContext {
  mapping: ColumnMapping;
  policy: RowPolicy;
  category: string;
  rule: RecommendedRule;
}

export type ParsedRow =
  | { ok: true; row: ImportedRow; warnings: string[] }
  | { ok: false; result: RowResult };

type NumericField = 'price' | 'quantity' | 'recommended';

export function parseRow(raw: RawRow, context: RowContext): ParsedRow {
  const { columns } = context.mapping;
  const cell = (header: string | undefined): CellValue =>
    header === undefined ? null : (raw.cells[header] ?? null);

  const code = coerceText(cell(columns.code));
  const name = coerceText(cell(columns.name));

  if (!code) {
    return { ok: false, result: { rowNumber: raw.rowNumber, status: 'skipped', reason: 'Missing product code' } };
  }
  if (!name) {
    return { ok: false, result: { rowNumber: raw.rowNumber, status: 'skipped', reason: 'Missing product name' } };
  }

  const warnings: string[] = [];
  const values: Record<NumericField, number> = { price: 0, quantity: 0, recommended: 0 };

  for (const field of ['price', 'quantity', 'recommended'] as const) {
    const parsed = coerceNumber(cell(columns[field]));

    if (parsed.kind === 'invalid') {
      const message = `${field} "${parsed.text}" is not a number`;
      if (context.policy === 'strict') {
        return { ok: false, result: { rowNumber: raw.rowNumber, status: 'rejected', code, reason: message } };
      }
      warnings.push(`Row ${raw.rowNumber}: ${message}; using 0`);
      continue;
    }

    if (parsed.kind === 'number') {
      if (parsed.value < 0) {
        return {
          ok: false,
          result: { rowNumber: raw.rowNumber, status: 'rejected', code, reason: `${field} must not be negative` },
        };
      }
      values[field] = parsed.value;
    }
  }

  const suppliedRecommended = values.recommended > 0 ? values.recommended : undefined;

  return {
    ok: true,
    warnings,
    row: {
      rowNumber: raw.rowNumber,
      code,
      name,
      category: context.category,
      price: values.price,
      quantity: values.quantity,
      suppliedRecommended,
      recommended: resolveRecommended(suppliedRecommended, values.quantity, context.rule),
    },
  };
}
