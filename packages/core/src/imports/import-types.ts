/**
 * Import Domain Types
 *
 * Raw spreadsheet tables, per-row results, and the batch report returned to the caller.
 */

import { z } from 'zod';
import type { MergeExistingPolicy, RowPolicy } from '../config.js';

/**
 * Plain cell value after spreadsheet decoding
 */
export type CellValue = string | number | boolean | Date | null;

export interface RawRow {
  /** 1-based sheet row; the header is row 1 */
  rowNumber: number;
  cells: Record<string, CellValue>;
}

export interface RawTable {
  headers: string[];
  rows: RawRow[];
}

export const IMPORT_FIELDS = ['code', 'name', 'price', 'quantity', 'recommended'] as const;

export type ImportField = (typeof IMPORT_FIELDS)[number];

export const REQUIRED_IMPORT_FIELDS: readonly ImportField[] = ['code', 'name'];

export const IMPORT_MODES = ['replace', 'merge'] as const;

export type ImportMode = (typeof IMPORT_MODES)[number];

export const ImportOptionsSchema = z.object({
  mode: z.enum(IMPORT_MODES),
  category: z.string().trim().optional(),
  mergeExisting: z.enum(['overwrite', 'skip']).optional(),
  rowPolicy: z.enum(['lenient', 'strict']).optional(),
});

export type ImportOptions = z.input<typeof ImportOptionsSchema>;

export interface ImportedRow {
  rowNumber: number;
  code: string;
  name: string;
  category: string;
  price: number;
  quantity: number;
  /** Value from the file when it was positive */
  suppliedRecommended: number | undefined;
  /** Supplied value, or the derived default */
  recommended: number;
}

export type RowOutcome = 'inserted' | 'updated' | 'unchanged' | 'kept-existing';

export type RowResult =
  | { rowNumber: number; status: 'accepted'; code: string; outcome?: RowOutcome }
  | { rowNumber: number; status: 'skipped'; reason: string }
  | { rowNumber: number; status: 'rejected'; code?: string; reason: string };

export interface ValidatedImport {
  mode: ImportMode;
  mergeExisting: MergeExistingPolicy;
  rowPolicy: RowPolicy;
  category: string;
  /** False when category is the configured default rather than a selection */
  categorySelected: boolean;
  /** Optional fields whose column was present in the file */
  presentFields: ImportField[];
  rows: ImportedRow[];
  results: RowResult[];
  warnings: string[];
}

export interface ImportReport {
  mode: ImportMode;
  mergeExisting: MergeExistingPolicy;
  category: string;
  categoryLabel: string;
  totalRows: number;
  inserted: number;
  updated: number;
  unchanged: number;
  keptExisting: number;
  skipped: number;
  rejected: number;
  rows: RowResult[];
  warnings: string[];
}
