/**
 * Imports Domain
 *
 * Spreadsheet decoding, import validation, and merge/replace reconciliation.
 */

export { ImportReconciler } from './import-reconciler.js';
export { ImportCycle, importSpreadsheet } from './import-cycle.js';
export type { ImportCycleState } from './import-cycle.js';
export { readSpreadsheet, writeSpreadsheet, normalizeCell, rawTableFromRecords } from './spreadsheet.js';
export type { SheetColumn, SheetTable } from './spreadsheet.js';
export { normalizeHeader, resolveColumns } from './column-normalizer.js';
export type { ColumnMapping } from './column-normalizer.js';
export { coerceNumber, coerceText, parseRow } from './row-parser.js';
export type { NumericCell, ParsedRow, RowContext } from './row-parser.js';

export { IMPORT_FIELDS, IMPORT_MODES, ImportOptionsSchema } from './import-types.js';
export type {
  CellValue,
  RawRow,
  RawTable,
  ImportField,
  ImportMode,
  ImportOptions,
  ImportedRow,
  RowOutcome,
  RowResult,
  ValidatedImport,
  ImportReport,
} from './import-types.js';

export { ImportValidationError, ImportStateError } from './import-errors.js';
