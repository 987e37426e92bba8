/**
 * Import Cycle
 *
 * One upload from file to ledger: idle → file-parsed → validated → applied,
 * or rejected from any step that fails. A cycle is used once.
 */

import { ImportStateError } from './import-errors.js';
import type { ImportReconciler } from './import-reconciler.js';
import type { ImportOptions, ImportReport, RawTable, ValidatedImport } from './import-types.js';
import { readSpreadsheet } from './spreadsheet.js';

export type ImportCycleState = 'idle' | 'file-parsed' | 'validated' | 'applied' | 'rejected';

export class ImportCycle {
  private current: ImportCycleState = 'idle';
  private table: RawTable | null = null;
  private validated: ValidatedImport | null = null;

  constructor(private readonly reconciler: ImportReconciler) {}

  get state(): ImportCycleState {
    return this.current;
  }

  async parseFile(data: ArrayBuffer): Promise<RawTable> {
    this.expect('idle', 'parse a file');
    try {
      return this.loadTable(await readSpreadsheet(data));
    } catch (error) {
      this.current = 'rejected';
      throw error;
    }
  }

  /**
   * Start from an already-decoded table
   */
  loadTable(table: RawTable): RawTable {
    this.expect('idle', 'load a table');
    this.table = table;
    this.current = 'file-parsed';
    return table;
  }

  validate(options: ImportOptions): ValidatedImport {
    this.expect('file-parsed', 'validate');
    if (!this.table) {
      throw new ImportStateError('validate', this.current);
    }
    try {
      this.validated = this.reconciler.validate(this.table, options);
    } catch (error) {
      this.current = 'rejected';
      throw error;
    }
    this.current = 'validated';
    return this.validated;
  }

  apply(): ImportReport {
    this.expect('validated', 'apply');
    if (!this.validated) {
      throw new ImportStateError('apply', this.current);
    }
    const report = this.reconciler.apply(this.validated);
    this.current = 'applied';
    return report;
  }

  private expect(state: ImportCycleState, step: string): void {
    if (this.current !== state) {
      throw new ImportStateError(step, this.current);
    }
  }
}

/**
 * Parse, validate, and apply an uploaded workbook
 */
export async function importSpreadsheet(
  reconciler: ImportReconciler,
  data: ArrayBuffer,
  options: ImportOptions
): Promise<ImportReport> {
  const cycle = new ImportCycle(reconciler);
  await cycle.parseFile(data);
  cycle.validate(options);
  return cycle.apply();
}
