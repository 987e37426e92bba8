/**
 * Import Reconciler
 *
 * Validates an uploaded table into typed rows, then applies it to a ledger
 * in replace or merge mode. Validation never touches the ledger.
 */

import { logger as defaultLogger } from '@stockroom/observability';
import type { Logger } from '@stockroom/observability';
import type { LedgerService } from '../ledger/ledger-service.js';
import type { ProductPatch } from '../ledger/ledger-types.js';
import { resolveRecommended } from '../ledger/recommended.js';
import { parseOrThrow } from '../ledger/validation.js';
import { resolveColumns } from './column-normalizer.js';
import { ImportValidationError } from './import-errors.js';
import { ImportOptionsSchema } from './import-types.js';
import type {
  ImportedRow,
  ImportField,
  ImportOptions,
  ImportReport,
  RawTable,
  RowOutcome,
  RowResult,
  ValidatedImport,
} from './import-types.js';
import { parseRow } from './row-parser.js';

const OPTIONAL_FIELDS: readonly ImportField[] = ['price', 'quantity', 'recommended'];

export class ImportReconciler {
  private readonly log: Logger;

  constructor(
    private readonly service: LedgerService,
    options: { logger?: Logger } = {}
  ) {
    this.log = (options.logger ?? defaultLogger).child({ module: 'import' });
  }

  /**
   * Validate a raw table against the import rules
   *
   * Rows with a blank code or name are skipped; rows with bad numbers are
   * rejected or defaulted according to the row policy. Repeated codes in the
   * same file reject the later row.
   *
   * @throws ImportValidationError if the category is missing or unknown,
   *   required columns are missing, or no valid rows remain
   */
  validate(table: RawTable, options: ImportOptions): ValidatedImport {
    const opts = parseOrThrow(ImportOptionsSchema, options);
    const config = this.service.settings;
    const { category, selected: categorySelected } = this.resolveCategory(opts.category);

    if (table.rows.length === 0) {
      throw new ImportValidationError('The file contains no data rows');
    }

    const mapping = resolveColumns(table.headers);
    if (mapping.missing.length > 0) {
      const issues = mapping.missing.map((field) => `Missing required column: ${field}`);
      throw new ImportValidationError(`Missing required columns: ${mapping.missing.join(', ')}`, issues);
    }

    const rowPolicy = opts.rowPolicy ?? config.rowPolicy;
    const context = { mapping, policy: rowPolicy, category, rule: this.service.recommendedRule };

    const rows: ImportedRow[] = [];
    const results: RowResult[] = [];
    const warnings: string[] = [];
    const seen = new Set<string>();

    for (const raw of table.rows) {
      const parsed = parseRow(raw, context);

      if (!parsed.ok) {
        results.push(parsed.result);
        continue;
      }

      if (seen.has(parsed.row.code)) {
        results.push({
          rowNumber: raw.rowNumber,
          status: 'rejected',
          code: parsed.row.code,
          reason: 'Duplicate product code in file',
        });
        continue;
      }

      seen.add(parsed.row.code);
      rows.push(parsed.row);
      warnings.push(...parsed.warnings);
      results.push({ rowNumber: raw.rowNumber, status: 'accepted', code: parsed.row.code });
    }

    if (rows.length === 0) {
      const issues = results.map((result) =>
        result.status === 'accepted' ? '' : `Row ${result.rowNumber}: ${result.reason}`
      );
      throw new ImportValidationError('No valid rows to import', issues.filter(Boolean));
    }

    if (mapping.quantitySource === 'legacy') {
      warnings.push(`Quantity read from legacy column "${mapping.columns.quantity}"`);
    }

    return {
      mode: opts.mode,
      mergeExisting: opts.mergeExisting ?? config.mergeExisting,
      rowPolicy,
      category,
      categorySelected,
      presentFields: OPTIONAL_FIELDS.filter((field) => mapping.columns[field] !== undefined),
      rows,
      results,
      warnings,
    };
  }

  /**
   * Apply a validated import
   *
   * replace: the product table becomes exactly the imported rows.
   * merge: new codes are appended; existing codes are overwritten (only the
   * fields present in the file) or kept, per the mergeExisting policy.
   */
  apply(validated: ValidatedImport): ImportReport {
    const outcomes = new Map<string, RowOutcome>();

    if (validated.mode === 'replace') {
      this.service.replaceProducts(validated.rows.map(toNewProduct));
      validated.rows.forEach((row) => outcomes.set(row.code, 'inserted'));
    } else {
      for (const row of validated.rows) {
        outcomes.set(row.code, this.mergeRow(row, validated));
      }
    }

    const rows = validated.results.map((result): RowResult => {
      if (result.status !== 'accepted') {
        return result;
      }
      return { ...result, outcome: outcomes.get(result.code) };
    });

    const count = (outcome: RowOutcome) => [...outcomes.values()].filter((o) => o === outcome).length;

    const report: ImportReport = {
      mode: validated.mode,
      mergeExisting: validated.mergeExisting,
      category: validated.category,
      categoryLabel: this.service.categories.label(validated.category),
      totalRows: validated.results.length,
      inserted: count('inserted'),
      updated: count('updated'),
      unchanged: count('unchanged'),
      keptExisting: count('kept-existing'),
      skipped: rows.filter((row) => row.status === 'skipped').length,
      rejected: rows.filter((row) => row.status === 'rejected').length,
      rows,
      warnings: validated.warnings,
    };

    this.log.info(
      {
        mode: report.mode,
        category: report.category,
        inserted: report.inserted,
        updated: report.updated,
        skipped: report.skipped,
        rejected: report.rejected,
      },
      'Import applied'
    );

    return report;
  }

  /**
   * Validate and apply in one step
   */
  reconcile(table: RawTable, options: ImportOptions): ImportReport {
    return this.apply(this.validate(table, options));
  }

  private resolveCategory(requested: string | undefined): { category: string; selected: boolean } {
    const config = this.service.settings;

    if (!requested) {
      if (config.requireCategory) {
        throw new ImportValidationError('A category must be selected for the upload');
      }
      return { category: config.defaultCategory, selected: false };
    }

    if (!this.service.categories.isAssignable(requested)) {
      throw new ImportValidationError(`Unknown category: ${requested}`);
    }
    return { category: requested, selected: true };
  }

  private mergeRow(row: ImportedRow, validated: ValidatedImport): RowOutcome {
    const existing = this.service.findProduct(row.code);

    if (!existing) {
      this.service.addImportedProduct(toNewProduct(row));
      return 'inserted';
    }

    if (validated.mergeExisting === 'skip') {
      return 'kept-existing';
    }

    const present = new Set(validated.presentFields);
    const quantity = present.has('quantity') ? row.quantity : existing.quantity;

    const patch: ProductPatch = {
      name: row.name,
      // The default category only applies to new codes
      category: validated.categorySelected ? row.category : undefined,
      price: present.has('price') ? row.price : undefined,
      quantity: present.has('quantity') ? row.quantity : undefined,
      recommended: present.has('recommended')
        ? resolveRecommended(row.suppliedRecommended, quantity, this.service.recommendedRule)
        : undefined,
    };

    const { changed } = this.service.overwriteProduct(row.code, patch);
    return changed ? 'updated' : 'unchanged';
  }
}

function toNewProduct(row: ImportedRow) {
  return {
    code: row.code,
    name: row.name,
    category: row.category,
    price: row.price,
    quantity: row.quantity,
    recommended: row.recommended,
  };
}
