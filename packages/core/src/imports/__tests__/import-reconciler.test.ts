/**
 * ImportReconciler Unit Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { createLogger } from '@stockroom/observability';
import { Ledger } from '../../ledger/ledger.js';
import { LedgerService } from '../../ledger/ledger-service.js';
import { FixedClock } from '../../ledger/clock.js';
import type { InventoryConfig } from '../../config.js';
import { ImportReconciler } from '../import-reconciler.js';
import { ImportValidationError } from '../import-errors.js';
import { rawTableFromRecords } from '../spreadsheet.js';

const silent = createLogger({ level: 'silent' });

function setup(config: Partial<InventoryConfig> = {}) {
  const service = new LedgerService(new Ledger(), {
    clock: new FixedClock('2024-01-01T09:00:00.000Z'),
    config,
    logger: silent,
  });
  const reconciler = new ImportReconciler(service, { logger: silent });
  return { service, reconciler };
}

describe('ImportReconciler', () => {
  let service: LedgerService;
  let reconciler: ImportReconciler;

  beforeEach(() => {
    ({ service, reconciler } = setup());
    service.registerProduct({ code: 'P1', name: 'Rice Ball', category: '02', price: 1200, quantity: 10 });
  });

  describe('validate', () => {
    it('should fail on a missing name column and leave the table unchanged', () => {
      const table = rawTableFromRecords(['code', 'quantity'], [{ code: 'N1', quantity: 3 }]);
      const before = service.listProducts();

      let caught: unknown;
      try {
        reconciler.reconcile(table, { mode: 'replace' });
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(ImportValidationError);
      expect(caught).toMatchObject({
        message: 'Missing required columns: name',
        issues: ['Missing required column: name'],
      });
      expect(service.listProducts()).toEqual(before);
    });

    it('should fail when no rows survive filtering', () => {
      const table = rawTableFromRecords(['code', 'name'], [{ code: '', name: 'X' }, { code: 'A', name: '' }]);

      expect(() => reconciler.validate(table, { mode: 'merge' })).toThrow('No valid rows to import');
    });

    it('should fail on a sheet without data rows', () => {
      expect(() => reconciler.validate({ headers: ['code', 'name'], rows: [] }, { mode: 'merge' })).toThrow(
        'The file contains no data rows'
      );
    });

    it('should reject the later row for a code repeated in the file', () => {
      const table = rawTableFromRecords(
        ['code', 'name'],
        [
          { code: 'A', name: 'First' },
          { code: 'A', name: 'Second' },
        ]
      );

      const validated = reconciler.validate(table, { mode: 'merge' });

      expect(validated.rows.map((row) => row.name)).toEqual(['First']);
      expect(validated.results[1]).toEqual({
        rowNumber: 3,
        status: 'rejected',
        code: 'A',
        reason: 'Duplicate product code in file',
      });
    });

    it('should assign the default consumables category when none is selected', () => {
      const table = rawTableFromRecords(['code', 'name'], [{ code: 'A', name: 'Tissue' }]);

      expect(reconciler.validate(table, { mode: 'merge' }).category).toBe('99');
    });

    it('should require a category when configured', () => {
      const strict = setup({ requireCategory: true });
      const table = rawTableFromRecords(['code', 'name'], [{ code: 'A', name: 'Tissue' }]);

      expect(() => strict.reconciler.validate(table, { mode: 'merge' })).toThrow(
        'A category must be selected for the upload'
      );
    });

    it('should reject an unknown category', () => {
      const table = rawTableFromRecords(['code', 'name'], [{ code: 'A', name: 'Tissue' }]);

      expect(() => reconciler.validate(table, { mode: 'merge', category: '00' })).toThrow(
        'Unknown category: 00'
      );
    });

    it('should warn when quantity comes from the legacy column', () => {
      const table = rawTableFromRecords(['code', 'name', 'carryover'], [{ code: 'A', name: 'Gum', carryover: 4 }]);

      const validated = reconciler.validate(table, { mode: 'merge' });

      expect(validated.rows[0]?.quantity).toBe(4);
      expect(validated.warnings).toEqual(['Quantity read from legacy column "carryover"']);
    });
  });

  describe('apply (replace)', () => {
    it('should install exactly the imported rows without recording transactions', () => {
      const table = rawTableFromRecords(
        ['code', 'name', 'price', 'quantity'],
        [
          { code: 'A', name: 'Gum', price: 500, quantity: 2 },
          { code: 'B', name: 'Candy', price: 300, quantity: 10 },
        ]
      );

      const report = reconciler.reconcile(table, { mode: 'replace', category: '55' });

      expect(service.listProducts()).toEqual([
        {
          code: 'A',
          name: 'Gum',
          category: '55',
          price: 500,
          quantity: 2,
          recommended: 5,
          updatedAt: '2024-01-01T09:00:00.000Z',
        },
        {
          code: 'B',
          name: 'Candy',
          category: '55',
          price: 300,
          quantity: 10,
          recommended: 15,
          updatedAt: '2024-01-01T09:00:00.000Z',
        },
      ]);
      expect(service.listTransactions()).toHaveLength(1);
      expect(report).toMatchObject({
        mode: 'replace',
        category: '55',
        categoryLabel: 'Candy/Gum',
        totalRows: 2,
        inserted: 2,
        skipped: 0,
        rejected: 0,
      });
    });
  });

  describe('apply (merge)', () => {
    const table = rawTableFromRecords(
      ['code', 'name', 'quantity'],
      [
        { code: 'P1', name: 'Rice Ball Tuna', quantity: 4 },
        { code: 'N1', name: 'Sandwich', quantity: 6 },
      ]
    );

    it('should append new codes and overwrite existing ones', () => {
      const report = reconciler.reconcile(table, { mode: 'merge', category: '02' });

      const products = service.listProducts();
      expect(products).toHaveLength(2);
      expect(products[0]).toMatchObject({ code: 'P1', name: 'Rice Ball Tuna', price: 1200, quantity: 4, recommended: 15 });
      expect(products[1]).toMatchObject({ code: 'N1', quantity: 6, recommended: 9 });
      expect(report).toMatchObject({ inserted: 1, updated: 1, keptExisting: 0 });
      expect(report.rows).toEqual([
        { rowNumber: 2, status: 'accepted', code: 'P1', outcome: 'updated' },
        { rowNumber: 3, status: 'accepted', code: 'N1', outcome: 'inserted' },
      ]);
    });

    it('should record one manual-adjust for the overwritten quantity only', () => {
      reconciler.reconcile(table, { mode: 'merge', category: '02' });

      const records = service.listTransactions();
      expect(records).toHaveLength(2);
      expect(records[1]).toMatchObject({ type: 'manual-adjust', code: 'P1', quantity: -6, before: 10, after: 4 });
    });

    it('should leave existing products untouched under the skip policy', () => {
      const report = reconciler.reconcile(table, { mode: 'merge', category: '02', mergeExisting: 'skip' });

      const products = service.listProducts();
      expect(products).toHaveLength(2);
      expect(products[0]).toMatchObject({ code: 'P1', name: 'Rice Ball', quantity: 10 });
      expect(report).toMatchObject({ inserted: 1, updated: 0, keptExisting: 1 });
      expect(service.listTransactions()).toHaveLength(1);
    });

    it('should follow the configured merge policy by default', () => {
      const skipping = setup({ mergeExisting: 'skip' });
      skipping.service.registerProduct({ code: 'P1', name: 'Rice Ball', category: '02', price: 1200, quantity: 10 });

      const report = skipping.reconciler.reconcile(table, { mode: 'merge', category: '02' });

      expect(report.mergeExisting).toBe('skip');
      expect(skipping.service.getProduct('P1').quantity).toBe(10);
    });

    it('should keep the existing category when no category is selected', () => {
      const priced = rawTableFromRecords(
        ['code', 'name', 'price'],
        [
          { code: 'P1', name: 'Rice Ball', price: 1300 },
          { code: 'N2', name: 'Gum', price: 500 },
        ]
      );

      const report = reconciler.reconcile(priced, { mode: 'merge' });

      expect(report).toMatchObject({ category: '99', updated: 1, inserted: 1 });
      expect(service.getProduct('P1')).toMatchObject({ category: '02', price: 1300 });
      expect(service.getProduct('N2').category).toBe('99');
    });

    it('should move existing products into an explicitly selected category', () => {
      reconciler.reconcile(table, { mode: 'merge', category: '55' });

      expect(service.getProduct('P1').category).toBe('55');
    });

    it('should report unchanged rows', () => {
      const same = rawTableFromRecords(['code', 'name'], [{ code: 'P1', name: 'Rice Ball' }]);

      const report = reconciler.reconcile(same, { mode: 'merge', category: '02' });

      expect(report).toMatchObject({ updated: 0, unchanged: 1 });
    });
  });
});
