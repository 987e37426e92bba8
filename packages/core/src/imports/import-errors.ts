/**
 * Import Domain Errors
 */

import { InventoryError, InventoryValidationError } from '../ledger/ledger-errors.js';

/**
 * The file or table cannot be imported; the ledger is left untouched
 */
export class ImportValidationError extends InventoryValidationError {
  constructor(message: string, issues: string[] = [message], options?: ErrorOptions) {
    super(message, issues, options);
    this.name = 'ImportValidationError';
  }
}

/**
 * An import step was called out of order
 */
export class ImportStateError extends InventoryError {
  constructor(step: string, state: string) {
    super(`Cannot ${step} while the import is ${state}`);
    this.name = 'ImportStateError';
  }
}
