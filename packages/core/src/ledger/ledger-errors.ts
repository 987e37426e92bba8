/**
 * Ledger Domain Errors
 *
 * Custom error classes for inventory business rule violations.
 * All are recoverable: the operation is aborted and state is left untouched.
 */

export class InventoryError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'InventoryError';
  }
}

export class InventoryValidationError extends InventoryError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = [message], options?: ErrorOptions) {
    super(message, options);
    this.name = 'InventoryValidationError';
    this.issues = issues;
  }
}

export class ProductNotFoundError extends InventoryError {
  constructor(readonly code: string) {
    super(`Product not found: ${code}`);
    this.name = 'ProductNotFoundError';
  }
}

export class DuplicateProductCodeError extends InventoryError {
  constructor(readonly code: string) {
    super(`Product code already registered: ${code}`);
    this.name = 'DuplicateProductCodeError';
  }
}
