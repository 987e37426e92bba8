/**
 * Ledger Domain
 *
 * Product table + append-only transaction log, and the rules that keep them consistent.
 */

// Store
export { Ledger } from './ledger.js';

// Service layer
export { LedgerService } from './ledger-service.js';
export type { LedgerServiceOptions, OverwriteResult } from './ledger-service.js';

// Rules and helpers
export { deriveRecommended, resolveRecommended } from './recommended.js';
export type { RecommendedRule } from './recommended.js';
export { calendarParts, FixedClock, systemClock, WEEKDAYS } from './clock.js';
export type { CalendarParts, Clock, Weekday } from './clock.js';
export { parseOrThrow } from './validation.js';

// Domain types
export {
  TRANSACTION_TYPES,
  MOVEMENT_TYPES,
  RegisterProductSchema,
  ApplyTransactionSchema,
  SetQuantitySchema,
  BulkSetRecommendedSchema,
} from './ledger-types.js';
export type {
  TransactionType,
  MovementType,
  Product,
  NewProduct,
  TransactionRecord,
  RegisterProductParams,
  ApplyTransactionParams,
  SetQuantityParams,
  BulkSetRecommendedParams,
  ProductSearchParams,
  TransactionFilter,
  ProductPatch,
} from './ledger-types.js';

// Domain errors
export {
  InventoryError,
  InventoryValidationError,
  ProductNotFoundError,
  DuplicateProductCodeError,
} from './ledger-errors.js';
