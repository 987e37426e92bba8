/**
 * @stockroom/core - Inventory domain logic
 *
 * Ledger rules, spreadsheet import reconciliation, category catalog, and
 * reports. Everything here is in-memory and consumed by the API layer.
 */

export * from './catalog/index.js';
export * from './config.js';
export * from './ledger/index.js';
export * from './imports/index.js';
export * from './reports/index.js';
