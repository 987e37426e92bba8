import type { Product, TransactionRecord } from '../../ledger/ledger-types.js';

export function product(overrides: Partial<Product> & Pick<Product, 'code'>): Product {
  return {
    name: `Item ${overrides.code}`,
    category: '02',
    price: 1000,
    quantity: 10,
    recommended: 15,
    updatedAt: '2024-01-01T00:00:00.000Z',
    ...overrides,
  };
}

export function record(
  overrides: Partial<TransactionRecord> & Pick<TransactionRecord, 'type' | 'quantity'>
): TransactionRecord {
  return {
    occurredAt: '2024-01-01T09:00:00.000Z',
    code: 'P1',
    name: 'Item P1',
    before: 0,
    after: 0,
    weekday: 'Monday',
    month: 1,
    ...overrides,
  };
}
