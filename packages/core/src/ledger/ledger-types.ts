/**
 * Ledger Domain Types
 *
 * Product table rows, transaction log records, and the parameter
 * shapes accepted by the ledger service.
 */

import { z } from 'zod';
import type { Weekday } from './clock.js';

export const TRANSACTION_TYPES = [
  'inbound',
  'sale',
  'disposal',
  'manual-adjust',
  'registration',
] as const;

export type TransactionType = (typeof TRANSACTION_TYPES)[number];

/**
 * Transaction types that move stock by a signed delta
 */
export const MOVEMENT_TYPES = ['inbound', 'sale', 'disposal', 'registration'] as const;

export type MovementType = (typeof MOVEMENT_TYPES)[number];

export interface Product {
  code: string;
  name: string;
  category: string;
  price: number;
  /** On-hand quantity, never negative */
  quantity: number;
  /** Target stock level used to compute shortage */
  recommended: number;
  /** ISO 8601 timestamp of the last change */
  updatedAt: string;
}

/**
 * Product row before the ledger stamps updatedAt
 */
export type NewProduct = Omit<Product, 'updatedAt'>;

export interface TransactionRecord {
  occurredAt: string;
  type: TransactionType;
  code: string;
  /** Product name at the time of the transaction */
  name: string;
  /** Requested magnitude; signed delta for manual adjustments */
  quantity: number;
  before: number;
  after: number;
  weekday: Weekday;
  month: number;
}

const quantitySchema = z.number().finite().nonnegative();

export const RegisterProductSchema = z.object({
  code: z.string().trim().min(1, 'Product code is required'),
  name: z.string().trim().min(1, 'Product name is required'),
  category: z.string().trim().min(1, 'Category is required'),
  price: quantitySchema,
  quantity: quantitySchema,
  recommended: quantitySchema.optional(),
});

export type RegisterProductParams = z.input<typeof RegisterProductSchema>;

export const ApplyTransactionSchema = z.object({
  code: z.string(),
  type: z.enum(MOVEMENT_TYPES, {
    errorMap: () => ({
      message: 'Expected inbound, sale, disposal, or registration (use setQuantityDirect to adjust)',
    }),
  }),
  quantity: quantitySchema,
});

export interface ApplyTransactionParams {
  code: string;
  type: TransactionType;
  quantity: number;
}

export const SetQuantitySchema = z.object({
  code: z.string(),
  quantity: quantitySchema,
});

export type SetQuantityParams = z.input<typeof SetQuantitySchema>;

export const BulkSetRecommendedSchema = z.object({
  category: z.string().trim().min(1, 'Category is required'),
  multiplier: z.number().finite().positive('Multiplier must be greater than 0'),
});

export type BulkSetRecommendedParams = z.input<typeof BulkSetRecommendedSchema>;

export interface ProductSearchParams {
  category?: string;
  code?: string;
  name?: string;
  /** Matches code or name */
  query?: string;
}

export interface TransactionFilter {
  types?: TransactionType[];
  code?: string;
}

/**
 * Fields an import may overwrite on an existing product
 */
export interface ProductPatch {
  name: string;
  category?: string;
  price?: number;
  quantity?: number;
  recommended?: number;
}
