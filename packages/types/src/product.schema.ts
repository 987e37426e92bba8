/**
 * Product request schemas for registration, stock movements, and bulk updates
 * Used by the API for request validation and by clients for type generation
 */

import { z } from "zod";

const categoryCode = z
  .string()
  .trim()
  .regex(/^\d{2}$/, "Category must be a two-digit code");

const nonNegative = (label: string) =>
  z.number({ invalid_type_error: `${label} must be a number` }).finite().min(0, `${label} must not be negative`);

/**
 * Request schema for registering a product
 * - recommended: optional; omitted or 0 derives it from quantity
 */
export const CreateProductRequestSchema = z.object({
  code: z.string().trim().min(1, "Product code is required").max(64, "Product code must be 64 characters or less"),
  name: z.string().trim().min(1, "Product name is required").max(200, "Product name must be 200 characters or less"),
  category: categoryCode,
  price: nonNegative("Price"),
  quantity: nonNegative("Quantity"),
  recommended: nonNegative("Recommended quantity").optional(),
});

/**
 * Stock movement types accepted by the transactions endpoint.
 * Manual adjustments go through the quantity endpoint instead.
 */
export const MOVEMENT_TYPES = ["inbound", "sale", "disposal"] as const;

export const ApplyTransactionRequestSchema = z.object({
  type: z.enum(MOVEMENT_TYPES),
  quantity: nonNegative("Quantity"),
});

export const SetQuantityRequestSchema = z.object({
  quantity: nonNegative("Quantity"),
});

export const BulkRecommendedRequestSchema = z.object({
  category: categoryCode,
  multiplier: z.number().finite().positive("Multiplier must be greater than 0").default(1.5),
});

/**
 * Query schema for product search; every filter is optional
 */
export const ProductSearchQuerySchema = z.object({
  category: categoryCode.optional(),
  code: z.string().optional(),
  name: z.string().optional(),
  q: z.string().optional(),
});

export type CreateProductRequest = z.infer<typeof CreateProductRequestSchema>;
export type ApplyTransactionRequest = z.infer<typeof ApplyTransactionRequestSchema>;
export type SetQuantityRequest = z.infer<typeof SetQuantityRequestSchema>;
export type BulkRecommendedRequest = z.infer<typeof BulkRecommendedRequestSchema>;
export type ProductSearchQuery = z.infer<typeof ProductSearchQuerySchema>;
