/**
 * Query schemas for transaction listing, reorder, and report endpoints
 */

import { z } from "zod";

export const TRANSACTION_TYPES = ["inbound", "sale", "disposal", "manual-adjust", "registration"] as const;

export const REORDER_PRIORITIES = ["urgent", "high", "normal", "low"] as const;

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "Dates must be YYYY-MM-DD");

/**
 * Inclusive date range; either end may be omitted
 */
export const PeriodQuerySchema = z
  .object({
    from: isoDate.optional(),
    to: isoDate.optional(),
  })
  .refine((period) => !period.from || !period.to || period.from <= period.to, {
    message: "from must not be after to",
    path: ["from"],
  });

/**
 * type accepts a comma-separated list, e.g. ?type=sale,disposal
 */
export const TransactionQuerySchema = z.object({
  type: z
    .string()
    .optional()
    .transform((value) => (value ? value.split(",").map((entry) => entry.trim()) : []))
    .pipe(z.array(z.enum(TRANSACTION_TYPES))),
  code: z.string().optional(),
  from: isoDate.optional(),
  to: isoDate.optional(),
});

export const ReorderQuerySchema = z.object({
  priority: z.enum(REORDER_PRIORITIES).optional(),
});

export type PeriodQuery = z.infer<typeof PeriodQuerySchema>;
export type TransactionQuery = z.infer<typeof TransactionQuerySchema>;
export type ReorderQuery = z.infer<typeof ReorderQuerySchema>;
