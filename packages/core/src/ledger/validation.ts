import type { z } from 'zod';
import { InventoryValidationError } from './ledger-errors.js';

/**
 * Parse input with a Zod schema
 *
 * @throws InventoryValidationError listing every issue
 */
export function parseOrThrow<T extends z.ZodTypeAny>(schema: T, data: unknown): z.output<T> {
  const result = schema.safeParse(data);

  if (!result.success) {
    const issues = result.error.errors.map((e) =>
      e.path.length > 0 ? `${e.path.join('.')}: ${e.message}` : e.message
    );
    throw new InventoryValidationError(`Validation failed: ${issues.join(', ')}`, issues);
  }

  return result.data;
}
