/**
 * Inventory configuration
 *
 * Reads INVENTORY_* environment variables, validates them, and fills defaults.
 */

import { z } from 'zod';

export type MergeExistingPolicy = 'overwrite' | 'skip';
export type RowPolicy = 'lenient' | 'strict';

export interface InventoryConfig {
  /** Multiplier for auto-derived recommended quantities */
  recommendedMultiplier: number;
  /** Lower bound for auto-derived recommended quantities */
  recommendedFloor: number;
  /** What a merge import does with codes already in the table */
  mergeExisting: MergeExistingPolicy;
  /** How import rows with non-numeric numeric cells are treated */
  rowPolicy: RowPolicy;
  /** Category assigned to an import batch when none is selected */
  defaultCategory: string;
  /** Reject imports that do not name a category */
  requireCategory: boolean;
  /** IANA zone used to derive transaction weekday, month, and date */
  timeZone: string;
}

export const DEFAULT_INVENTORY_CONFIG: InventoryConfig = {
  recommendedMultiplier: 1.5,
  recommendedFloor: 5,
  mergeExisting: 'overwrite',
  rowPolicy: 'lenient',
  defaultCategory: '99',
  requireCategory: false,
  timeZone: 'UTC',
};

export function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
}

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const InventoryEnvSchema = z.object({
  INVENTORY_RECOMMENDED_MULTIPLIER: z.coerce.number().finite().positive().optional(),
  INVENTORY_RECOMMENDED_FLOOR: z.coerce.number().finite().nonnegative().optional(),
  INVENTORY_MERGE_EXISTING: z.enum(['overwrite', 'skip']).optional(),
  INVENTORY_ROW_POLICY: z.enum(['lenient', 'strict']).optional(),
  INVENTORY_DEFAULT_CATEGORY: z
    .string()
    .regex(/^\d{2}$/, 'Expected a two-digit category code')
    .refine((code) => code !== '00', 'The all-categories code cannot be assigned')
    .optional(),
  INVENTORY_REQUIRE_CATEGORY: booleanFlag.optional(),
  INVENTORY_TIMEZONE: z.string().refine(isValidTimeZone, 'Unknown time zone').optional(),
});

/**
 * Load inventory configuration from the environment
 *
 * @throws Error naming every invalid variable
 */
export function loadInventoryConfig(env: NodeJS.ProcessEnv = process.env): InventoryConfig {
  const result = InventoryEnvSchema.safeParse(env);

  if (!result.success) {
    const errors = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ');
    throw new Error(`Invalid inventory configuration: ${errors}`);
  }

  const vars = result.data;

  return {
    recommendedMultiplier:
      vars.INVENTORY_RECOMMENDED_MULTIPLIER ?? DEFAULT_INVENTORY_CONFIG.recommendedMultiplier,
    recommendedFloor: vars.INVENTORY_RECOMMENDED_FLOOR ?? DEFAULT_INVENTORY_CONFIG.recommendedFloor,
    mergeExisting: vars.INVENTORY_MERGE_EXISTING ?? DEFAULT_INVENTORY_CONFIG.mergeExisting,
    rowPolicy: vars.INVENTORY_ROW_POLICY ?? DEFAULT_INVENTORY_CONFIG.rowPolicy,
    defaultCategory: vars.INVENTORY_DEFAULT_CATEGORY ?? DEFAULT_INVENTORY_CONFIG.defaultCategory,
    requireCategory: vars.INVENTORY_REQUIRE_CATEGORY ?? DEFAULT_INVENTORY_CONFIG.requireCategory,
    timeZone: vars.INVENTORY_TIMEZONE ?? DEFAULT_INVENTORY_CONFIG.timeZone,
  };
}
