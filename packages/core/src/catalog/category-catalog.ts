/**
 * Category Catalog
 *
 * Read-only lookup from category code to display label.
 * The ledger validates product categories against it; reports use it to annotate output.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';

/**
 * Pseudo-category used by filters to mean "every category". Never assigned to a product.
 */
export const ALL_CATEGORIES_CODE = '00';

/**
 * Label reported for codes missing from the catalog
 */
export const FALLBACK_CATEGORY_LABEL = 'Other';

const CategoryEntrySchema = z.object({
  code: z.string().regex(/^\d{2}$/, 'Category codes are two digits'),
  label: z.string().min(1),
});

const CategoryTableSchema = z.array(CategoryEntrySchema).min(1);

export type CategoryEntry = z.infer<typeof CategoryEntrySchema>;

export class CategoryCatalog {
  private readonly labels: Map<string, string>;

  constructor(entries: readonly CategoryEntry[]) {
    this.labels = new Map(entries.map((entry) => [entry.code, entry.label]));
  }

  /**
   * True when the code can be assigned to a product
   */
  isAssignable(code: string): boolean {
    return code !== ALL_CATEGORIES_CODE && this.labels.has(code);
  }

  label(code: string): string {
    return this.labels.get(code) ?? FALLBACK_CATEGORY_LABEL;
  }

  /**
   * Catalog entries in table order, optionally without the "all categories" pseudo-entry
   */
  entries(options: { includeAll?: boolean } = {}): CategoryEntry[] {
    const includeAll = options.includeAll ?? true;
    return [...this.labels.entries()]
      .filter(([code]) => includeAll || code !== ALL_CATEGORIES_CODE)
      .map(([code, label]) => ({ code, label }));
  }
}

let defaultCatalog: CategoryCatalog | undefined;

/**
 * Load the bundled convenience-store category table (parsed once per process)
 */
export function loadDefaultCatalog(): CategoryCatalog {
  if (!defaultCatalog) {
    const raw = readFileSync(new URL('./categories.json', import.meta.url), 'utf8');
    const parsed = CategoryTableSchema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
      throw new Error(`categories.json is invalid: ${parsed.error.message}`);
    }
    defaultCatalog = new CategoryCatalog(parsed.data);
  }
  return defaultCatalog;
}
