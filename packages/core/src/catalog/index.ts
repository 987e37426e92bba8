/**
 * Catalog Domain
 */

export {
  CategoryCatalog,
  loadDefaultCatalog,
  ALL_CATEGORIES_CODE,
  FALLBACK_CATEGORY_LABEL,
} from './category-catalog.js';
export type { CategoryEntry } from './category-catalog.js';
