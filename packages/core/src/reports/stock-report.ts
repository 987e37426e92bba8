/**
 * Stock report
 *
 * Dashboard figures and per-category composition of the product table.
 */

import type { CategoryCatalog } from '../catalog/category-catalog.js';
import type { Product } from '../ledger/ledger-types.js';
import { roundTo } from './rounding.js';

export interface DashboardMetrics {
  totalItems: number;
  totalStock: number;
  /** Σ quantity × price */
  stockValue: number;
  reorderCount: number;
}

export function dashboardMetrics(products: readonly Product[]): DashboardMetrics {
  return {
    totalItems: products.length,
    totalStock: products.reduce((sum, product) => sum + product.quantity, 0),
    stockValue: products.reduce((sum, product) => sum + product.quantity * product.price, 0),
    reorderCount: products.filter((product) => product.quantity < product.recommended).length,
  };
}

export interface CategorySummary {
  category: string;
  categoryLabel: string;
  productCount: number;
  totalStock: number;
  averageStock: number;
  totalRecommended: number;
}

/**
 * Per-category counts and stock totals, ordered by category code
 */
export function categorySummary(
  products: readonly Product[],
  catalog: CategoryCatalog
): CategorySummary[] {
  const groups = new Map<string, CategorySummary>();

  for (const product of products) {
    const group = groups.get(product.category) ?? {
      category: product.category,
      categoryLabel: catalog.label(product.category),
      productCount: 0,
      totalStock: 0,
      averageStock: 0,
      totalRecommended: 0,
    };
    group.productCount += 1;
    group.totalStock += product.quantity;
    group.totalRecommended += product.recommended;
    groups.set(product.category, group);
  }

  return [...groups.values()]
    .map((group) => ({ ...group, averageStock: roundTo(group.totalStock / group.productCount, 1) }))
    .sort((a, b) => a.category.localeCompare(b.category));
}

export interface CategoryMixSlice {
  category: string;
  categoryLabel: string;
  productCount: number;
  totalStock: number;
}

/**
 * Category composition for the dashboard pie chart
 */
export function categoryMix(
  products: readonly Product[],
  catalog: CategoryCatalog
): CategoryMixSlice[] {
  return categorySummary(products, catalog).map(
    ({ category, categoryLabel, productCount, totalStock }) => ({
      category,
      categoryLabel,
      productCount,
      totalStock,
    })
  );
}
