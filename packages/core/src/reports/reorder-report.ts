/**
 * Reorder report
 *
 * Shortage list, priority classes, and the aggregates shown on the ordering screen.
 */

import type { CategoryCatalog } from '../catalog/category-catalog.js';
import type { Product } from '../ledger/ledger-types.js';
import { percentage, roundTo } from './rounding.js';

export const REORDER_PRIORITIES = ['urgent', 'high', 'normal', 'low'] as const;

export type ReorderPriority = (typeof REORDER_PRIORITIES)[number];

export interface ReorderItem {
  code: string;
  name: string;
  category: string;
  categoryLabel: string;
  quantity: number;
  recommended: number;
  shortage: number;
  priority: ReorderPriority;
}

/**
 * urgent: out of stock, high: short 20+, normal: short 10-19, low: the rest
 */
export function classifyPriority(quantity: number, shortage: number): ReorderPriority {
  if (quantity === 0) {
    return 'urgent';
  }
  if (shortage >= 20) {
    return 'high';
  }
  if (shortage >= 10) {
    return 'normal';
  }
  return 'low';
}

/**
 * Products below their recommended quantity, largest shortage first.
 * Equal shortages keep table order.
 */
export function computeReorderList(
  products: readonly Product[],
  catalog: CategoryCatalog
): ReorderItem[] {
  return products
    .filter((product) => product.quantity < product.recommended)
    .map((product) => {
      const shortage = product.recommended - product.quantity;
      return {
        code: product.code,
        name: product.name,
        category: product.category,
        categoryLabel: catalog.label(product.category),
        quantity: product.quantity,
        recommended: product.recommended,
        shortage,
        priority: classifyPriority(product.quantity, shortage),
      };
    })
    .sort((a, b) => b.shortage - a.shortage);
}

export function filterByPriority(
  items: readonly ReorderItem[],
  priority?: ReorderPriority
): ReorderItem[] {
  return priority ? items.filter((item) => item.priority === priority) : [...items];
}

export interface ReorderStats {
  itemCount: number;
  totalShortage: number;
  averageShortage: number;
  zeroStockCount: number;
  maxShortage: number;
}

export function summarizeReorder(items: readonly ReorderItem[]): ReorderStats {
  const totalShortage = items.reduce((sum, item) => sum + item.shortage, 0);

  return {
    itemCount: items.length,
    totalShortage,
    averageShortage: items.length > 0 ? roundTo(totalShortage / items.length, 1) : 0,
    zeroStockCount: items.filter((item) => item.quantity === 0).length,
    maxShortage: items.reduce((max, item) => Math.max(max, item.shortage), 0),
  };
}

export interface CategoryShortage {
  category: string;
  categoryLabel: string;
  itemCount: number;
  totalShortage: number;
}

/**
 * Shortage totals per category, ordered by category code
 */
export function shortageByCategory(items: readonly ReorderItem[]): CategoryShortage[] {
  const groups = new Map<string, CategoryShortage>();

  for (const item of items) {
    const group = groups.get(item.category) ?? {
      category: item.category,
      categoryLabel: item.categoryLabel,
      itemCount: 0,
      totalShortage: 0,
    };
    group.itemCount += 1;
    group.totalShortage += item.shortage;
    groups.set(item.category, group);
  }

  return [...groups.values()].sort((a, b) => a.category.localeCompare(b.category));
}

export interface Sufficiency {
  totalItems: number;
  sufficientItems: number;
  /** Percent of products at or above their recommended quantity */
  rate: number;
}

export function stockSufficiency(products: readonly Product[]): Sufficiency {
  const sufficientItems = products.filter((product) => product.quantity >= product.recommended).length;

  return {
    totalItems: products.length,
    sufficientItems,
    rate: percentage(sufficientItems, products.length),
  };
}
