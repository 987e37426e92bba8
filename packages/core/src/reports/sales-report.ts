/**
 * Sales and waste report
 *
 * Aggregates sale and disposal records by weekday, month, period, and category.
 */

import type { CategoryCatalog } from '../catalog/category-catalog.js';
import { calendarParts, WEEKDAYS } from '../ledger/clock.js';
import type { Weekday } from '../ledger/clock.js';
import type { Product, TransactionRecord } from '../ledger/ledger-types.js';
import { percentage } from './rounding.js';

export interface SalesWaste {
  sales: number;
  disposal: number;
}

export interface WeekdaySalesWaste extends SalesWaste {
  weekday: Weekday;
}

export interface MonthlySalesWaste extends SalesWaste {
  month: number;
}

function isSaleOrDisposal(record: TransactionRecord): boolean {
  return record.type === 'sale' || record.type === 'disposal';
}

function addTo(totals: SalesWaste, record: TransactionRecord): void {
  if (record.type === 'sale') {
    totals.sales += record.quantity;
  } else if (record.type === 'disposal') {
    totals.disposal += record.quantity;
  }
}

/**
 * Sale/disposal totals per weekday, Monday first; weekdays without records are omitted
 */
export function salesWasteByWeekday(records: readonly TransactionRecord[]): WeekdaySalesWaste[] {
  const totals = new Map<Weekday, SalesWaste>();

  for (const record of records.filter(isSaleOrDisposal)) {
    const entry = totals.get(record.weekday) ?? { sales: 0, disposal: 0 };
    addTo(entry, record);
    totals.set(record.weekday, entry);
  }

  return WEEKDAYS.flatMap((weekday) => {
    const entry = totals.get(weekday);
    return entry ? [{ weekday, ...entry }] : [];
  });
}

/**
 * Sale/disposal totals per calendar month (1-12), ascending
 */
export function salesWasteByMonth(records: readonly TransactionRecord[]): MonthlySalesWaste[] {
  const totals = new Map<number, SalesWaste>();

  for (const record of records.filter(isSaleOrDisposal)) {
    const entry = totals.get(record.month) ?? { sales: 0, disposal: 0 };
    addTo(entry, record);
    totals.set(record.month, entry);
  }

  return [...totals.entries()]
    .sort(([a], [b]) => a - b)
    .map(([month, entry]) => ({ month, ...entry }));
}

export interface Period {
  /** Inclusive YYYY-MM-DD */
  from?: string;
  /** Inclusive YYYY-MM-DD */
  to?: string;
}

/**
 * Records whose local date (in the given zone) falls within the period
 */
export function filterByPeriod(
  records: readonly TransactionRecord[],
  period: Period,
  timeZone: string
): TransactionRecord[] {
  return records.filter((record) => {
    const { date } = calendarParts(new Date(record.occurredAt), timeZone);
    return (!period.from || date >= period.from) && (!period.to || date <= period.to);
  });
}

export interface PeriodSummary {
  totalTransactions: number;
  totalSales: number;
  totalDisposal: number;
  /** disposal / (sales + disposal), percent with one decimal */
  disposalRate: number;
}

export function periodSummary(records: readonly TransactionRecord[]): PeriodSummary {
  const totals: SalesWaste = { sales: 0, disposal: 0 };
  records.forEach((record) => addTo(totals, record));

  return {
    totalTransactions: records.length,
    totalSales: totals.sales,
    totalDisposal: totals.disposal,
    disposalRate: percentage(totals.disposal, totals.sales + totals.disposal),
  };
}

export interface CategorySales {
  category: string;
  categoryLabel: string;
  quantity: number;
}

/**
 * Sale quantities per category, smallest first.
 * Categories come from the current product table; sales of unknown codes are dropped.
 */
export function salesByCategory(
  records: readonly TransactionRecord[],
  products: readonly Product[],
  catalog: CategoryCatalog
): CategorySales[] {
  const categoryOf = new Map(products.map((product) => [product.code, product.category]));
  const totals = new Map<string, number>();

  for (const record of records) {
    const category = categoryOf.get(record.code);
    if (record.type !== 'sale' || category === undefined) {
      continue;
    }
    totals.set(category, (totals.get(category) ?? 0) + record.quantity);
  }

  return [...totals.entries()]
    .map(([category, quantity]) => ({ category, categoryLabel: catalog.label(category), quantity }))
    .sort((a, b) => a.quantity - b.quantity);
}
