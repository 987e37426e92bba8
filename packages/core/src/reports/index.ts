/**
 * Reports Domain
 *
 * Read-only aggregates over ledger snapshots.
 */

export {
  REORDER_PRIORITIES,
  classifyPriority,
  computeReorderList,
  filterByPriority,
  summarizeReorder,
  shortageByCategory,
  stockSufficiency,
} from './reorder-report.js';
export type {
  ReorderPriority,
  ReorderItem,
  ReorderStats,
  CategoryShortage,
  Sufficiency,
} from './reorder-report.js';

export { dashboardMetrics, categorySummary, categoryMix } from './stock-report.js';
export type { DashboardMetrics, CategorySummary, CategoryMixSlice } from './stock-report.js';

export {
  salesWasteByWeekday,
  salesWasteByMonth,
  filterByPeriod,
  periodSummary,
  salesByCategory,
} from './sales-report.js';
export type {
  SalesWaste,
  WeekdaySalesWaste,
  MonthlySalesWaste,
  Period,
  PeriodSummary,
  CategorySales,
} from './sales-report.js';

export {
  productsTable,
  transactionsTable,
  purchaseOrderTable,
  uploadTemplateTable,
} from './export-tables.js';

export { roundTo, percentage } from './rounding.js';
