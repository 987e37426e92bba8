/**
 * Report routes
 * Dashboard figures, category composition, and sales-vs-waste aggregates.
 * Sales reports accept an optional inclusive from/to date range.
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import {
  categoryMix,
  categorySummary,
  dashboardMetrics,
  filterByPeriod,
  periodSummary,
  salesByCategory,
  salesWasteByMonth,
  salesWasteByWeekday,
} from '@stockroom/core';
import type { Period } from '@stockroom/core';
import { PeriodQuerySchema } from '@stockroom/types';
import type { InventorySession } from '../../../lib/session-registry.js';
import { validationHook } from '../../../lib/validation.js';
import type { AppBindings } from '../../../types/context.js';

const DASHBOARD_TOP_SHORTAGES = 5;

const reportsRoute = new Hono<AppBindings>();

function recordsInPeriod({ ledger }: InventorySession, period: Period) {
  return filterByPeriod(ledger.listTransactions(), period, ledger.settings.timeZone);
}

reportsRoute.get('/dashboard', (c) => {
  const { ledger } = c.get('inventory');

  return c.json({
    metrics: dashboardMetrics(ledger.listProducts()),
    topShortages: ledger.computeReorderList().slice(0, DASHBOARD_TOP_SHORTAGES),
  });
});

reportsRoute.get('/category-mix', (c) => {
  const { ledger } = c.get('inventory');

  return c.json({ categories: categoryMix(ledger.listProducts(), ledger.categories) });
});

reportsRoute.get('/category-summary', (c) => {
  const { ledger } = c.get('inventory');

  return c.json({ categories: categorySummary(ledger.listProducts(), ledger.categories) });
});

const periodQuery = zValidator('query', PeriodQuerySchema, validationHook);

reportsRoute.get('/weekday', periodQuery, (c) => {
  const records = recordsInPeriod(c.get('inventory'), c.req.valid('query'));

  return c.json({ weekdays: salesWasteByWeekday(records) });
});

reportsRoute.get('/monthly', periodQuery, (c) => {
  const records = recordsInPeriod(c.get('inventory'), c.req.valid('query'));

  return c.json({ months: salesWasteByMonth(records) });
});

reportsRoute.get('/period', periodQuery, (c) => {
  const period = c.req.valid('query');

  return c.json({ period, summary: periodSummary(recordsInPeriod(c.get('inventory'), period)) });
});

reportsRoute.get('/category-sales', periodQuery, (c) => {
  const { ledger } = c.get('inventory');
  const records = recordsInPeriod(c.get('inventory'), c.req.valid('query'));

  return c.json({ categories: salesByCategory(records, ledger.listProducts(), ledger.categories) });
});

export { reportsRoute };
