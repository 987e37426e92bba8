/**
 * Reorder and report route tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import type { Hono } from 'hono';
import type { AppBindings } from '../../../types/context.js';
import { createTestApp, makeRequest, seedProduct } from '../../../test/helpers.js';

describe('Reorder and reports', () => {
  let app: Hono<AppBindings>;

  beforeEach(async () => {
    // 2024-01-01 is a Monday
    ({ app } = createTestApp({ now: '2024-01-01T09:00:00.000Z' }));
    await seedProduct(app, { code: 'P1', name: 'Rice Ball', category: '02', price: 1200, quantity: 5, recommended: 15 });
    await seedProduct(app, { code: 'P2', name: 'Gum', category: '55', price: 500, quantity: 20, recommended: 15 });
  });

  describe('GET /v1/reorder', () => {
    it('should list shortages with statistics', async () => {
      const response = await makeRequest(app, 'GET', '/v1/reorder');

      expect(await response.json()).toEqual({
        items: [
          {
            code: 'P1',
            name: 'Rice Ball',
            category: '02',
            categoryLabel: 'Gimbap',
            quantity: 5,
            recommended: 15,
            shortage: 10,
            priority: 'normal',
          },
        ],
        stats: { itemCount: 1, totalShortage: 10, averageShortage: 10, zeroStockCount: 0, maxShortage: 10 },
        byCategory: [{ category: '02', categoryLabel: 'Gimbap', itemCount: 1, totalShortage: 10 }],
        sufficiency: { totalItems: 2, sufficientItems: 1, rate: 50 },
      });
    });

    it('should filter items by priority but keep full statistics', async () => {
      const response = await makeRequest(app, 'GET', '/v1/reorder?priority=urgent');

      expect(await response.json()).toMatchObject({ items: [], stats: { itemCount: 1 } });
    });

    it('should reject an unknown priority', async () => {
      const response = await makeRequest(app, 'GET', '/v1/reorder?priority=someday');

      expect(response.status).toBe(400);
    });
  });

  describe('sales reports', () => {
    beforeEach(async () => {
      await makeRequest(app, 'POST', '/v1/products/P2/transactions', { body: { type: 'inbound', quantity: 50 } });
      await makeRequest(app, 'POST', '/v1/products/P2/transactions', { body: { type: 'sale', quantity: 30 } });
      await makeRequest(app, 'POST', '/v1/products/P2/transactions', { body: { type: 'disposal', quantity: 10 } });
    });

    it('should summarize a period with a 25% disposal rate', async () => {
      const response = await makeRequest(app, 'GET', '/v1/reports/period?from=2024-01-01&to=2024-01-31');

      expect(await response.json()).toEqual({
        period: { from: '2024-01-01', to: '2024-01-31' },
        summary: { totalTransactions: 5, totalSales: 30, totalDisposal: 10, disposalRate: 25 },
      });
    });

    it('should exclude records outside the period', async () => {
      const response = await makeRequest(app, 'GET', '/v1/reports/period?from=2024-01-02');

      expect(await response.json()).toMatchObject({
        summary: { totalTransactions: 0, totalSales: 0, totalDisposal: 0, disposalRate: 0 },
      });
    });

    it('should reject a reversed period', async () => {
      const response = await makeRequest(app, 'GET', '/v1/reports/period?from=2024-02-01&to=2024-01-01');

      expect(response.status).toBe(400);
      expect(await response.json()).toEqual({
        error: 'Validation failed',
        issues: ['from: from must not be after to'],
      });
    });

    it('should aggregate by weekday and month', async () => {
      const weekday = await makeRequest(app, 'GET', '/v1/reports/weekday');
      const monthly = await makeRequest(app, 'GET', '/v1/reports/monthly');

      expect(await weekday.json()).toEqual({ weekdays: [{ weekday: 'Monday', sales: 30, disposal: 10 }] });
      expect(await monthly.json()).toEqual({ months: [{ month: 1, sales: 30, disposal: 10 }] });
    });

    it('should total sales per category', async () => {
      const response = await makeRequest(app, 'GET', '/v1/reports/category-sales');

      expect(await response.json()).toEqual({
        categories: [{ category: '55', categoryLabel: 'Candy/Gum', quantity: 30 }],
      });
    });

    it('should compute dashboard metrics', async () => {
      const response = await makeRequest(app, 'GET', '/v1/reports/dashboard');

      expect(await response.json()).toMatchObject({
        metrics: { totalItems: 2, totalStock: 35, stockValue: 21000, reorderCount: 1 },
        topShortages: [{ code: 'P1', shortage: 10 }],
      });
    });
  });

  describe('category reports', () => {
    it('should summarize categories', async () => {
      const response = await makeRequest(app, 'GET', '/v1/reports/category-summary');

      expect(await response.json()).toEqual({
        categories: [
          { category: '02', categoryLabel: 'Gimbap', productCount: 1, totalStock: 5, averageStock: 5, totalRecommended: 15 },
          { category: '55', categoryLabel: 'Candy/Gum', productCount: 1, totalStock: 20, averageStock: 20, totalRecommended: 15 },
        ],
      });
    });

    it('should return the category mix', async () => {
      const response = await makeRequest(app, 'GET', '/v1/reports/category-mix');

      expect(await response.json()).toEqual({
        categories: [
          { category: '02', categoryLabel: 'Gimbap', productCount: 1, totalStock: 5 },
          { category: '55', categoryLabel: 'Candy/Gum', productCount: 1, totalStock: 20 },
        ],
      });
    });
  });
});
