/**
 * Product route tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import type { Hono } from 'hono';
import type { AppBindings } from '../../../types/context.js';
import { createTestApp, makeRequest, seedProduct } from '../../../test/helpers.js';

describe('Product routes', () => {
  let app: Hono<AppBindings>;

  beforeEach(() => {
    ({ app } = createTestApp());
  });

  describe('POST /v1/products', () => {
    it('should register a product with a derived recommended quantity', async () => {
      const response = await makeRequest(app, 'POST', '/v1/products', {
        body: { code: 'P1', name: 'Rice Ball', category: '02', price: 1200, quantity: 10 },
      });

      expect(response.status).toBe(201);
      expect(await response.json()).toEqual({
        product: {
          code: 'P1',
          name: 'Rice Ball',
          category: '02',
          price: 1200,
          quantity: 10,
          recommended: 15,
          updatedAt: '2024-01-01T09:00:00.000Z',
        },
      });
    });

    it('should return 409 for a duplicate code', async () => {
      await seedProduct(app, { code: 'P1', name: 'Rice Ball', category: '02', price: 1200, quantity: 10 });

      const response = await makeRequest(app, 'POST', '/v1/products', {
        body: { code: 'P1', name: 'Other', category: '02', price: 1, quantity: 1 },
      });

      expect(response.status).toBe(409);
      expect(await response.json()).toEqual({ error: 'Product code already registered: P1' });
    });

    it('should return 400 for an invalid body', async () => {
      const response = await makeRequest(app, 'POST', '/v1/products', {
        body: { code: 'P1', name: 'Rice Ball', category: '02', price: 1200, quantity: -3 },
      });

      expect(response.status).toBe(400);
      expect(await response.json()).toEqual({
        error: 'Validation failed',
        issues: ['quantity: Quantity must not be negative'],
      });
    });

    it('should return 400 for an unknown category', async () => {
      const response = await makeRequest(app, 'POST', '/v1/products', {
        body: { code: 'P1', name: 'Rice Ball', category: '84', price: 1200, quantity: 1 },
      });

      expect(response.status).toBe(400);
      expect(await response.json()).toMatchObject({ error: 'Unknown category: 84' });
    });
  });

  describe('stock movements', () => {
    beforeEach(async () => {
      await seedProduct(app, { code: 'P1', name: 'Rice Ball', category: '02', price: 1200, quantity: 10 });
    });

    it('should apply a sale', async () => {
      const response = await makeRequest(app, 'POST', '/v1/products/P1/transactions', {
        body: { type: 'sale', quantity: 4 },
      });

      expect(response.status).toBe(201);
      expect(await response.json()).toMatchObject({ product: { code: 'P1', quantity: 6 } });
    });

    it('should clamp at zero', async () => {
      const response = await makeRequest(app, 'POST', '/v1/products/P1/transactions', {
        body: { type: 'disposal', quantity: 50 },
      });

      expect(await response.json()).toMatchObject({ product: { quantity: 0 } });
    });

    it('should reject manual adjustments on the transactions endpoint', async () => {
      const response = await makeRequest(app, 'POST', '/v1/products/P1/transactions', {
        body: { type: 'manual-adjust', quantity: 1 },
      });

      expect(response.status).toBe(400);
    });

    it('should return 404 for an unknown product', async () => {
      const response = await makeRequest(app, 'POST', '/v1/products/NOPE/transactions', {
        body: { type: 'inbound', quantity: 1 },
      });

      expect(response.status).toBe(404);
      expect(await response.json()).toEqual({ error: 'Product not found: NOPE' });
    });

    it('should set the quantity directly', async () => {
      const response = await makeRequest(app, 'PUT', '/v1/products/P1/quantity', {
        body: { quantity: 3 },
      });

      expect(response.status).toBe(200);
      expect(await response.json()).toMatchObject({ product: { quantity: 3 } });

      const log = await makeRequest(app, 'GET', '/v1/transactions?type=manual-adjust');
      expect(await log.json()).toMatchObject({
        count: 1,
        transactions: [{ type: 'manual-adjust', quantity: -7, before: 10, after: 3 }],
      });
    });
  });

  describe('GET /v1/products', () => {
    beforeEach(async () => {
      await seedProduct(app, { code: '880100', name: 'Tuna Rice Ball', category: '02', price: 1200, quantity: 5 });
      await seedProduct(app, { code: '880200', name: 'Mint Gum', category: '55', price: 500, quantity: 5 });
    });

    it('should list every product', async () => {
      const response = await makeRequest(app, 'GET', '/v1/products');

      expect(await response.json()).toMatchObject({ count: 2 });
    });

    it('should filter by query and category', async () => {
      const byQuery = await makeRequest(app, 'GET', '/v1/products?q=gum');
      expect(await byQuery.json()).toMatchObject({ count: 1, products: [{ code: '880200' }] });

      const byCategory = await makeRequest(app, 'GET', '/v1/products?category=02');
      expect(await byCategory.json()).toMatchObject({ count: 1, products: [{ code: '880100' }] });
    });

    it('should return one product by code', async () => {
      const response = await makeRequest(app, 'GET', '/v1/products/880100');

      expect(response.status).toBe(200);
      expect(await response.json()).toMatchObject({ product: { name: 'Tuna Rice Ball' } });
    });
  });

  describe('bulk operations', () => {
    it('should recompute recommended quantities for a category', async () => {
      await seedProduct(app, { code: 'A', name: 'Candy', category: '55', price: 100, quantity: 4 });
      await seedProduct(app, { code: 'B', name: 'Gum', category: '55', price: 100, quantity: 10 });

      const response = await makeRequest(app, 'POST', '/v1/products/recommended', {
        body: { category: '55', multiplier: 2 },
      });

      expect(await response.json()).toEqual({ category: '55', multiplier: 2, updated: 2 });
      const list = await makeRequest(app, 'GET', '/v1/products');
      expect(await list.json()).toMatchObject({
        products: [{ code: 'A', recommended: 8 }, { code: 'B', recommended: 20 }],
      });
    });

    it('should reset the table and keep the log', async () => {
      await seedProduct(app, { code: 'A', name: 'Candy', category: '55', price: 100, quantity: 4 });

      const reset = await makeRequest(app, 'DELETE', '/v1/products');
      expect(await reset.json()).toEqual({ removed: 1 });

      const log = await makeRequest(app, 'GET', '/v1/transactions');
      expect(await log.json()).toMatchObject({ count: 1 });
    });

    it('should clear the log', async () => {
      await seedProduct(app, { code: 'A', name: 'Candy', category: '55', price: 100, quantity: 4 });

      const cleared = await makeRequest(app, 'DELETE', '/v1/transactions');
      expect(await cleared.json()).toEqual({ removed: 1 });
    });
  });
});
