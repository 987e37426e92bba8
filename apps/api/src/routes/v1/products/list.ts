/**
 * GET /v1/products - Search the product table
 *
 * Filters (all optional, case-insensitive substring): category, code, name, q (code or name).
 * Category 00 means every category.
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { ProductSearchQuerySchema } from '@stockroom/types';
import { validationHook } from '../../../lib/validation.js';
import type { AppBindings } from '../../../types/context.js';

const listProductsRoute = new Hono<AppBindings>();

listProductsRoute.get('/', zValidator('query', ProductSearchQuerySchema, validationHook), (c) => {
  const { category, code, name, q } = c.req.valid('query');
  const products = c.get('inventory').ledger.searchProducts({ category, code, name, query: q });

  return c.json({ products, count: products.length });
});

export { listProductsRoute };
