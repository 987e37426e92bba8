/**
 * POST /v1/products - Register a product
 *
 * Appends a registration transaction. A missing or zero recommended quantity
 * is derived from the initial quantity.
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { CreateProductRequestSchema } from '@stockroom/types';
import { validationHook } from '../../../lib/validation.js';
import type { AppBindings } from '../../../types/context.js';

const createProductRoute = new Hono<AppBindings>();

createProductRoute.post('/', zValidator('json', CreateProductRequestSchema, validationHook), (c) => {
  const product = c.get('inventory').ledger.registerProduct(c.req.valid('json'));

  return c.json({ product }, 201);
});

export { createProductRoute };
