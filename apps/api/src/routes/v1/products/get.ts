/**
 * GET /v1/products/:code - One product
 */

import { Hono } from 'hono';
import type { AppBindings } from '../../../types/context.js';

const getProductRoute = new Hono<AppBindings>();

getProductRoute.get('/:code', (c) => {
  const product = c.get('inventory').ledger.getProduct(c.req.param('code'));

  return c.json({ product });
});

export { getProductRoute };
