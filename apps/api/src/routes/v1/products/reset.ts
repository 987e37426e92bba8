/**
 * DELETE /v1/products - Reset the product table
 *
 * The transaction log is kept.
 */

import { Hono } from 'hono';
import type { AppBindings } from '../../../types/context.js';

const resetProductsRoute = new Hono<AppBindings>();

resetProductsRoute.delete('/', (c) => {
  const removed = c.get('inventory').ledger.resetProducts();

  return c.json({ removed });
});

export { resetProductsRoute };
