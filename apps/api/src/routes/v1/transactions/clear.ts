/**
 * DELETE /v1/transactions - Clear the transaction log
 */

import { Hono } from 'hono';
import type { AppBindings } from '../../../types/context.js';

const clearTransactionsRoute = new Hono<AppBindings>();

clearTransactionsRoute.delete('/', (c) => {
  const removed = c.get('inventory').ledger.clearTransactions();

  return c.json({ removed });
});

export { clearTransactionsRoute };
