/**
 * GET /v1/transactions - The transaction log, oldest first
 *
 * Optional filters: type (comma-separated), code, from/to (inclusive local dates).
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { filterByPeriod } from '@stockroom/core';
import { TransactionQuerySchema } from '@stockroom/types';
import { validationHook } from '../../../lib/validation.js';
import type { AppBindings } from '../../../types/context.js';

const listTransactionsRoute = new Hono<AppBindings>();

listTransactionsRoute.get('/', zValidator('query', TransactionQuerySchema, validationHook), (c) => {
  const { ledger } = c.get('inventory');
  const { type, code, from, to } = c.req.valid('query');

  const transactions = filterByPeriod(
    ledger.listTransactions({ types: type, code }),
    { from, to },
    ledger.settings.timeZone
  );

  return c.json({ transactions, count: transactions.length });
});

export { listTransactionsRoute };
