/**
 * GET /v1/reorder - Products below their recommended quantity
 *
 * Items are sorted by shortage (largest first) and optionally filtered by priority.
 * Statistics always cover the full list.
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import {
  filterByPriority,
  shortageByCategory,
  stockSufficiency,
  summarizeReorder,
} from '@stockroom/core';
import { ReorderQuerySchema } from '@stockroom/types';
import { validationHook } from '../../lib/validation.js';
import type { AppBindings } from '../../types/context.js';

const reorderRoute = new Hono<AppBindings>();

reorderRoute.get('/', zValidator('query', ReorderQuerySchema, validationHook), (c) => {
  const { ledger } = c.get('inventory');
  const { priority } = c.req.valid('query');
  const all = ledger.computeReorderList();

  return c.json({
    items: filterByPriority(all, priority),
    stats: summarizeReorder(all),
    byCategory: shortageByCategory(all),
    sufficiency: stockSufficiency(ledger.listProducts()),
  });
});

export { reorderRoute };
