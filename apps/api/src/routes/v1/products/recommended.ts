/**
 * POST /v1/products/recommended - Recompute recommended quantities for a category
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { BulkRecommendedRequestSchema } from '@stockroom/types';
import { validationHook } from '../../../lib/validation.js';
import type { AppBindings } from '../../../types/context.js';

const bulkRecommendedRoute = new Hono<AppBindings>();

bulkRecommendedRoute.post(
  '/recommended',
  zValidator('json', BulkRecommendedRequestSchema, validationHook),
  (c) => {
    const { category, multiplier } = c.req.valid('json');
    const updated = c.get('inventory').ledger.bulkSetRecommended({ category, multiplier });

    return c.json({ category, multiplier, updated });
  }
);

export { bulkRecommendedRoute };
