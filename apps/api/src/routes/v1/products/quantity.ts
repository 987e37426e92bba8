/**
 * PUT /v1/products/:code/quantity - Set on-hand quantity directly
 *
 * Recorded as a manual adjustment of (new - old).
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { SetQuantityRequestSchema } from '@stockroom/types';
import { validationHook } from '../../../lib/validation.js';
import type { AppBindings } from '../../../types/context.js';

const setQuantityRoute = new Hono<AppBindings>();

setQuantityRoute.put(
  '/:code/quantity',
  zValidator('json', SetQuantityRequestSchema, validationHook),
  (c) => {
    const { ledger } = c.get('inventory');
    const code = c.req.param('code');

    ledger.setQuantityDirect({ code, quantity: c.req.valid('json').quantity });

    return c.json({ product: ledger.getProduct(code) });
  }
);

export { setQuantityRoute };
