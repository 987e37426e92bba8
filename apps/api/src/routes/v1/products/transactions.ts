/**
 * POST /v1/products/:code/transactions - Record inbound, sale, or disposal
 *
 * On-hand quantity is clamped at 0; the record keeps the requested quantity.
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { ApplyTransactionRequestSchema } from '@stockroom/types';
import { validationHook } from '../../../lib/validation.js';
import type { AppBindings } from '../../../types/context.js';

const applyTransactionRoute = new Hono<AppBindings>();

applyTransactionRoute.post(
  '/:code/transactions',
  zValidator('json', ApplyTransactionRequestSchema, validationHook),
  (c) => {
    const { ledger } = c.get('inventory');
    const code = c.req.param('code');
    const { type, quantity } = c.req.valid('json');

    ledger.applyTransaction({ code, type, quantity });

    return c.json({ product: ledger.getProduct(code) }, 201);
  }
);

export { applyTransactionRoute };
