/**
 * POST /v1/imports/rows - Import an already-decoded table
 *
 * Same rules as the .xlsx upload; rows are objects keyed by column header.
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { ImportCycle, rawTableFromRecords } from '@stockroom/core';
import { ImportRowsRequestSchema } from '@stockroom/types';
import { validationHook } from '../../../lib/validation.js';
import type { AppBindings } from '../../../types/context.js';

const importRowsRoute = new Hono<AppBindings>();

importRowsRoute.post('/rows', zValidator('json', ImportRowsRequestSchema, validationHook), (c) => {
  const { headers, rows, ...options } = c.req.valid('json');

  const cycle = new ImportCycle(c.get('inventory').importer);
  cycle.loadTable(rawTableFromRecords(headers, rows));
  cycle.validate(options);
  const report = cycle.apply();

  return c.json({ report });
});

export { importRowsRoute };
