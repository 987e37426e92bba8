/**
 * POST /v1/imports - Upload an .xlsx workbook
 *
 * multipart/form-data with a `file` part and optional text fields
 * mode (replace | merge), category, mergeExisting, rowPolicy.
 * The ledger is only touched once the whole file has validated.
 */

import { Hono } from 'hono';
import { bodyLimit } from 'hono/body-limit';
import { zValidator } from '@hono/zod-validator';
import { importSpreadsheet } from '@stockroom/core';
import { ImportFormSchema } from '@stockroom/types';
import { validationHook } from '../../../lib/validation.js';
import type { AppBindings } from '../../../types/context.js';

export const MAX_UPLOAD_BYTES = 5 * 1024 * 1024;

const uploadImportRoute = new Hono<AppBindings>();

uploadImportRoute.post(
  '/',
  bodyLimit({
    maxSize: MAX_UPLOAD_BYTES,
    onError: (c) => c.json({ error: 'Upload exceeds the 5 MB limit' }, 413),
  }),
  zValidator('form', ImportFormSchema, validationHook),
  async (c) => {
    const body = await c.req.parseBody();
    const file = body.file;

    if (file === undefined || typeof file === 'string') {
      return c.json({ error: 'Validation failed', issues: ['file: An .xlsx file is required'] }, 400);
    }

    const report = await importSpreadsheet(
      c.get('inventory').importer,
      await file.arrayBuffer(),
      c.req.valid('form')
    );

    return c.json({ report });
  }
);

export { uploadImportRoute };
