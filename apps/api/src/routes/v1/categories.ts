/**
 * GET /v1/categories - The category catalog
 *
 * ?assignable=true leaves out the "all categories" pseudo-entry.
 */

import { Hono } from 'hono';
import { loadDefaultCatalog } from '@stockroom/core';

const categoriesRoute = new Hono();

categoriesRoute.get('/', (c) => {
  const assignableOnly = c.req.query('assignable') === 'true';
  const categories = loadDefaultCatalog().entries({ includeAll: !assignableOnly });

  return c.json({ categories });
});

export { categoriesRoute };
