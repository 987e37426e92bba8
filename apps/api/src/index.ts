import { serve } from '@hono/node-server';
import { logger } from '@stockroom/observability';
import app from './app.js';
import { apiConfig, inventoryConfig } from './services/index.js';

const { port } = apiConfig;

logger.info(
  {
    port,
    timeZone: inventoryConfig.timeZone,
    mergeExisting: inventoryConfig.mergeExisting,
    rowPolicy: inventoryConfig.rowPolicy,
  },
  'Starting server'
);

serve({
  fetch: app.fetch,
  port,
});

logger.info({ port }, 'Server running');
