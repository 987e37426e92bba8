import { Hono } from 'hono';
import { corsMiddleware } from './middleware/cors.js';
import { handleError } from './middleware/error-handler.js';
import { requestIdMiddleware } from './middleware/request-id.js';
import { requestLoggerMiddleware } from './middleware/request-logger.js';
import { sessionMiddleware } from './middleware/session.js';
import type { SessionRegistry } from './lib/session-registry.js';
import { categoriesRoute } from './routes/v1/categories.js';
import { exportsRoute } from './routes/v1/exports/index.js';
import { healthRoute } from './routes/v1/health.js';
import { importsRoute } from './routes/v1/imports/index.js';
import { productsRoute } from './routes/v1/products/index.js';
import { reorderRoute } from './routes/v1/reorder.js';
import { reportsRoute } from './routes/v1/reports/index.js';
import { createSessionRoute } from './routes/v1/session.js';
import { transactionsRoute } from './routes/v1/transactions/index.js';
import { apiConfig, sessionRegistry } from './services/index.js';
import type { AppBindings } from './types/context.js';

export interface AppOptions {
  registry?: SessionRegistry;
  webAppUrl?: string;
}

export function createApp(options: AppOptions = {}) {
  const registry = options.registry ?? sessionRegistry;
  const app = new Hono<AppBindings>();

  // Apply request ID middleware first for log correlation
  app.use('*', requestIdMiddleware);
  app.use('*', requestLoggerMiddleware);
  app.use('*', corsMiddleware(options.webAppUrl ?? apiConfig.webAppUrl));

  app.onError(handleError);
  app.notFound((c) => c.json({ error: 'Not found' }, 404));

  app.route('/health', healthRoute);

  const v1 = new Hono<AppBindings>();

  // None of these need a ledger
  v1.route('/health', healthRoute);
  v1.route('/categories', categoriesRoute);
  v1.route('/session', createSessionRoute(registry));

  // Only ledger routes require a session; unknown paths fall through to notFound
  const requireSession = sessionMiddleware(registry);
  const inventoryRoutes: Array<[string, Hono<AppBindings>]> = [
    ['/products', productsRoute],
    ['/transactions', transactionsRoute],
    ['/imports', importsRoute],
    ['/reorder', reorderRoute],
    ['/reports', reportsRoute],
    ['/exports', exportsRoute],
  ];

  for (const [path, route] of inventoryRoutes) {
    const scoped = new Hono<AppBindings>();
    scoped.use('*', requireSession);
    scoped.route('/', route);
    v1.route(path, scoped);
  }

  app.route('/v1', v1);

  return app;
}

const app = createApp();

export default app;
