import { Hono } from 'hono';
import type { AppBindings } from '../../../types/context.js';
import { clearTransactionsRoute } from './clear.js';
import { listTransactionsRoute } from './list.js';

const transactionsRoute = new Hono<AppBindings>();

transactionsRoute.route('/', listTransactionsRoute);
transactionsRoute.route('/', clearTransactionsRoute);

export { transactionsRoute };
