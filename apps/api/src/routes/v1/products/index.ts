/**
 * Product routes
 * Registration, search, stock movements, direct adjustments, and bulk updates
 */

import { Hono } from 'hono';
import type { AppBindings } from '../../../types/context.js';
import { bulkRecommendedRoute } from './recommended.js';
import { createProductRoute } from './create.js';
import { getProductRoute } from './get.js';
import { listProductsRoute } from './list.js';
import { setQuantityRoute } from './quantity.js';
import { resetProductsRoute } from './reset.js';
import { applyTransactionRoute } from './transactions.js';

const productsRoute = new Hono<AppBindings>();

productsRoute.route('/', listProductsRoute);
productsRoute.route('/', createProductRoute);
productsRoute.route('/', resetProductsRoute);
productsRoute.route('/', bulkRecommendedRoute);
productsRoute.route('/', getProductRoute);
productsRoute.route('/', applyTransactionRoute);
productsRoute.route('/', setQuantityRoute);

export { productsRoute };
