import { Hono } from 'hono';
import type { AppBindings } from '../../../types/context.js';
import { importRowsRoute } from './rows.js';
import { uploadImportRoute } from './upload.js';

const importsRoute = new Hono<AppBindings>();

importsRoute.route('/', uploadImportRoute);
importsRoute.route('/', importRowsRoute);

export { importsRoute };
