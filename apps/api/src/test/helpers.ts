/**
 * HTTP test helpers
 * Drive a Hono app in process with a session header and JSON or multipart bodies
 */

import type { Env, Hono } from 'hono';
import { FixedClock } from '@stockroom/core';
import type { InventoryConfig } from '@stockroom/core';
import { createLogger } from '@stockroom/observability';
import { createApp } from '../app.js';
import { SessionRegistry } from '../lib/session-registry.js';

export const TEST_SESSION_ID = 'test-session';

/**
 * Request options for test helpers
 */
export interface RequestOptions {
  body?: unknown;
  headers?: Record<string, string>;
  /** x-session-id header; pass null to omit it */
  sessionId?: string | null;
}

/**
 * Make an HTTP request to the Hono app
 *
 * @param path - Request path (e.g., '/v1/products')
 */
export async function makeRequest<E extends Env>(
  app: Hono<E>,
  method: string,
  path: string,
  options: RequestOptions = {}
): Promise<Response> {
  const { body, headers = {}, sessionId = TEST_SESSION_ID } = options;

  const init: RequestInit = {
    method: method.toUpperCase(),
    headers: {
      'Content-Type': 'application/json',
      ...(sessionId ? { 'x-session-id': sessionId } : {}),
      ...headers,
    },
  };

  if (body !== undefined) {
    init.body = typeof body === 'string' ? body : JSON.stringify(body);
  }

  return app.request(path, init);
}

/**
 * POST a multipart form; the runtime sets the boundary header
 */
export async function makeUploadRequest<E extends Env>(
  app: Hono<E>,
  path: string,
  form: FormData,
  sessionId: string = TEST_SESSION_ID
): Promise<Response> {
  return app.request(path, {
    method: 'POST',
    headers: { 'x-session-id': sessionId },
    body: form,
  });
}

export interface TestAppOptions {
  config?: Partial<InventoryConfig>;
  now?: string;
}

/**
 * Fresh app with its own session registry and a fixed clock
 */
export function createTestApp(options: TestAppOptions = {}) {
  const clock = new FixedClock(options.now ?? '2024-01-01T09:00:00.000Z');
  const registry = new SessionRegistry({
    clock,
    config: options.config,
    logger: createLogger({ level: 'silent' }),
  });

  return { app: createApp({ registry }), registry, clock };
}

/**
 * Register a product through the API
 */
export async function seedProduct<E extends Env>(
  app: Hono<E>,
  product: { code: string; name: string; category: string; price: number; quantity: number; recommended?: number },
  sessionId: string = TEST_SESSION_ID
): Promise<void> {
  const response = await makeRequest(app, 'POST', '/v1/products', { body: product, sessionId });
  if (response.status !== 201) {
    throw new Error(`Seeding ${product.code} failed with ${response.status}`);
  }
}
