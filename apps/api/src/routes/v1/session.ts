/**
 * DELETE /v1/session - Discard the caller's ledger
 *
 * The next request with the same session id starts from an empty table.
 */

import { Hono } from 'hono';
import type { SessionRegistry } from '../../lib/session-registry.js';
import { missingSessionResponse, readSessionId } from '../../middleware/session.js';

export function createSessionRoute(registry: SessionRegistry) {
  const sessionRoute = new Hono();

  sessionRoute.delete('/', (c) => {
    const sessionId = readSessionId(c);
    if (!sessionId) {
      return missingSessionResponse(c);
    }

    return c.json({ discarded: registry.discard(sessionId) });
  });

  return sessionRoute;
}
