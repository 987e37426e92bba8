import type { InventorySession } from '../lib/session-registry.js';

/**
 * Shared Hono context variables for API requests
 */
export type ContextVariables = {
  requestId: string;
  /** Set by the session middleware on inventory routes */
  inventory: InventorySession;
};

export type AppBindings = {
  Variables: ContextVariables;
};

declare module 'hono' {
  // Allow c.var / c.get access without casting everywhere
  interface ContextVariableMap extends ContextVariables {}
}
