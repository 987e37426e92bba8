/**
 * Service Registry
 *
 * Process-wide configuration and the session registry that owns every ledger
 */

import { loadInventoryConfig } from '@stockroom/core';
import { loadApiConfig } from '../config.js';
import { SessionRegistry } from '../lib/session-registry.js';

export const apiConfig = loadApiConfig();
export const inventoryConfig = loadInventoryConfig();

export const sessionRegistry = new SessionRegistry({
  config: inventoryConfig,
  idleTimeoutMs: apiConfig.sessionIdleMinutes * 60 * 1000,
});
