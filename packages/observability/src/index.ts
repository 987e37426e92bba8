/**
 * @stockroom/observability
 *
 * Structured logging shared by the domain packages and the API.
 */

export { createLogger, logger } from './logger.js';
export type { Logger } from './logger.js';
