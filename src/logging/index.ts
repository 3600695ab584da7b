/**
 * Logging Module
 *
 * Centralized logging for the entire application.
 * All logging MUST go through this module.
 */

export { default as logger } from './logger.js';
export type { Logger } from './configLogger.js';
export { logRequest, logResponse } from './requestLogger.js';
