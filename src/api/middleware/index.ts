/**
 * Middleware exports
 */

export { errorHandler, ApiError, fromFailure, orThrow, unauthorized, forbidden } from './error-handler.js';
export { authenticateApiKey, requireRole } from './auth.js';
