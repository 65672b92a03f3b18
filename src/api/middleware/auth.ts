/**
 * API Key Authentication Middleware
 *
 * Each API key carries one role. The `onRequest` hook resolves the caller's
 * role from the X-API-Key header; routes declare the roles they accept with
 * `requireRole`.
 */

import type { FastifyReply, FastifyRequest, onRequestAsyncHookHandler, preHandlerAsyncHookHandler } from 'fastify';
import type { ApiRole } from '../../config.js';
import { secureCompare } from '../../crypto/index.js';
import { forbidden, unauthorized } from './error-handler.js';

declare module 'fastify' {
  interface FastifyRequest {
    /** Role of the authenticated caller; null when authentication is off */
    apiRole: ApiRole | null;
  }
  interface FastifyInstance {
    authEnabled: boolean;
  }
}

const PUBLIC_PATHS = new Set(['/', '/health']);

/**
 * Build the API key authentication hook
 *
 * Checks for a valid API key in the X-API-Key header
 */
export function authenticateApiKey(apiKeys: ReadonlyMap<string, ApiRole>): onRequestAsyncHookHandler {
  return async function (request: FastifyRequest, _reply: FastifyReply): Promise<void> {
    if (PUBLIC_PATHS.has(request.routeOptions.url ?? request.url)) {
      return;
    }

    const apiKey = request.headers['x-api-key'];

    if (!apiKey) {
      throw unauthorized('API key required. Provide X-API-Key header.');
    }

    const role = typeof apiKey === 'string' ? findRole(apiKeys, apiKey) : null;
    if (!role) {
      throw unauthorized('Invalid API key');
    }

    request.apiRole = role;
  };
}

/**
 * Route guard accepting any of the given roles
 */
export function requireRole(...roles: ApiRole[]): preHandlerAsyncHookHandler {
  return async function (request: FastifyRequest, _reply: FastifyReply): Promise<void> {
    if (!request.server.authEnabled) {
      return;
    }
    if (request.apiRole === null || !roles.includes(request.apiRole)) {
      throw forbidden(`This endpoint requires the ${roles.join(' or ')} role`);
    }
  };
}

/**
 * Compare against every key so timing does not reveal which prefix matched
 */
function findRole(apiKeys: ReadonlyMap<string, ApiRole>, presented: string): ApiRole | null {
  let match: ApiRole | null = null;
  for (const [key, role] of apiKeys) {
    if (secureCompare(key, presented)) {
      match = role;
    }
  }
  return match;
}
