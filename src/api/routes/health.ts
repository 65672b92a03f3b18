/**
 * Health Check Route
 *
 * Simple health check endpoint for monitoring and load balancers
 */

import type { FastifyInstance } from 'fastify';
import { API_VERSION, type HealthResponse } from '../types.js';
import type { CoreRouteOptions } from './options.js';

export async function healthRoutes(fastify: FastifyInstance, { core }: CoreRouteOptions): Promise<void> {
  /**
   * GET /health
   * Health check endpoint
   */
  fastify.get<{
    Reply: HealthResponse;
  }>('/health', async (_request, reply) => {
    const healthy = core.isHealthy();
    const response: HealthResponse = {
      status: healthy ? 'healthy' : 'unhealthy',
      timestamp: new Date().toISOString(),
      version: API_VERSION,
    };

    reply.status(healthy ? 200 : 503).send(response);
  });
}
