/**
 * Sealed Ballot REST API Server
 *
 * Fastify-based REST API over the voting core
 */

import Fastify, { type FastifyBaseLogger, type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import rateLimit from '@fastify/rate-limit';
import { loadConfig, type ApiRole } from '../config.js';
import { createLogger, type Logger } from '../logger.js';
import { SealedBallot } from '../sealed-ballot.js';
import { errorHandler, authenticateApiKey } from './middleware/index.js';
import { auditRoutes, electionRoutes, healthRoutes, votingRoutes } from './routes/index.js';
import { API_VERSION } from './types.js';

export interface ServerConfig {
  /** Voting core the routes operate on */
  core: SealedBallot;

  /** API keys and the role each grants */
  apiKeys?: ReadonlyMap<string, ApiRole>;

  /** Enable CORS */
  enableCors?: boolean;

  /** Enable rate limiting */
  enableRateLimit?: boolean;

  /** Requests per minute per client when rate limiting is on */
  rateLimitMax?: number;

  /** Enable API key authentication */
  enableAuth?: boolean;

  /** Logger for Fastify; false disables request logging */
  logger?: Logger | false;
}

/**
 * Create and configure Fastify server
 */
export async function createServer(config: ServerConfig): Promise<FastifyInstance> {
  const {
    core,
    apiKeys = new Map<string, ApiRole>(),
    enableCors = true,
    enableRateLimit = true,
    rateLimitMax = 100,
    enableAuth = true,
    logger = false,
  } = config;

  const loggerOption: FastifyBaseLogger | false = logger;
  const fastify = Fastify({ logger: loggerOption });

  fastify.decorate('authEnabled', enableAuth);
  fastify.decorateRequest('apiRole', null);

  // Register error handler
  fastify.setErrorHandler(errorHandler);

  if (enableCors) {
    await fastify.register(cors, {
      origin: true,
      credentials: true,
    });
  }

  if (enableRateLimit) {
    await fastify.register(rateLimit, {
      max: rateLimitMax,
      timeWindow: '1 minute',
      errorResponseBuilder: () => ({
        error: {
          message: 'Rate limit exceeded. Please try again later.',
          code: 'RATE_LIMIT_EXCEEDED',
          statusCode: 429,
        },
      }),
    });
  }

  if (enableAuth) {
    fastify.addHook('onRequest', authenticateApiKey(apiKeys));
  }

  // Register routes
  await fastify.register(healthRoutes, { core });
  await fastify.register(votingRoutes, { core });
  await fastify.register(auditRoutes, { core });
  await fastify.register(electionRoutes, { core });

  // Root endpoint
  fastify.get('/', async (_request, reply) => {
    reply.send({
      name: 'Sealed Ballot API',
      version: API_VERSION,
      description: 'Anonymous ballot casting with a hash-chained audit log',
      endpoints: {
        health: 'GET /health',
        voting: {
          ballot: 'GET /v1/elections/:id/ballot',
          validateIdentity: 'POST /v1/identity/validate',
          castBallot: 'POST /v1/ballots',
          verifyReceipt: 'GET /v1/receipts/:receipt',
        },
        audit: {
          verify: 'GET /v1/elections/:id/audit/verify',
          export: 'GET /v1/elections/:id/audit',
        },
        elections: {
          create: 'POST /v1/elections',
          list: 'GET /v1/elections',
          get: 'GET /v1/elections/:id',
          open: 'POST /v1/elections/:id/open',
          close: 'POST /v1/elections/:id/close',
          importVoters: 'POST /v1/elections/:id/voters',
          reissueToken: 'POST /v1/elections/:id/voters/reissue',
          tally: 'GET /v1/elections/:id/tally',
        },
      },
      documentation: 'Use X-API-Key header for authentication',
    });
  });

  return fastify;
}

/**
 * Start the server from environment configuration
 */
export async function startServer(env: NodeJS.ProcessEnv = process.env): Promise<FastifyInstance> {
  const config = loadConfig(env);
  const logger = createLogger({ level: config.logLevel });

  const core = SealedBallot.open({
    dataDir: config.dataDir,
    logger,
    identityTokenTtlHours: config.identityTokenTtlHours,
    ballotTokenTtlMinutes: config.ballotTokenTtlMinutes,
    tallyPageSize: config.tallyPageSize,
  });

  if (config.apiKeys.size === 0) {
    logger.warn('API_KEYS is empty; every authenticated endpoint will reject requests');
  }

  const fastify = await createServer({
    core,
    apiKeys: config.apiKeys,
    rateLimitMax: config.rateLimitMax,
    logger,
  });
  fastify.addHook('onClose', async () => {
    core.close();
  });

  await fastify.listen({ port: config.port, host: config.host });
  return fastify;
}

// Start server if running directly
if (import.meta.url === `file://${process.argv[1]}`) {
  startServer()
    .then((server) => {
      for (const signal of ['SIGINT', 'SIGTERM'] as const) {
        process.once(signal, () => {
          server.log.info({ signal }, 'Shutting down');
          server.close().then(
            () => process.exit(0),
            (err: unknown) => {
              server.log.error({ err }, 'Shutdown failed');
              process.exit(1);
            }
          );
        });
      }
    })
    .catch((err: unknown) => {
      console.error('Failed to start server:', err);
      process.exit(1);
    });
}
