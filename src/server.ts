import { randomUUID } from 'node:crypto';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import Fastify, { type FastifyServerOptions } from 'fastify';
import { FastifySSEPlugin } from 'fastify-sse-v2';
import { getConfig } from './config/validation.js';
import { type AppContext, type AppContextOverrides, createAppContext } from './context.js';
import { apiError } from './lib/http.js';
import { SseHub } from './lib/sse.js';
import { ledgerRoutes } from './modules/ledger/ledger.controller.js';
import { reconciliationRoutes } from './modules/reconciliation/reconciliation.controller.js';
import type { HealthCheck } from './types.js';

const API_VERSION = '1.0.0';

function loggerOptions(): FastifyServerOptions['logger'] {
  const level = process.env.LOG_LEVEL || 'info';
  if (process.env.NODE_ENV === 'test') {
    return { level: 'silent' };
  }
  if (process.env.NODE_ENV === 'production') {
    // Production: structured JSON logs
    return { level };
  }
  // Development: pretty-printed logs
  return {
    level,
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss Z',
        ignore: 'pid,hostname',
      },
    },
  };
}

/**
 * Create a new Fastify server instance with all routes and middleware configured.
 * This factory pattern enables proper test isolation by creating separate instances.
 *
 * @param options.context - Ledger services to serve; the caller keeps ownership and closes it
 * @param options.overrides - Collaborators for a context the server creates and owns
 */
export async function createServer(options?: { context?: AppContext; overrides?: AppContextOverrides }) {
  const fastify = Fastify({
    logger: loggerOptions(),
    genReqId: () => randomUUID(),
  });

  // Security middleware
  await fastify.register(helmet, {
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'self'"],
        styleSrc: ["'self'", "'unsafe-inline'"],
        scriptSrc: ["'self'"],
        imgSrc: ["'self'", 'data:', 'https:'],
      },
    },
  });

  // CORS middleware
  await fastify.register(cors, {
    origin: true,
    methods: ['GET', 'POST', 'OPTIONS'],
  });

  await fastify.register(FastifySSEPlugin);

  // Request lifecycle logging - track performance and requests
  const SLOW_REQUEST_THRESHOLD = 1000; // ms

  fastify.addHook('onRequest', async (request, _reply) => {
    request.log.info(
      {
        requestId: request.id,
        method: request.method,
        url: request.url,
      },
      'Incoming request'
    );
  });

  fastify.addHook('onResponse', async (request, reply) => {
    const duration = reply.elapsedTime;
    const logLevel = duration > SLOW_REQUEST_THRESHOLD ? 'warn' : 'info';

    request.log[logLevel](
      {
        requestId: request.id,
        method: request.method,
        url: request.url,
        statusCode: reply.statusCode,
        duration: `${duration.toFixed(2)}ms`,
      },
      duration > SLOW_REQUEST_THRESHOLD ? 'Slow request detected' : 'Request completed'
    );
  });

  // Ledger services
  const ownsContext = !options?.context;
  const context = options?.context ?? createAppContext(getConfig(), fastify.log, options?.overrides);
  const { chain, reconciler } = context;

  const readiness = await chain.ready();
  if (!readiness.ok) {
    fastify.log.warn({ err: readiness.error }, 'Ledger not loaded at startup; will retry on first use');
  }

  const hub = new SseHub();
  const unsubscribers = [
    chain.onBlock((block) => hub.broadcast('ledger.block', block)),
    reconciler.onSync((summary) => hub.broadcast('reconciliation.update', summary)),
  ];

  if (context.config.SYNC_INTERVAL_MS > 0) {
    reconciler.startPolling(context.trackedTables, context.config.SYNC_INTERVAL_MS);
  }

  fastify.addHook('onClose', async () => {
    unsubscribers.forEach((unsubscribe) => unsubscribe());
    reconciler.stopPolling();
    if (ownsContext) {
      context.close();
    }
  });

  // Health check endpoint
  fastify.get<{ Reply: HealthCheck }>('/health', async (request, reply) => {
    let database = false;
    try {
      context.db.prepare('SELECT 1').get();
      database = true;
    } catch (error) {
      request.log.warn({ err: error }, 'Database health probe failed');
    }

    const stats = chain.stats();
    const healthCheck: HealthCheck = {
      status: database ? 'healthy' : 'unhealthy',
      uptime: process.uptime(),
      version: API_VERSION,
      timestamp: new Date().toISOString(),
      checks: {
        database,
        ledger: stats.state,
        blocks: stats.length,
      },
    };

    return reply.code(database ? 200 : 503).send(healthCheck);
  });

  // API Info endpoint
  fastify.get('/info', async (_request, reply) => {
    return reply.send({
      name: 'Hospital Ledger API',
      version: API_VERSION,
      description: 'Hash-chained integrity ledger for hospital records',
      framework: 'Fastify',
      node_version: process.version,
      uptime: process.uptime(),
      tracked_tables: context.trackedTables.map((table) => table.name),
      endpoints: [
        'GET /health - Health check',
        'GET /info - API information',
        'GET /ledger/blocks - Most recent blocks',
        'POST /ledger/blocks - Append a block',
        'POST /ledger/attest - Attest a row mutation',
        'POST /ledger/verify - Verify a record hash',
        'GET /ledger/integrity - Validate the chain',
        'GET /ledger/stats - Chain statistics',
        'GET /ledger/stream - Server-sent ledger events',
        'POST /reconciliation/sync - Attest unattested rows of tracked tables',
        'GET /reconciliation/runs - Reconciliation history',
      ],
      timestamp: new Date().toISOString(),
    });
  });

  ledgerRoutes(fastify, context, hub);
  reconciliationRoutes(fastify, context);

  // 404 handler
  fastify.setNotFoundHandler((request, reply) => {
    return reply.code(404).send(apiError(request, 'Endpoint not found', 'NOT_FOUND'));
  });

  // Global error handler
  fastify.setErrorHandler((error, request, reply) => {
    const statusCode = error.statusCode && error.statusCode < 500 ? error.statusCode : 500;
    if (statusCode >= 500) {
      request.log.error({ err: error, requestId: request.id }, 'Unhandled error');
    } else {
      request.log.warn({ err: error, requestId: request.id }, 'Request rejected');
    }

    const message = statusCode >= 500 ? 'Internal server error' : error.message;
    const code = statusCode >= 500 ? 'INTERNAL_ERROR' : error.code || 'BAD_REQUEST';
    return reply.code(statusCode).send(apiError(request, message, code));
  });

  return fastify;
}
