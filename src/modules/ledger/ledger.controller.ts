import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { AppContext } from '../../context.js';
import { sendLedgerError, sendValidationError, statusForLedgerError, success } from '../../lib/http.js';
import {
  AddBlockBodySchema,
  AttestBodySchema,
  IntegrityQuerySchema,
  RecentBlocksQuerySchema,
  VerifyBodySchema,
} from '../../lib/schemas.js';
import type { SseHub } from '../../lib/sse.js';
import { attestRow } from './ledger.service.js';

/**
 * @fileoverview REST/SSE endpoints for the ledger module.
 */

const HEARTBEAT_INTERVAL_MS = 15000;

export function ledgerRoutes(fastify: FastifyInstance, context: AppContext, hub: SseHub) {
  const { chain } = context;

  fastify.get('/ledger/stream', (request: FastifyRequest, reply: FastifyReply) => {
    reply.sse(
      (async function* source() {
        hub.addClient(reply);
        request.log.info(`Client connected to ledger stream. Total clients: ${hub.clientCount}`);

        const heartbeatInterval = setInterval(() => {
          reply.sse({ event: 'heartbeat', data: new Date().toISOString() });
        }, HEARTBEAT_INTERVAL_MS);

        try {
          for await (const _ of request.raw) {
            // Keep the connection alive
          }
        } catch (e) {
          request.log.error(e, 'SSE connection error');
        } finally {
          hub.removeClient(reply);
          clearInterval(heartbeatInterval);
          request.log.info(`Client disconnected from ledger stream. Total clients: ${hub.clientCount}`);
        }
      })()
    );
  });

  fastify.get('/ledger/blocks', async (request, reply) => {
    const query = RecentBlocksQuerySchema.safeParse(request.query);
    if (!query.success) return sendValidationError(request, reply, query.error);

    const readiness = await chain.ready();
    if (!readiness.ok) return sendLedgerError(request, reply, readiness.error);

    return reply.send(success(chain.getRecentBlocks(query.data.limit)));
  });

  fastify.post('/ledger/blocks', async (request, reply) => {
    const body = AddBlockBodySchema.safeParse(request.body);
    if (!body.success) return sendValidationError(request, reply, body.error);

    const { tableName, recordId, dataHash } = body.data;
    const result = await chain.addBlock(tableName, recordId, dataHash);
    if (!result.ok) return sendLedgerError(request, reply, result.error);

    return reply.code(201).send(success(result.value));
  });

  // Mutation notification: 202 means the row change stands but is not attested yet.
  fastify.post('/ledger/attest', async (request, reply) => {
    const body = AttestBodySchema.safeParse(request.body);
    if (!body.success) return sendValidationError(request, reply, body.error);

    const outcome = await attestRow(chain, body.data, request.log);
    if (outcome.result.ok) {
      return reply.code(201).send(
        success({ dataHash: outcome.dataHash, degraded: outcome.degraded, block: outcome.result.value })
      );
    }

    const error = outcome.result.error;
    if (statusForLedgerError(error) === 400) return sendLedgerError(request, reply, error);

    return reply.code(202).send(
      success({
        dataHash: outcome.dataHash,
        degraded: outcome.degraded,
        block: null,
        error: { code: error.code, message: error.message },
      })
    );
  });

  fastify.post('/ledger/verify', async (request, reply) => {
    const body = VerifyBodySchema.safeParse(request.body);
    if (!body.success) return sendValidationError(request, reply, body.error);

    const readiness = await chain.ready();
    if (!readiness.ok) return sendLedgerError(request, reply, readiness.error);

    const { tableName, recordId, dataHash } = body.data;
    return reply.send(
      success({
        verified: chain.verify(tableName, recordId, dataHash),
        current: chain.isCurrent(tableName, recordId, dataHash),
        latest: chain.latestAttestation(tableName, recordId) ?? null,
      })
    );
  });

  fastify.get('/ledger/integrity', async (request, reply) => {
    const query = IntegrityQuerySchema.safeParse(request.query);
    if (!query.success) return sendValidationError(request, reply, query.error);

    if (query.data.source === 'store') {
      const audit = await chain.auditStore();
      if (!audit.ok) return sendLedgerError(request, reply, audit.error);
      return reply.send(success({ source: 'store', ...audit.value }));
    }

    const readiness = await chain.ready();
    if (!readiness.ok) return sendLedgerError(request, reply, readiness.error);

    return reply.send(success({ source: 'memory', ...chain.validateChainIntegrity() }));
  });

  fastify.get('/ledger/stats', async (_request, reply) => {
    return reply.send(success(chain.stats()));
  });
}
