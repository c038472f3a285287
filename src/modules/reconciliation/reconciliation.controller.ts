import type { FastifyInstance } from 'fastify';
import type { AppContext } from '../../context.js';
import { apiError, sendValidationError, success } from '../../lib/http.js';
import { SyncBodySchema, SyncRunsQuerySchema } from '../../lib/schemas.js';

/**
 * @fileoverview REST endpoints for the reconciliation module.
 */

/**
 * Registers the reconciliation routes.
 */
export function reconciliationRoutes(fastify: FastifyInstance, context: AppContext) {
  const { reconciler, trackedTables } = context;

  fastify.post('/reconciliation/sync', async (request, reply) => {
    const body = SyncBodySchema.safeParse(request.body ?? {});
    if (!body.success) return sendValidationError(request, reply, body.error);

    const requested = body.data.tables;
    let tables = trackedTables;
    if (requested) {
      const unknown = requested.filter((name) => !trackedTables.some((table) => table.name === name));
      if (unknown.length > 0) {
        return reply
          .code(404)
          .send(apiError(request, `Unknown tracked table: ${unknown.join(', ')}`, 'UNKNOWN_TRACKED_TABLE', { unknown }));
      }
      tables = trackedTables.filter((table) => requested.includes(table.name));
    }

    // Only full runs are deduplicated.
    const summary = requested ? await reconciler.sync(tables) : await reconciler.syncOnce(tables);
    return reply.send(success(summary));
  });

  fastify.get('/reconciliation/runs', async (request, reply) => {
    const query = SyncRunsQuerySchema.safeParse(request.query);
    if (!query.success) return sendValidationError(request, reply, query.error);

    return reply.send(reconciler.listRuns(query.data));
  });
}
