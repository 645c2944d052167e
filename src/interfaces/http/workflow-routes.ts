import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { completionRequestSchema, listArchivedRuns, signalCompletion } from '../../application/index.js';
import { safeInt } from './query-params.js';

/**
 * Workflow status routes.
 *
 * GET  /api/v1/workflows/stats                  orchestrator statistics
 * GET  /api/v1/workflows/:entity_id             live or retired status
 * GET  /api/v1/workflows/:entity_id/archive     archived runs (needs the db plugin)
 * POST /api/v1/workflows/:entity_id/completion  external completion signal
 */
async function workflowRoutes(fastify: FastifyInstance): Promise<void> {

  fastify.get(
    '/api/v1/workflows/stats',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      return reply.status(200).send(fastify.orchestrator.getStatistics());
    },
  );

  fastify.get(
    '/api/v1/workflows/:entity_id',
    async (
      request: FastifyRequest<{ Params: { entity_id: string } }>,
      reply: FastifyReply,
    ) => {
      const status = fastify.orchestrator.getWorkflowStatus(request.params.entity_id);

      if (status === null) {
        return reply.status(404).send({ error: 'Workflow not found' });
      }

      return reply.status(200).send(status);
    },
  );

  /**
   * Query params: limit (1 to 100, default 20)
   */
  fastify.get(
    '/api/v1/workflows/:entity_id/archive',
    async (
      request: FastifyRequest<{
        Params: { entity_id: string };
        Querystring: { limit?: string };
      }>,
      reply: FastifyReply,
    ) => {
      const limit = safeInt(request.query.limit);
      if (limit !== undefined && Number.isNaN(limit)) {
        return reply.status(400).send({ error: 'limit must be an integer' });
      }

      if (!fastify.hasDecorator('db')) {
        return reply.status(503).send({ error: 'Workflow archive is not enabled' });
      }

      const result = await listArchivedRuns(fastify.db, request.params.entity_id, { limit });
      return reply.status(200).send(result);
    },
  );

  /**
   * Reports that the external service finished. Only a live workflow in
   * `awaiting_external` accepts it; `correlation_id` defaults to the
   * workflow's own and must match it when given.
   */
  fastify.post(
    '/api/v1/workflows/:entity_id/completion',
    async (
      request: FastifyRequest<{ Params: { entity_id: string } }>,
      reply: FastifyReply,
    ) => {
      const parsed = completionRequestSchema.safeParse(request.body);

      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Validation failed',
          issues: parsed.error.issues,
        });
      }

      const entityId = request.params.entity_id;
      const status = fastify.orchestrator.getWorkflowStatus(entityId);

      if (status === null || !status.live) {
        return reply.status(404).send({ error: 'No live workflow for entity' });
      }
      if (status.state !== 'awaiting_external') {
        return reply.status(409).send({ error: 'Workflow is not awaiting completion', state: status.state });
      }

      const correlationId = parsed.data.correlation_id ?? status.correlation_id;
      if (correlationId !== status.correlation_id) {
        return reply.status(409).send({ error: 'Correlation id does not match the live workflow' });
      }

      const published = signalCompletion(fastify.bus, {
        entity_id: entityId,
        correlation_id: correlationId,
        data: parsed.data.data,
        sender: 'http',
      });
      if (!published) {
        return reply.status(503).send({ error: 'Message bus unavailable' });
      }

      return reply.status(202).send({ status: 'accepted', entity_id: entityId, correlation_id: correlationId });
    },
  );
}

export default fp(workflowRoutes, {
  name: 'workflow-routes',
  dependencies: ['orchestrator'],
  fastify: '5.x',
});
