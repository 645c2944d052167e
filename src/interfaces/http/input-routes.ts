import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { inputSchema, inputBatchSchema } from '../../application/index.js';
import { enqueueInput } from '../../infrastructure/index.js';

/**
 * Registers the input ingestion routes.
 *
 * POST /api/v1/inputs         single input
 * POST /api/v1/inputs/batch   batch of inputs
 * GET  /api/v1/health         Redis connectivity + orchestrator status
 *
 * Inputs are appended to the `workflow_inputs` stream; the orchestrator
 * picks them up on its next ingestion cycle.
 */
async function inputRoutes(fastify: FastifyInstance): Promise<void> {

  fastify.post(
    '/api/v1/inputs',
    async (request: FastifyRequest, reply: FastifyReply) => {
      const parsed = inputSchema.safeParse(request.body);

      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Validation failed',
          issues: parsed.error.issues,
        });
      }

      try {
        const entryId = await enqueueInput(fastify.redis, parsed.data);
        return reply.status(202).send({
          status: 'accepted',
          entity_id: parsed.data.entity_id,
          entry_id: entryId,
        });
      } catch (err: unknown) {
        fastify.log.error({ err, entity_id: parsed.data.entity_id }, 'Failed to enqueue input');
        return reply.status(503).send({ error: 'Input stream unavailable' });
      }
    },
  );

  /**
   * Batch ingestion. The whole array is validated up-front; one invalid
   * input rejects the batch.
   */
  fastify.post(
    '/api/v1/inputs/batch',
    async (request: FastifyRequest, reply: FastifyReply) => {
      const parsed = inputBatchSchema.safeParse(request.body);

      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Validation failed',
          issues: parsed.error.issues,
        });
      }

      try {
        const entryIds = await Promise.all(
          parsed.data.map((input) => enqueueInput(fastify.redis, input)),
        );
        return reply.status(202).send({
          status: 'accepted',
          count: entryIds.length,
          entry_ids: entryIds,
        });
      } catch (err: unknown) {
        fastify.log.error({ err, count: parsed.data.length }, 'Failed to enqueue input batch');
        return reply.status(503).send({ error: 'Input stream unavailable' });
      }
    },
  );

  fastify.get(
    '/api/v1/health',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const orchestrator = fastify.orchestrator.running ? 'running' : 'stopped';

      try {
        const pong = await fastify.redis.ping();
        const status = orchestrator === 'running' ? 'ok' : 'degraded';
        return reply.status(200).send({ status, redis: pong, orchestrator });
      } catch (err: unknown) {
        fastify.log.error({ err }, 'Redis health check failed');
        return reply.status(503).send({ status: 'degraded', redis: 'unreachable', orchestrator });
      }
    },
  );
}

export default fp(inputRoutes, {
  name: 'input-routes',
  dependencies: ['redis', 'orchestrator'],
  fastify: '5.x',
});
