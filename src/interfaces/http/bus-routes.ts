import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { INBOUND_CHANNELS, isInboundChannel, parseInboundMessage } from '../../application/index.js';
import { safeInt } from './query-params.js';

const DEFAULT_LOG_LIMIT = 100;
const MAX_LOG_LIMIT = 1000;

/**
 * Message bus monitoring routes.
 *
 * GET  /api/v1/bus/stats            per-channel subscribers, queue depth, totals
 * GET  /api/v1/bus/log              most recent log entries, oldest first
 * POST /api/v1/bus/:channel/publish  result or completion from an external collaborator
 */
async function busRoutes(fastify: FastifyInstance): Promise<void> {

  fastify.get(
    '/api/v1/bus/stats',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      return reply.status(200).send(fastify.bus.stats());
    },
  );

  /**
   * Query params: limit (1 to 1000, default 100)
   */
  fastify.get(
    '/api/v1/bus/log',
    async (
      request: FastifyRequest<{ Querystring: { limit?: string } }>,
      reply: FastifyReply,
    ) => {
      const requested = safeInt(request.query.limit);
      if (requested !== undefined && Number.isNaN(requested)) {
        return reply.status(400).send({ error: 'limit must be an integer' });
      }

      const limit = Math.min(Math.max(requested ?? DEFAULT_LOG_LIMIT, 1), MAX_LOG_LIMIT);
      const data = fastify.bus.audit.recent(limit);

      return reply.status(200).send({
        data,
        total_logged: fastify.bus.audit.totalLogged,
        pagination: { limit, count: data.length },
      });
    },
  );

  fastify.post(
    '/api/v1/bus/:channel/publish',
    async (
      request: FastifyRequest<{ Params: { channel: string } }>,
      reply: FastifyReply,
    ) => {
      const { channel } = request.params;
      if (!isInboundChannel(channel)) {
        return reply.status(400).send({ error: 'Channel does not accept external messages', accepted: INBOUND_CHANNELS });
      }

      const parsed = parseInboundMessage(request.body);
      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Validation failed',
          issues: parsed.error.issues,
        });
      }

      if (!fastify.bus.publish(channel, parsed.message)) {
        return reply.status(503).send({ error: 'Message bus unavailable' });
      }

      return reply.status(202).send({ status: 'accepted', channel, message_id: parsed.message.message_id });
    },
  );
}

export default fp(busRoutes, {
  name: 'bus-routes',
  dependencies: ['orchestrator'],
  fastify: '5.x',
});
