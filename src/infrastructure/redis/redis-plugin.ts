import fp from 'fastify-plugin';
import { Redis } from 'ioredis';
import type { FastifyInstance } from 'fastify';

const MAX_RECONNECT_DELAY_MS = 5000;

/**
 * Fastify plugin owning the shared ioredis connection.
 *
 * This connection serves XADD from the input routes, the health PING and
 * bus audit forwarding. The orchestrator duplicates it for its blocking
 * stream reads, so nothing here may block.
 */
async function redisPlugin(fastify: FastifyInstance): Promise<void> {
  const redisUrl = process.env['REDIS_URL'] ?? 'redis://localhost:6379';

  const redis = new Redis(redisUrl, {
    connectionName: 'workflow-conductor',
    maxRetriesPerRequest: null,   // stream commands must wait out a reconnect
    enableReadyCheck: true,
    lazyConnect: true,
    retryStrategy: (times) => Math.min(times * 200, MAX_RECONNECT_DELAY_MS),
  });

  redis.on('error', (err: Error) => {
    fastify.log.error({ err }, 'Redis connection error');
  });
  redis.on('reconnecting', (delay: number) => {
    fastify.log.warn({ delay_ms: delay }, 'Redis reconnecting');
  });

  await redis.connect();
  fastify.log.info({ connection: 'workflow-conductor' }, 'Redis connected');

  fastify.decorate('redis', redis);

  fastify.addHook('onClose', async () => {
    await redis.quit();
    fastify.log.info('Redis disconnected');
  });
}

export default fp(redisPlugin, {
  name: 'redis',
  fastify: '5.x',
});

declare module 'fastify' {
  interface FastifyInstance {
    redis: Redis;
  }
}
