import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { Logger } from 'pino';
import type { OrchestratorConfig } from '../../application/config.js';
import { MessageBus } from '../../application/message-bus.js';
import { Orchestrator } from '../../application/orchestrator.js';
import type { DecisionPolicy } from '../../domain/index.js';
import { createDbArchive } from '../db/index.js';
import { RedisStreamSource, startBusAuditForwarder, startCollaboratorBridge } from '../redis/index.js';
import type { CollaboratorBridge } from '../redis/index.js';

export interface OrchestratorPluginOptions {
  log: Logger;
  config: OrchestratorConfig;
  /** Requires the `db` plugin to be registered first. */
  archiveEnabled: boolean;
  /** Exchange requests and results with out-of-process collaborators over Redis Pub/Sub. */
  bridgeEnabled: boolean;
  policy?: DecisionPolicy;
}

/**
 * Fastify plugin that owns the message bus and the orchestrator.
 *
 * - Ingests from the `workflow_inputs` stream on a dedicated Redis
 *   connection, since a blocking XREADGROUP holds its connection.
 * - Forwards the bus log to Redis Pub/Sub.
 * - Optionally bridges collaborator requests and results over Redis
 *   Pub/Sub, on another dedicated connection in subscriber mode.
 * - Starts once the server is ready; stops before the connections close.
 * - Decorates `fastify.bus` and `fastify.orchestrator`.
 */
async function orchestratorPlugin(fastify: FastifyInstance, options: OrchestratorPluginOptions): Promise<void> {
  const { log, config } = options;

  const bus = new MessageBus({
    log: log.child({ component: 'bus' }),
    logCapacity: config.busLogCapacity,
    maxQueueDepth: config.busQueueDepth,
  });

  const streamRedis = fastify.redis.duplicate();
  await streamRedis.connect();

  const orchestrator = new Orchestrator({
    bus,
    source: new RedisStreamSource(streamRedis, log.child({ component: 'ingestion' })),
    log: log.child({ component: 'orchestrator' }),
    config,
    policy: options.policy,
    archive: options.archiveEnabled ? createDbArchive(fastify.db) : undefined,
    onFatal: (err) => {
      process.exitCode = 1;
      fastify.close().catch((closeErr: unknown) => {
        log.error({ err: closeErr, cause: err }, 'Shutdown after transport failure failed');
      });
    },
  });

  const stopForwarding = startBusAuditForwarder(fastify.redis, log.child({ component: 'bus-audit' }), bus.audit);

  let bridge: CollaboratorBridge | null = null;
  const bridgeRedis = options.bridgeEnabled ? fastify.redis.duplicate() : null;
  if (bridgeRedis) {
    await bridgeRedis.connect();
    bridge = await startCollaboratorBridge({
      bus,
      publisher: fastify.redis,
      subscriber: bridgeRedis,
      log: log.child({ component: 'collaborator-bridge' }),
    });
  }

  fastify.decorate('bus', bus);
  fastify.decorate('orchestrator', orchestrator);

  fastify.addHook('onReady', async () => {
    orchestrator.start();
  });

  fastify.addHook('preClose', async () => {
    await orchestrator.stop();
    await bridge?.stop();
    await bridgeRedis?.quit();
    stopForwarding();
    await bus.stop();
    await streamRedis.quit();
    fastify.log.info('Orchestrator shut down');
  });
}

export default fp(orchestratorPlugin, {
  name: 'orchestrator',
  dependencies: ['redis'],
  fastify: '5.x',
});

/** Extend Fastify's type system so `fastify.bus` and `fastify.orchestrator` are available everywhere. */
declare module 'fastify' {
  interface FastifyInstance {
    bus: MessageBus;
    orchestrator: Orchestrator;
  }
}
