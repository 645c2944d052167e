import { fastify as createServer } from 'fastify';
import { pino } from 'pino';

import { loadOrchestratorConfig } from './application/index.js';
import {
  redisPlugin,
  dbPlugin,
  orchestratorPlugin,
} from './infrastructure/index.js';
import {
  inputRoutes,
  workflowRoutes,
  busRoutes,
} from './interfaces/http/index.js';

/**
 * Bootstrap the orchestrator service.
 *
 * Order:
 * 1) Configuration (fails fast on invalid values)
 * 2) Infrastructure plugins
 * 3) Orchestrator
 * 4) HTTP routes
 * 5) listen(); the orchestrator starts once the server is ready
 */
async function main(): Promise<void> {
  const level = process.env['LOG_LEVEL'] ?? 'info';
  const log = pino({ level });
  const config = loadOrchestratorConfig();
  const archiveEnabled = process.env['ARCHIVE_ENABLED'] !== 'false';
  const bridgeEnabled = process.env['COLLABORATOR_BRIDGE_ENABLED'] !== 'false';

  const fastify = createServer({
    logger: { level },
  });

  // --------------------------------------------------
  // Infrastructure
  // --------------------------------------------------

  await fastify.register(redisPlugin);
  if (archiveEnabled) {
    await fastify.register(dbPlugin);
  }

  await fastify.register(orchestratorPlugin, { log, config, archiveEnabled, bridgeEnabled });

  // --------------------------------------------------
  // HTTP Interface
  // --------------------------------------------------

  await fastify.register(inputRoutes);
  await fastify.register(workflowRoutes);
  await fastify.register(busRoutes);

  // --------------------------------------------------
  // Shutdown
  // --------------------------------------------------

  const shutdown = (signal: string): void => {
    fastify.log.info({ signal }, 'Shutting down');
    fastify.close().catch((err: unknown) => {
      fastify.log.error({ err }, 'Shutdown failed');
      process.exitCode = 1;
    });
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  // --------------------------------------------------
  // Start Server
  // --------------------------------------------------

  const host = process.env['HOST'] ?? '0.0.0.0';
  const port = Number(process.env['PORT'] ?? 3000);

  await fastify.listen({
    host,
    port,
  });

  log.info({ config, archiveEnabled, bridgeEnabled }, 'Orchestrator configuration loaded');
}

main().catch((err: unknown) => {
  console.error('Fatal: failed to start server', err);
  process.exit(1);
});
