export { redisPlugin, enqueueInput, RedisStreamSource, startBusAuditForwarder, startCollaboratorBridge } from './redis/index.js';
export { createDbClient, createDbArchive, ensureSchema, insertArchivedRun, findArchivedRuns, workflowArchive, dbPlugin } from './db/index.js';
export type { Database, SqlClient, ArchivedRunRow, NewArchivedRun } from './db/index.js';
export { InMemoryInputSource } from './ingestion/index.js';
export { orchestratorPlugin } from './runtime/index.js';
export type { OrchestratorPluginOptions } from './runtime/index.js';
