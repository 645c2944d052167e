export { workflowArchive } from './schema.js';
export { createDbClient } from './client.js';
export type { Database, SqlClient } from './client.js';
export { insertArchivedRun, findArchivedRuns } from './archive-repository.js';
export type { NewArchivedRun, ArchivedRunRow } from './archive-repository.js';
export { ensureSchema } from './migrate.js';
export { createDbArchive } from './workflow-archive.js';
export { default as dbPlugin } from './db-plugin.js';
