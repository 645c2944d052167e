import { drizzle } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import * as schema from './schema.js';

export interface DbClientOptions {
  /** Pool size; archive writes are occasional. */
  maxConnections?: number;
  /** Reported as `application_name` in pg_stat_activity. */
  applicationName?: string;
}

/**
 * Opens the archive database.
 *
 * `sql` is the raw postgres.js pool, used for the schema bootstrap and
 * shutdown; `db` is the typed Drizzle handle the repositories query through.
 */
export function createDbClient(databaseUrl: string, options: DbClientOptions = {}) {
  const sql = postgres(databaseUrl, {
    max: options.maxConnections ?? 5,
    idle_timeout: 20,
    connect_timeout: 10,
    // CREATE TABLE IF NOT EXISTS raises a notice on every boot
    onnotice: () => undefined,
    connection: {
      application_name: options.applicationName ?? 'workflow-conductor',
    },
  });

  const db = drizzle(sql, { schema });

  return { sql, db };
}

export type Database = ReturnType<typeof createDbClient>['db'];
export type SqlClient = ReturnType<typeof createDbClient>['sql'];
