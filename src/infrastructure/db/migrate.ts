import type { SqlClient } from './client.js';

/**
 * Creates the archive table and its indexes if they are missing.
 *
 * drizzle-kit owns real migrations; this only guarantees a fresh local
 * database is usable on first start.
 */
export async function ensureSchema(sql: SqlClient): Promise<void> {
  await sql.unsafe(`
    CREATE TABLE IF NOT EXISTS workflow_archive (
      archive_id      UUID PRIMARY KEY,
      entity_id       VARCHAR(255)  NOT NULL,
      correlation_id  UUID          NOT NULL,
      final_state     VARCHAR(32)   NOT NULL,
      outcome         VARCHAR(16)   NOT NULL,
      failure_reason  TEXT,
      retry_count     INTEGER       NOT NULL,
      error_count     INTEGER       NOT NULL,
      history         JSONB         NOT NULL DEFAULT '[]',
      context         JSONB         NOT NULL DEFAULT '{}',
      started_at      TIMESTAMPTZ   NOT NULL,
      completed_at    TIMESTAMPTZ   NOT NULL,
      archived_at     TIMESTAMPTZ   NOT NULL DEFAULT NOW()
    )
  `);

  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_workflow_archive_entity_id ON workflow_archive (entity_id)`);
  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_workflow_archive_outcome ON workflow_archive (outcome)`);
  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_workflow_archive_completed_at ON workflow_archive (completed_at)`);
}
