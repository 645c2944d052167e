import { randomUUID } from 'node:crypto';
import { desc, eq } from 'drizzle-orm';
import type { Database } from './client.js';
import { workflowArchive } from './schema.js';

export interface NewArchivedRun {
  entity_id: string;
  correlation_id: string;
  final_state: string;
  outcome: string;
  failure_reason: string | null;
  retry_count: number;
  error_count: number;
  history: unknown;
  context: unknown;
  started_at: string;
  completed_at: string;
}

export type ArchivedRunRow = typeof workflowArchive.$inferSelect;

/**
 * Inserts one retired run and returns its generated `archive_id`.
 */
export async function insertArchivedRun(db: Database, run: NewArchivedRun): Promise<string> {
  const archiveId = randomUUID();

  await db.insert(workflowArchive).values({
    archive_id: archiveId,
    entity_id: run.entity_id,
    correlation_id: run.correlation_id,
    final_state: run.final_state,
    outcome: run.outcome,
    failure_reason: run.failure_reason,
    retry_count: run.retry_count,
    error_count: run.error_count,
    history: run.history,
    context: run.context,
    started_at: new Date(run.started_at),
    completed_at: new Date(run.completed_at),
  });

  return archiveId;
}

/**
 * Archived runs of one entity, newest first.
 */
export async function findArchivedRuns(
  db: Database,
  entityId: string,
  limit: number,
): Promise<ArchivedRunRow[]> {
  return db
    .select()
    .from(workflowArchive)
    .where(eq(workflowArchive.entity_id, entityId))
    .orderBy(desc(workflowArchive.completed_at))
    .limit(limit);
}
