import type { RunOutcome, WorkflowArchive } from '../../application/archive.js';
import type { WorkflowStatus } from '../../domain/index.js';
import type { Database } from './client.js';
import { insertArchivedRun } from './archive-repository.js';

/** `WorkflowArchive` backed by the `workflow_archive` table. */
export function createDbArchive(db: Database): WorkflowArchive {
  return {
    async save(snapshot: WorkflowStatus, outcome: RunOutcome): Promise<void> {
      await insertArchivedRun(db, {
        entity_id: snapshot.entity_id,
        correlation_id: snapshot.correlation_id,
        final_state: snapshot.state,
        outcome,
        failure_reason: snapshot.failure_reason,
        retry_count: snapshot.retry_count,
        error_count: snapshot.error_count,
        history: snapshot.history,
        context: snapshot.context,
        started_at: snapshot.created_at,
        completed_at: snapshot.last_update,
      });
    },
  };
}
