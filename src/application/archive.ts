import type { WorkflowStatus } from '../domain/index.js';

export type RunOutcome = 'succeeded' | 'failed';

/**
 * Sink for retired workflows. Writes are best-effort: the orchestrator
 * logs a rejected `save()` and moves on.
 */
export interface WorkflowArchive {
  save(snapshot: WorkflowStatus, outcome: RunOutcome): Promise<void>;
}
