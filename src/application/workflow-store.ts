import type { Workflow, WorkflowState, WorkflowStatus } from '../domain/index.js';
import { toStatus } from './workflow-machine.js';

export const DEFAULT_RETIRED_CAPACITY = 1000;

/**
 * Live workflows keyed by entity id, plus a bounded set of retired
 * terminal snapshots.
 *
 * All methods are synchronous, so an insert or removal is never observed
 * half-done by another duty.
 */
export class WorkflowStore {
  private readonly live: Map<string, Workflow> = new Map();
  private readonly retired: Map<string, WorkflowStatus> = new Map();
  private readonly retiredCapacity: number;
  private retiredTotal = 0;

  constructor(retiredCapacity: number = DEFAULT_RETIRED_CAPACITY) {
    this.retiredCapacity = retiredCapacity;
  }

  get(entityId: string): Workflow | undefined {
    return this.live.get(entityId);
  }

  /** Inserts a new live workflow. Throws if one already exists for the entity. */
  add(workflow: Workflow): void {
    if (this.live.has(workflow.entity_id)) {
      throw new Error(`Live workflow already exists for ${workflow.entity_id}`);
    }
    this.live.set(workflow.entity_id, workflow);
  }

  /**
   * Moves a workflow out of the live set and keeps its terminal snapshot.
   * A later workflow for the same entity replaces the snapshot once it
   * retires in turn.
   */
  retire(workflow: Workflow): WorkflowStatus {
    this.live.delete(workflow.entity_id);

    const snapshot = toStatus(workflow, false);
    this.retired.delete(workflow.entity_id);
    this.retired.set(workflow.entity_id, snapshot);
    this.retiredTotal++;

    while (this.retired.size > this.retiredCapacity) {
      const oldest = this.retired.keys().next();
      if (oldest.done === true) break;
      this.retired.delete(oldest.value);
    }

    return snapshot;
  }

  /** Live snapshot if the entity is active, otherwise its last retired one. */
  status(entityId: string): WorkflowStatus | null {
    const workflow = this.live.get(entityId);
    if (workflow) return toStatus(workflow, true);

    const snapshot = this.retired.get(entityId);
    return snapshot ? structuredClone(snapshot) : null;
  }

  liveWorkflows(): Workflow[] {
    return [...this.live.values()];
  }

  get liveCount(): number {
    return this.live.size;
  }

  get retiredCount(): number {
    return this.retiredTotal;
  }

  countByState(): Record<WorkflowState, number> {
    const counts: Record<WorkflowState, number> = {
      idle: 0,
      ingesting: 0,
      analyzing: 0,
      assessing: 0,
      engaging: 0,
      scheduling: 0,
      awaiting_external: 0,
      collecting_outcome: 0,
      completed: 0,
      error: 0,
    };
    for (const workflow of this.live.values()) {
      counts[workflow.state]++;
    }
    return counts;
  }
}
