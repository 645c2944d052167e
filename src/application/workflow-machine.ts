import type {
  TransitionRule,
  TransitionTrigger,
  Workflow,
  WorkflowState,
  WorkflowStatus,
} from '../domain/index.js';
import { TRANSITION_TABLE } from '../domain/index.js';
import { InvalidTransitionError } from './errors.js';

export interface CreateWorkflowOptions {
  entity_id: string;
  correlation_id: string;
  max_retries: number;
  now: number;
}

export function createWorkflow(options: CreateWorkflowOptions): Workflow {
  return {
    entity_id: options.entity_id,
    correlation_id: options.correlation_id,
    max_retries: options.max_retries,
    created_at: options.now,
    state: 'idle',
    context: { inputs: [], results: {}, completion: null, urgency: null },
    retry_count: 0,
    error_count: 0,
    last_update: options.now,
    history: [],
    pending_request: null,
    failure_reason: null,
  };
}

const RULES_BY_KEY: ReadonlyMap<string, TransitionRule> = new Map(
  TRANSITION_TABLE.map((rule): [string, TransitionRule] => [`${rule.from}:${rule.trigger}`, rule]),
);

export function findTransition(from: WorkflowState, trigger: TransitionTrigger): TransitionRule | undefined {
  return RULES_BY_KEY.get(`${from}:${trigger}`);
}

export type TransitionResult =
  | { readonly accepted: true; readonly from: WorkflowState; readonly to: WorkflowState }
  | { readonly accepted: false; readonly error: InvalidTransitionError };

/**
 * Applies `trigger` to `workflow` in place.
 *
 * On acceptance the state changes, one history entry is appended and
 * `last_update` is refreshed. On rejection the workflow is untouched.
 * `retry` is additionally rejected once `retry_count` has reached
 * `max_retries`.
 */
export function applyTransition(
  workflow: Workflow,
  trigger: TransitionTrigger,
  reason: string,
  now: number,
): TransitionResult {
  const rule = findTransition(workflow.state, trigger);
  if (!rule || (trigger === 'retry' && !canRetry(workflow))) {
    return { accepted: false, error: new InvalidTransitionError(workflow.entity_id, workflow.state, trigger) };
  }

  workflow.history.push({
    from: rule.from,
    to: rule.to,
    trigger,
    at: new Date(now).toISOString(),
    reason,
  });
  workflow.state = rule.to;
  workflow.last_update = now;

  return { accepted: true, from: rule.from, to: rule.to };
}

export function isTerminal(state: WorkflowState): boolean {
  return state === 'completed';
}

export function canRetry(workflow: Workflow): boolean {
  return workflow.retry_count < workflow.max_retries;
}

/** Deep-copied, serialisable snapshot of a workflow. */
export function toStatus(workflow: Workflow, live: boolean): WorkflowStatus {
  return {
    entity_id: workflow.entity_id,
    state: workflow.state,
    correlation_id: workflow.correlation_id,
    retry_count: workflow.retry_count,
    max_retries: workflow.max_retries,
    error_count: workflow.error_count,
    history: structuredClone(workflow.history),
    last_update: new Date(workflow.last_update).toISOString(),
    created_at: new Date(workflow.created_at).toISOString(),
    live,
    failure_reason: workflow.failure_reason,
    pending_stage: workflow.pending_request?.stage ?? null,
    context: structuredClone(workflow.context),
  };
}
