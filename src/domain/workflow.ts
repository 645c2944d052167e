import type { Data, Priority, Stage } from './message.js';

/**
 * Workflow states.
 *
 * `completed` is terminal. `error` is left either towards `idle` (retry)
 * or towards `completed` (retries exhausted) in the same critical section
 * that entered it. `ingesting` is part of the vocabulary but nothing in
 * the transition table enters it.
 */
export type WorkflowState =
  | 'idle'
  | 'ingesting'
  | 'analyzing'
  | 'assessing'
  | 'engaging'
  | 'scheduling'
  | 'awaiting_external'
  | 'collecting_outcome'
  | 'completed'
  | 'error';

export const WORKFLOW_STATES: readonly WorkflowState[] = [
  'idle',
  'ingesting',
  'analyzing',
  'assessing',
  'engaging',
  'scheduling',
  'awaiting_external',
  'collecting_outcome',
  'completed',
  'error',
];

export type TransitionTrigger =
  | 'input_received'
  | 'analysis_completed'
  | 'engagement_required'
  | 'no_action_required'
  | 'engagement_accepted'
  | 'engagement_declined'
  | 'booking_confirmed'
  | 'external_completed'
  | 'outcome_recorded'
  | 'failure'
  | 'retry'
  | 'retries_exhausted';

export interface TransitionRule {
  readonly from: WorkflowState;
  readonly trigger: TransitionTrigger;
  readonly to: WorkflowState;
}

const FAILURE_SOURCES: readonly WorkflowState[] = [
  'idle',
  'ingesting',
  'analyzing',
  'assessing',
  'engaging',
  'scheduling',
  'awaiting_external',
  'collecting_outcome',
];

/** The only transitions a workflow may ever take. */
export const TRANSITION_TABLE: readonly TransitionRule[] = [
  { from: 'idle', trigger: 'input_received', to: 'analyzing' },
  { from: 'analyzing', trigger: 'analysis_completed', to: 'assessing' },
  { from: 'assessing', trigger: 'engagement_required', to: 'engaging' },
  { from: 'assessing', trigger: 'no_action_required', to: 'completed' },
  { from: 'engaging', trigger: 'engagement_accepted', to: 'scheduling' },
  { from: 'engaging', trigger: 'engagement_declined', to: 'completed' },
  { from: 'scheduling', trigger: 'booking_confirmed', to: 'awaiting_external' },
  { from: 'awaiting_external', trigger: 'external_completed', to: 'collecting_outcome' },
  { from: 'collecting_outcome', trigger: 'outcome_recorded', to: 'completed' },
  ...FAILURE_SOURCES.map((from): TransitionRule => ({ from, trigger: 'failure', to: 'error' })),
  { from: 'error', trigger: 'retry', to: 'idle' },
  { from: 'error', trigger: 'retries_exhausted', to: 'completed' },
];

/** One accepted transition, appended to the workflow history. */
export interface StateTransition {
  readonly from: WorkflowState;
  readonly to: WorkflowState;
  readonly trigger: TransitionTrigger;
  readonly at: string; // ISO-8601
  readonly reason: string;
}

/** The single request a workflow is waiting on. */
export interface PendingRequest {
  readonly message_id: string;
  readonly stage: Stage;
  readonly channel: string;
  readonly issued_at: number;
  readonly deadline: number;
}

export interface WorkflowContext {
  /** Every input ingested for the entity since the workflow was created. */
  inputs: Data[];
  /** Stage results keyed by stage name. */
  results: Partial<Record<Stage, Data>>;
  /** External completion signal, once received. */
  completion: Data | null;
  /** Priority chosen by the assessment policy, if engagement was required. */
  urgency: Priority | null;
}

/**
 * Tracked unit of work for one entity.
 *
 * Mutated exclusively by the orchestrator inside the entity's serialized
 * section. `last_update` is epoch milliseconds.
 */
export interface Workflow {
  readonly entity_id: string;
  readonly correlation_id: string;
  readonly max_retries: number;
  readonly created_at: number;
  state: WorkflowState;
  context: WorkflowContext;
  retry_count: number;
  error_count: number;
  last_update: number;
  history: StateTransition[];
  pending_request: PendingRequest | null;
  failure_reason: string | null;
}

/** Read-only snapshot returned by the status query surface. */
export interface WorkflowStatus {
  readonly entity_id: string;
  readonly state: WorkflowState;
  readonly correlation_id: string;
  readonly retry_count: number;
  readonly max_retries: number;
  readonly error_count: number;
  readonly history: readonly StateTransition[];
  readonly last_update: string; // ISO-8601
  readonly created_at: string; // ISO-8601
  readonly live: boolean;
  readonly failure_reason: string | null;
  readonly pending_stage: Stage | null;
  readonly context: WorkflowContext;
}
