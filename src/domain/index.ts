export type {
  Priority,
  Stage,
  ChannelName,
  Data,
  StageRequestPayload,
  StageResultPayload,
  CompletionSignalPayload,
  ErrorKind,
  ErrorPayload,
  TimeoutPayload,
  QualityInsightPayload,
  MessagePayloads,
  MessageType,
  Envelope,
  Message,
} from './message.js';
export {
  PRIORITIES,
  PRIORITY_RANK,
  STAGES,
  Channels,
  STAGE_CHANNELS,
  ORCHESTRATOR_ID,
  COLLABORATOR_IDS,
} from './message.js';
export type {
  WorkflowState,
  TransitionTrigger,
  TransitionRule,
  StateTransition,
  PendingRequest,
  WorkflowContext,
  Workflow,
  WorkflowStatus,
} from './workflow.js';
export { WORKFLOW_STATES, TRANSITION_TABLE } from './workflow.js';
export type {
  DecisionPolicy,
  AssessmentDecision,
  EngagementDecision,
  BookingDecision,
  Escalation,
  RouteContext,
  TimeToFailureThresholds,
} from './policies/index.js';
export { createTimeToFailurePolicy, DEFAULT_THRESHOLDS } from './policies/index.js';
