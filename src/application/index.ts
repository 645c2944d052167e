export { MessageBus, DEFAULT_QUEUE_DEPTH } from './message-bus.js';
export type { MessageHandler, Subscription, MessageBusOptions, BusStats, ChannelStats } from './message-bus.js';
export { BusLog, DEFAULT_LOG_CAPACITY } from './bus-log.js';
export type { BusLogAction, BusLogEntry, BusLogListener } from './bus-log.js';
export { DeliveryQueue } from './delivery-queue.js';
export { createMessage, createStageRequest, createStageResult, stageOfRequest, stageOfResult, DEFAULT_TTL_MS } from './message-factory.js';
export type { MessageFields } from './message-factory.js';
export { TimeoutManager } from './timeout-manager.js';
export type { DeadlineHandle, DeadlineOutcome, ExpiryCallback, TimeoutManagerOptions } from './timeout-manager.js';
export { computeBackoff, classifyEscalation, DEFAULT_RETRY_POLICY } from './retry-policy.js';
export type { RetryPolicy } from './retry-policy.js';
export { createWorkflow, findTransition, applyTransition, isTerminal, canRetry, toStatus } from './workflow-machine.js';
export type { TransitionResult, CreateWorkflowOptions } from './workflow-machine.js';
export { WorkflowStore, DEFAULT_RETIRED_CAPACITY } from './workflow-store.js';
export { KeyedSerializer } from './keyed-serializer.js';
export { Orchestrator } from './orchestrator.js';
export type { OrchestratorDeps, OrchestratorStatistics } from './orchestrator.js';
export { startCollaborator, signalCompletion } from './collaborator.js';
export type { CollaboratorReply, CollaboratorHandler, CollaboratorOptions, CollaboratorHandle, StageRequest } from './collaborator.js';
export { inputSchema, inputBatchSchema, formatIssues } from './input-schema.js';
export type { WorkflowInput } from './input-schema.js';
export {
  INBOUND_CHANNELS,
  isInboundChannel,
  inboundMessageSchema,
  parseInboundMessage,
  completionRequestSchema,
} from './message-schema.js';
export type { InboundParseResult } from './message-schema.js';
export type { IngestionSource, IngestedRecord } from './ingestion.js';
export type { WorkflowArchive, RunOutcome } from './archive.js';
export { loadOrchestratorConfig, DEFAULT_ORCHESTRATOR_CONFIG } from './config.js';
export type { OrchestratorConfig } from './config.js';
export {
  OrchestrationError,
  TransportError,
  DeadlineExpiredError,
  InvalidTransitionError,
  IngestionSourceError,
  CollaboratorError,
  ConfigError,
} from './errors.js';
export { listArchivedRuns } from './archived-runs.js';
export type { ListArchivedRunsParams } from './archived-runs.js';
