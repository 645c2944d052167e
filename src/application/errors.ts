import type { Stage, WorkflowState, TransitionTrigger } from '../domain/index.js';

/**
 * Error taxonomy of the orchestration core.
 *
 * Only `TransportError` is fatal to the process. Everything else is
 * contained to a single workflow or a single polling cycle.
 */
export abstract class OrchestrationError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

/** The bus refused a publish; no further progress is possible. */
export class TransportError extends OrchestrationError {
  readonly code = 'TRANSPORT_UNAVAILABLE' as const;
  readonly channel: string;

  constructor(channel: string) {
    super(`Message bus unavailable: publish to "${channel}" rejected`);
    this.channel = channel;
  }
}

/** A collaborator did not answer before the request's deadline. */
export class DeadlineExpiredError extends OrchestrationError {
  readonly code = 'DEADLINE_EXPIRED' as const;
  readonly stage: Stage;
  readonly messageId: string;

  constructor(stage: Stage, messageId: string) {
    super(`Deadline expired for ${stage} request ${messageId}`);
    this.stage = stage;
    this.messageId = messageId;
  }
}

/** A trigger that the transition table does not allow from the current state. */
export class InvalidTransitionError extends OrchestrationError {
  readonly code = 'INVALID_TRANSITION' as const;
  readonly from: WorkflowState;
  readonly trigger: TransitionTrigger;

  constructor(entityId: string, from: WorkflowState, trigger: TransitionTrigger) {
    super(`Workflow ${entityId}: trigger "${trigger}" is not allowed from state "${from}"`);
    this.from = from;
    this.trigger = trigger;
  }
}

/** Polling the ingestion source failed. */
export class IngestionSourceError extends OrchestrationError {
  readonly code = 'INGESTION_SOURCE_FAILED' as const;

  constructor(message: string, cause?: unknown) {
    super(message, { cause });
  }
}

/** A collaborator answered with an explicit failure. */
export class CollaboratorError extends OrchestrationError {
  readonly code = 'COLLABORATOR_FAILED' as const;
  readonly stage: Stage;

  constructor(stage: Stage, message: string) {
    super(`${stage} collaborator reported: ${message}`);
    this.stage = stage;
  }
}

/** Environment configuration did not validate. */
export class ConfigError extends OrchestrationError {
  readonly code = 'INVALID_CONFIG' as const;
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.issues = issues;
  }
}
