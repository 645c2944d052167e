/**
 * Message envelope and channel vocabulary shared by the bus, the
 * orchestrator and every collaborator.
 *
 * These types carry no framework dependencies.
 */

/** Priority bands, highest first. */
export type Priority = 'critical' | 'high' | 'normal' | 'low';

export const PRIORITIES: readonly Priority[] = ['critical', 'high', 'normal', 'low'];

/** Numeric rank for comparisons; larger is more urgent. */
export const PRIORITY_RANK: Readonly<Record<Priority, number>> = {
  critical: 4,
  high: 3,
  normal: 2,
  low: 1,
};

/** Processing stages performed by collaborators. */
export type Stage = 'analysis' | 'engagement' | 'scheduling' | 'outcome';

export const STAGES: readonly Stage[] = ['analysis', 'engagement', 'scheduling', 'outcome'];

export const Channels = {
  analysisRequest: 'analysis.request',
  analysisResult: 'analysis.result',
  engagementRequest: 'engagement.request',
  engagementResult: 'engagement.result',
  schedulingRequest: 'scheduling.request',
  schedulingResult: 'scheduling.result',
  outcomeRequest: 'outcome.request',
  outcomeResult: 'outcome.result',
  serviceCompletion: 'service.completion',
  systemError: 'system.error',
  systemTimeout: 'system.timeout',
  qualityInsight: 'quality.insight',
} as const;

export type ChannelName = (typeof Channels)[keyof typeof Channels];

/** Request/result channel pair for each stage. */
export const STAGE_CHANNELS: Readonly<Record<Stage, { request: ChannelName; result: ChannelName }>> = {
  analysis: { request: Channels.analysisRequest, result: Channels.analysisResult },
  engagement: { request: Channels.engagementRequest, result: Channels.engagementResult },
  scheduling: { request: Channels.schedulingRequest, result: Channels.schedulingResult },
  outcome: { request: Channels.outcomeRequest, result: Channels.outcomeResult },
};

/** Component identities used as sender/receiver. */
export const ORCHESTRATOR_ID = 'orchestrator';

export const COLLABORATOR_IDS: Readonly<Record<Stage, string>> = {
  analysis: 'analysis-collaborator',
  engagement: 'engagement-collaborator',
  scheduling: 'scheduling-collaborator',
  outcome: 'outcome-collaborator',
};

// ── Payloads ──────────────────────────────────────────────────────────

export type Data = Record<string, unknown>;

export interface StageRequestPayload {
  readonly entity_id: string;
  /** Retry attempt this request belongs to (0 for the first run). */
  readonly attempt: number;
  /** Everything the collaborator needs: merged inputs, earlier stage results. */
  readonly context: Data;
}

/**
 * Result of a stage.
 *
 * `outcome === 'failure'` is a collaborator-reported error and takes the
 * same retry path as a missed deadline.
 */
export type StageResultPayload =
  | { readonly entity_id: string; readonly outcome: 'success'; readonly data: Data }
  | { readonly entity_id: string; readonly outcome: 'failure'; readonly error: string };

export interface CompletionSignalPayload {
  readonly entity_id: string;
  readonly data: Data;
}

export type ErrorKind =
  | 'deadline_expired'
  | 'collaborator_error'
  | 'stale_workflow'
  | 'decision_failed'
  | 'booking_rejected';

export interface ErrorPayload {
  readonly entity_id: string | null;
  readonly kind: ErrorKind | 'collaborator_reported';
  readonly message: string;
  readonly state?: string;
  readonly error_count?: number;
}

export interface TimeoutPayload {
  readonly entity_id: string;
  readonly stage: Stage;
  readonly expired_message_id: string;
  readonly retry_count: number;
}

export interface QualityInsightPayload {
  readonly entity_id: string;
  readonly status: 'succeeded' | 'failed';
  readonly reason: string;
  readonly urgency: Priority | null;
  readonly retry_count: number;
  readonly error_count: number;
  readonly results: Data;
}

/** Closed mapping from message type to payload shape. */
export interface MessagePayloads {
  analysis_request: StageRequestPayload;
  analysis_result: StageResultPayload;
  engagement_request: StageRequestPayload;
  engagement_result: StageResultPayload;
  scheduling_request: StageRequestPayload;
  scheduling_result: StageResultPayload;
  outcome_request: StageRequestPayload;
  outcome_result: StageResultPayload;
  completion_signal: CompletionSignalPayload;
  error: ErrorPayload;
  timeout: TimeoutPayload;
  quality_insight: QualityInsightPayload;
}

export type MessageType = keyof MessagePayloads;

/**
 * Immutable message envelope.
 *
 * `message_id` is unique per message; `correlation_id` is shared by every
 * message belonging to one workflow. `receiver === null` means the message
 * is addressed to the channel rather than a specific component.
 */
export interface Envelope<T extends MessageType> {
  readonly message_id: string;
  readonly correlation_id: string;
  readonly created_at: string; // ISO-8601
  readonly sender: string;
  readonly receiver: string | null;
  readonly type: T;
  readonly priority: Priority;
  readonly reply_to: string | null;
  readonly ttl_ms: number;
  readonly payload: MessagePayloads[T];
}

/** Tagged union over every message type. */
export type Message = { [T in MessageType]: Envelope<T> }[MessageType];
