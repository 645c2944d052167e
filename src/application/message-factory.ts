import { randomUUID } from 'node:crypto';
import type {
  Envelope,
  Message,
  MessagePayloads,
  MessageType,
  Priority,
  Stage,
  StageRequestPayload,
  StageResultPayload,
} from '../domain/index.js';

export const DEFAULT_TTL_MS = 300_000;

export interface MessageFields<T extends MessageType> {
  type: T;
  payload: MessagePayloads[T];
  sender: string;
  correlation_id: string;
  receiver?: string | null;
  priority?: Priority;
  reply_to?: string | null;
  ttl_ms?: number;
  /** Creation time in epoch ms, defaults to `Date.now()`. */
  now?: number;
}

/**
 * Builds a message envelope with a fresh `message_id`.
 * Envelopes are frozen so no consumer can mutate a shared copy.
 */
export function createMessage<T extends MessageType>(fields: MessageFields<T>): Envelope<T> {
  return Object.freeze({
    message_id: randomUUID(),
    correlation_id: fields.correlation_id,
    created_at: new Date(fields.now ?? Date.now()).toISOString(),
    sender: fields.sender,
    receiver: fields.receiver ?? null,
    type: fields.type,
    priority: fields.priority ?? 'normal',
    reply_to: fields.reply_to ?? null,
    ttl_ms: fields.ttl_ms ?? DEFAULT_TTL_MS,
    payload: fields.payload,
  });
}

type EnvelopeOptions = Omit<MessageFields<MessageType>, 'type' | 'payload'>;

/** Builds the request message for `stage`. */
export function createStageRequest(
  stage: Stage,
  payload: StageRequestPayload,
  options: EnvelopeOptions,
): Message {
  switch (stage) {
    case 'analysis':
      return createMessage({ ...options, type: 'analysis_request', payload });
    case 'engagement':
      return createMessage({ ...options, type: 'engagement_request', payload });
    case 'scheduling':
      return createMessage({ ...options, type: 'scheduling_request', payload });
    case 'outcome':
      return createMessage({ ...options, type: 'outcome_request', payload });
  }
}

/** Builds the result message answering a `stage` request. */
export function createStageResult(
  stage: Stage,
  payload: StageResultPayload,
  options: EnvelopeOptions,
): Message {
  switch (stage) {
    case 'analysis':
      return createMessage({ ...options, type: 'analysis_result', payload });
    case 'engagement':
      return createMessage({ ...options, type: 'engagement_result', payload });
    case 'scheduling':
      return createMessage({ ...options, type: 'scheduling_result', payload });
    case 'outcome':
      return createMessage({ ...options, type: 'outcome_result', payload });
  }
}

/** Stage a request type belongs to, or `null` for every other type. */
export function stageOfRequest(message: Message): Stage | null {
  switch (message.type) {
    case 'analysis_request':
      return 'analysis';
    case 'engagement_request':
      return 'engagement';
    case 'scheduling_request':
      return 'scheduling';
    case 'outcome_request':
      return 'outcome';
    case 'analysis_result':
    case 'engagement_result':
    case 'scheduling_result':
    case 'outcome_result':
    case 'completion_signal':
    case 'error':
    case 'timeout':
    case 'quality_insight':
      return null;
  }
}

/** Stage a result type belongs to, or `null` for every other type. */
export function stageOfResult(message: Message): Stage | null {
  switch (message.type) {
    case 'analysis_result':
      return 'analysis';
    case 'engagement_result':
      return 'engagement';
    case 'scheduling_result':
      return 'scheduling';
    case 'outcome_result':
      return 'outcome';
    case 'analysis_request':
    case 'engagement_request':
    case 'scheduling_request':
    case 'outcome_request':
    case 'completion_signal':
    case 'error':
    case 'timeout':
    case 'quality_insight':
      return null;
  }
}

