import type { Logger } from 'pino';
import type { Data, Message, Stage, StageRequestPayload } from '../domain/index.js';
import { Channels, COLLABORATOR_IDS, STAGE_CHANNELS } from '../domain/index.js';
import type { MessageBus, Subscription } from './message-bus.js';
import { createMessage, createStageResult, stageOfRequest } from './message-factory.js';

/** What a collaborator answers. `null` means it stays silent. */
export type CollaboratorReply =
  | { outcome: 'success'; data: Data }
  | { outcome: 'failure'; error: string }
  | null;

export interface StageRequest {
  readonly message: Message;
  readonly payload: StageRequestPayload;
}

export type CollaboratorHandler = (request: StageRequest) => CollaboratorReply | Promise<CollaboratorReply>;

export interface CollaboratorOptions {
  stage: Stage;
  log: Logger;
  handle: CollaboratorHandler;
  /** Request channel to listen on. Defaults to the stage's own. */
  channel?: string;
  id?: string;
}

export interface CollaboratorHandle {
  readonly subscription: Subscription;
  stop(): void;
}

/**
 * Attaches a collaborator to the bus.
 *
 * Every request for `stage` is handed to `handle`; its reply is published
 * on the stage's result channel with `reply_to` set to the request id.
 * A throwing handler is reported as an `error` message on the same
 * channel, which the orchestrator treats as a collaborator failure.
 */
export function startCollaborator(bus: MessageBus, options: CollaboratorOptions): CollaboratorHandle {
  const { stage, log } = options;
  const id = options.id ?? COLLABORATOR_IDS[stage];
  const resultChannel = STAGE_CHANNELS[stage].result;

  const envelope = (request: Message) => ({
    sender: id,
    receiver: request.sender,
    correlation_id: request.correlation_id,
    priority: request.priority,
    reply_to: request.message_id,
  });

  const subscription = bus.subscribe(
    options.channel ?? STAGE_CHANNELS[stage].request,
    async (message) => {
      const payload = requestPayload(message);
      if (stageOfRequest(message) !== stage || payload === null) {
        log.warn({ collaborator: id, type: message.type }, 'Unexpected message on request channel');
        return;
      }

      let reply: CollaboratorReply;
      try {
        reply = await options.handle({ message, payload });
      } catch (err: unknown) {
        log.error({ err, collaborator: id, entity_id: payload.entity_id }, 'Collaborator handler threw');
        bus.publish(
          resultChannel,
          createMessage({
            ...envelope(message),
            type: 'error',
            payload: {
              entity_id: payload.entity_id,
              kind: 'collaborator_reported',
              message: err instanceof Error ? err.message : String(err),
            },
          }),
        );
        return;
      }

      if (reply === null) return;

      const result = reply.outcome === 'success'
        ? createStageResult(stage, { entity_id: payload.entity_id, outcome: 'success', data: reply.data }, envelope(message))
        : createStageResult(stage, { entity_id: payload.entity_id, outcome: 'failure', error: reply.error }, envelope(message));
      bus.publish(resultChannel, result);
    },
    id,
  );

  return {
    subscription,
    stop: () => {
      bus.unsubscribe(subscription);
    },
  };
}

function requestPayload(message: Message): StageRequestPayload | null {
  switch (message.type) {
    case 'analysis_request':
    case 'engagement_request':
    case 'scheduling_request':
    case 'outcome_request':
      return message.payload;
    default:
      return null;
  }
}

/**
 * Publishes the external completion signal for an entity that is
 * awaiting it. `correlation_id` must be the workflow's.
 */
export function signalCompletion(
  bus: MessageBus,
  signal: { entity_id: string; correlation_id: string; data?: Data; sender?: string },
): boolean {
  return bus.publish(
    Channels.serviceCompletion,
    createMessage({
      type: 'completion_signal',
      payload: { entity_id: signal.entity_id, data: signal.data ?? {} },
      sender: signal.sender ?? 'external-service',
      correlation_id: signal.correlation_id,
    }),
  );
}
