import { z } from 'zod';
import type { ChannelName, Message } from '../domain/index.js';
import { Channels, STAGE_CHANNELS, STAGES } from '../domain/index.js';
import { DEFAULT_TTL_MS } from './message-factory.js';

/**
 * Bus channels an out-of-process collaborator may publish on: every
 * stage result channel plus `service.completion`. Requests, errors and
 * insights only ever originate inside the process.
 */
export const INBOUND_CHANNELS: readonly ChannelName[] = [
  ...STAGES.map((stage) => STAGE_CHANNELS[stage].result),
  Channels.serviceCompletion,
];

export function isInboundChannel(channel: string): channel is ChannelName {
  return INBOUND_CHANNELS.some((inbound) => inbound === channel);
}

const dataSchema = z.record(z.string(), z.unknown());

const prioritySchema = z.enum(['critical', 'high', 'normal', 'low']);

const envelopeFields = {
  message_id: z.string().min(1).max(255),
  correlation_id: z.string().min(1).max(255),
  created_at: z.string().datetime().default(() => new Date().toISOString()),
  sender: z.string().min(1).max(255),
  receiver: z.string().nullable().default(null),
  priority: prioritySchema.default('normal'),
  reply_to: z.string().nullable().default(null),
  ttl_ms: z.number().int().positive().default(DEFAULT_TTL_MS),
};

const stageResultPayloadSchema = z.discriminatedUnion('outcome', [
  z.object({ entity_id: z.string().min(1), outcome: z.literal('success'), data: dataSchema }),
  z.object({ entity_id: z.string().min(1), outcome: z.literal('failure'), error: z.string() }),
]);

/**
 * Zod schema for a message arriving from outside the process.
 *
 * Stage results carry `reply_to` (the request they answer); collaborator
 * errors are reported as `error` messages with kind `collaborator_reported`.
 */
export const inboundMessageSchema = z.discriminatedUnion('type', [
  z.object({ ...envelopeFields, type: z.literal('analysis_result'), payload: stageResultPayloadSchema }),
  z.object({ ...envelopeFields, type: z.literal('engagement_result'), payload: stageResultPayloadSchema }),
  z.object({ ...envelopeFields, type: z.literal('scheduling_result'), payload: stageResultPayloadSchema }),
  z.object({ ...envelopeFields, type: z.literal('outcome_result'), payload: stageResultPayloadSchema }),
  z.object({
    ...envelopeFields,
    type: z.literal('completion_signal'),
    payload: z.object({ entity_id: z.string().min(1), data: dataSchema.default({}) }),
  }),
  z.object({
    ...envelopeFields,
    type: z.literal('error'),
    payload: z.object({
      entity_id: z.string().min(1).nullable(),
      kind: z.literal('collaborator_reported'),
      message: z.string(),
    }),
  }),
]);

export type InboundParseResult =
  | { success: true; message: Message }
  | { success: false; error: z.ZodError };

/** Validates an inbound message and freezes it like a locally built envelope. */
export function parseInboundMessage(raw: unknown): InboundParseResult {
  const parsed = inboundMessageSchema.safeParse(raw);
  if (!parsed.success) return { success: false, error: parsed.error };

  const message: Message = parsed.data;
  return { success: true, message: Object.freeze(message) };
}

/** Body of `POST /api/v1/workflows/:entity_id/completion`. */
export const completionRequestSchema = z
  .object({
    correlation_id: z.string().min(1).optional(),
    data: dataSchema.default({}),
  })
  .default({});
