import type { Redis } from 'ioredis';
import type { Logger } from 'pino';
import type { MessageBus, Subscription } from '../../application/message-bus.js';
import { formatIssues } from '../../application/input-schema.js';
import { INBOUND_CHANNELS, isInboundChannel, parseInboundMessage } from '../../application/message-schema.js';
import { STAGE_CHANNELS, STAGES } from '../../domain/index.js';

export const BRIDGE_SUBSCRIBER_ID = 'redis-bridge';

export interface CollaboratorBridgeOptions {
  bus: MessageBus;
  /** Connection used for PUBLISH. */
  publisher: Redis;
  /** Dedicated connection; SUBSCRIBE puts it in subscriber mode. */
  subscriber: Redis;
  log: Logger;
  /**
   * Bus channels forwarded to Redis. Defaults to the four stage request
   * channels; add any channel a routing hook sends requests to.
   */
  outboundChannels?: readonly string[];
}

export interface CollaboratorBridge {
  readonly outboundChannels: readonly string[];
  stop(): Promise<void>;
}

/**
 * Connects out-of-process collaborators to the in-process bus over Redis
 * Pub/Sub. Redis channel names are the bus channel names.
 *
 * Outbound: every request published on the bus is forwarded as JSON.
 * Inbound: results and completion signals are validated and republished
 * on the bus, where the orchestrator checks `reply_to` and correlation
 * like any local reply. Malformed messages are logged and dropped.
 */
export async function startCollaboratorBridge(options: CollaboratorBridgeOptions): Promise<CollaboratorBridge> {
  const { bus, publisher, subscriber, log } = options;
  const outboundChannels = options.outboundChannels ?? STAGES.map((stage) => STAGE_CHANNELS[stage].request);

  const subscriptions: Subscription[] = outboundChannels.map((channel) =>
    bus.subscribe(
      channel,
      async (message) => {
        try {
          await publisher.publish(channel, JSON.stringify(message));
        } catch (err: unknown) {
          // The request's deadline will expire and take the retry path
          log.warn({ err, channel, message_id: message.message_id }, 'Failed to forward request');
        }
      },
      `${BRIDGE_SUBSCRIBER_ID}:${channel}`,
    ),
  );

  const onMessage = (channel: string, raw: string): void => {
    if (!isInboundChannel(channel)) return;

    let body: unknown;
    try {
      body = JSON.parse(raw);
    } catch (err: unknown) {
      log.warn({ err, channel }, 'Inbound message is not valid JSON');
      return;
    }

    const parsed = parseInboundMessage(body);
    if (!parsed.success) {
      log.warn({ channel, issues: formatIssues(parsed.error) }, 'Invalid inbound message dropped');
      return;
    }

    if (!bus.publish(channel, parsed.message)) {
      log.warn({ channel, message_id: parsed.message.message_id }, 'Bus refused inbound message');
    }
  };

  subscriber.on('message', onMessage);
  await subscriber.subscribe(...INBOUND_CHANNELS);
  log.info({ outbound: outboundChannels, inbound: INBOUND_CHANNELS }, 'Collaborator bridge started');

  return {
    outboundChannels,
    stop: async () => {
      for (const subscription of subscriptions) bus.unsubscribe(subscription);
      subscriber.off('message', onMessage);
      await subscriber.unsubscribe(...INBOUND_CHANNELS);
      log.info('Collaborator bridge stopped');
    },
  };
}
