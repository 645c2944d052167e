import type { Logger } from 'pino';
import type { Message } from '../domain/index.js';
import { BusLog, DEFAULT_LOG_CAPACITY } from './bus-log.js';
import { DeliveryQueue } from './delivery-queue.js';

/** Handler invoked for every message delivered to a subscription. */
export type MessageHandler = (message: Message) => void | Promise<void>;

export interface Subscription {
  readonly id: number;
  readonly channel: string;
  readonly name: string;
}

interface Subscriber extends Subscription {
  readonly handler: MessageHandler;
  readonly queue: DeliveryQueue<Message>;
  draining: boolean;
}

export interface MessageBusOptions {
  log: Logger;
  /** Entries retained by the audit log. */
  logCapacity?: number;
  /** Messages a single subscriber may have queued before the bus starts dropping. */
  maxQueueDepth?: number;
  now?: () => number;
}

export interface ChannelStats {
  subscribers: number;
  queue_depth: number;
  published: number;
}

export interface BusStats {
  channels: Record<string, ChannelStats>;
  messages_logged: number;
  published: number;
  delivered: number;
  dropped: number;
  expired: number;
  draining_subscribers: number;
  stopped: boolean;
}

export const DEFAULT_QUEUE_DEPTH = 10_000;

/**
 * In-process, multi-channel, priority-ordered publish/subscribe bus.
 *
 * Delivery model:
 * 1. `publish()` appends a copy of the message to the queue of every
 *    current subscriber of the channel and returns immediately.
 * 2. Each subscriber drains its own queue on the microtask queue, one
 *    delivery at a time, so a handler never runs concurrently with itself.
 * 3. The queue hands out the highest priority band first, FIFO within a
 *    band. A delivery already in progress is never preempted.
 *
 * Different subscribers drain independently, so a slow handler only
 * delays its own backlog.
 *
 * Every publish and delivery is appended to `audit`, the bounded log
 * that monitoring sinks consume.
 */
export class MessageBus {
  readonly audit: BusLog;

  private readonly log: Logger;
  private readonly maxQueueDepth: number;
  private readonly now: () => number;
  private readonly channels: Map<string, Set<Subscriber>> = new Map();
  private readonly publishedByChannel: Map<string, number> = new Map();
  private readonly active: Set<Subscriber> = new Set();
  private idleWaiters: Array<() => void> = [];
  private nextSubscriptionId = 1;
  private stopped = false;
  private totals = { published: 0, delivered: 0, dropped: 0, expired: 0 };

  constructor(options: MessageBusOptions) {
    this.log = options.log;
    this.maxQueueDepth = options.maxQueueDepth ?? DEFAULT_QUEUE_DEPTH;
    this.now = options.now ?? Date.now;
    this.audit = new BusLog(options.log, options.logCapacity ?? DEFAULT_LOG_CAPACITY, this.now);
  }

  /**
   * Enqueues `message` for every current subscriber of `channel`.
   * Returns false only once the bus has been stopped.
   */
  publish(channel: string, message: Message): boolean {
    if (this.stopped) {
      this.log.warn({ channel, message_id: message.message_id }, 'Bus stopped, publish rejected');
      return false;
    }

    const subscribers = this.subscribersOf(channel);
    this.audit.append(channel, 'published', message);
    this.totals.published++;
    this.publishedByChannel.set(channel, (this.publishedByChannel.get(channel) ?? 0) + 1);

    for (const subscriber of subscribers) {
      this.enqueue(subscriber, structuredClone(message));
    }

    this.log.debug(
      { channel, message_id: message.message_id, type: message.type, priority: message.priority, fanout: subscribers.size },
      'Message published',
    );
    return true;
  }

  /** Registers `handler` for every future message on `channel`. */
  subscribe(channel: string, handler: MessageHandler, name?: string): Subscription {
    const id = this.nextSubscriptionId++;
    const subscriber: Subscriber = {
      id,
      channel,
      name: name ?? `subscriber-${id}`,
      handler,
      queue: new DeliveryQueue<Message>(),
      draining: false,
    };

    this.subscribersOf(channel).add(subscriber);
    this.log.debug({ channel, subscriber: subscriber.name }, 'Subscribed');

    return { id, channel, name: subscriber.name };
  }

  /**
   * Removes a registration. Deliveries already queued for it still run.
   * Returns false if the subscription was not registered.
   */
  unsubscribe(subscription: Subscription): boolean {
    const subscribers = this.channels.get(subscription.channel);
    if (!subscribers) return false;

    for (const subscriber of subscribers) {
      if (subscriber.id === subscription.id) {
        subscribers.delete(subscriber);
        this.log.debug({ channel: subscription.channel, subscriber: subscription.name }, 'Unsubscribed');
        return true;
      }
    }
    return false;
  }

  stats(): BusStats {
    const channels: Record<string, ChannelStats> = {};
    for (const [name, subscribers] of this.channels) {
      let depth = 0;
      for (const subscriber of subscribers) depth += subscriber.queue.size;
      channels[name] = {
        subscribers: subscribers.size,
        queue_depth: depth,
        published: this.publishedByChannel.get(name) ?? 0,
      };
    }

    return {
      channels,
      messages_logged: this.audit.totalLogged,
      ...this.totals,
      draining_subscribers: this.active.size,
      stopped: this.stopped,
    };
  }

  /** Resolves once every queue is empty and no handler is running. */
  idle(): Promise<void> {
    if (this.active.size === 0) return Promise.resolve();
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  /**
   * Stops accepting publishes, lets queued and in-flight deliveries
   * finish, then drops every subscription.
   */
  async stop(): Promise<void> {
    if (this.stopped) return;
    this.stopped = true;

    await this.idle();
    this.channels.clear();
    this.log.info({ delivered: this.totals.delivered }, 'Message bus stopped');
  }

  get isStopped(): boolean {
    return this.stopped;
  }

  // ── Delivery ────────────────────────────────────────────────────────

  private subscribersOf(channel: string): Set<Subscriber> {
    let subscribers = this.channels.get(channel);
    if (!subscribers) {
      subscribers = new Set();
      this.channels.set(channel, subscribers);
    }
    return subscribers;
  }

  private enqueue(subscriber: Subscriber, message: Message): void {
    if (subscriber.queue.size >= this.maxQueueDepth) {
      const evicted = subscriber.queue.dropLowest(message.priority);
      const dropped = evicted ? evicted.item : message;

      this.audit.append(subscriber.channel, 'dropped', dropped);
      this.totals.dropped++;
      this.log.warn(
        { channel: subscriber.channel, subscriber: subscriber.name, message_id: dropped.message_id, priority: dropped.priority },
        'Subscriber queue full, message dropped',
      );

      // Everything queued outranks the incoming message
      if (!evicted) return;
    }

    subscriber.queue.push(message.priority, message);

    if (!subscriber.draining) {
      subscriber.draining = true;
      this.active.add(subscriber);
      queueMicrotask(() => {
        void this.drain(subscriber);
      });
    }
  }

  private async drain(subscriber: Subscriber): Promise<void> {
    try {
      let message = subscriber.queue.shift();
      while (message !== undefined) {
        if (this.isExpired(message)) {
          this.audit.append(subscriber.channel, 'expired', message);
          this.totals.expired++;
          this.log.warn(
            { channel: subscriber.channel, subscriber: subscriber.name, message_id: message.message_id },
            'Message TTL elapsed before delivery, skipped',
          );
        } else {
          this.audit.append(subscriber.channel, 'delivered', message);
          this.totals.delivered++;
          try {
            await subscriber.handler(message);
          } catch (err: unknown) {
            this.log.error(
              { err, channel: subscriber.channel, subscriber: subscriber.name, message_id: message.message_id },
              'Message handler threw',
            );
          }
        }
        message = subscriber.queue.shift();
      }
    } finally {
      subscriber.draining = false;
      this.active.delete(subscriber);
      this.releaseIdleWaiters();
    }
  }

  private isExpired(message: Message): boolean {
    const created = Date.parse(message.created_at);
    if (!Number.isFinite(created)) return false;
    return this.now() - created > message.ttl_ms;
  }

  private releaseIdleWaiters(): void {
    if (this.active.size > 0) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }
}
