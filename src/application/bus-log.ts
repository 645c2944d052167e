import type { Logger } from 'pino';
import type { Message, MessageType, Priority } from '../domain/index.js';

export type BusLogAction = 'published' | 'delivered' | 'dropped' | 'expired';

/** One audit record. This is the stream external monitors consume. */
export interface BusLogEntry {
  readonly seq: number;
  readonly timestamp: string; // ISO-8601
  readonly channel: string;
  readonly action: BusLogAction;
  readonly message_id: string;
  readonly correlation_id: string;
  readonly sender: string;
  readonly receiver: string | null;
  readonly type: MessageType;
  readonly priority: Priority;
}

export type BusLogListener = (entry: BusLogEntry) => void;

export const DEFAULT_LOG_CAPACITY = 100_000;

/**
 * Append-only, bounded, in-memory audit log of bus traffic.
 *
 * Once `capacity` entries are retained the oldest ones are discarded;
 * `seq` keeps counting so consumers can detect the gap.
 */
export class BusLog {
  private entries: BusLogEntry[] = [];
  private readonly listeners: Set<BusLogListener> = new Set();
  private nextSeq = 1;
  private readonly log: Logger;
  private readonly capacity: number;
  private readonly now: () => number;

  constructor(log: Logger, capacity: number = DEFAULT_LOG_CAPACITY, now: () => number = Date.now) {
    this.log = log;
    this.capacity = capacity;
    this.now = now;
  }

  append(channel: string, action: BusLogAction, message: Message): BusLogEntry {
    const entry: BusLogEntry = {
      seq: this.nextSeq++,
      timestamp: new Date(this.now()).toISOString(),
      channel,
      action,
      message_id: message.message_id,
      correlation_id: message.correlation_id,
      sender: message.sender,
      receiver: message.receiver,
      type: message.type,
      priority: message.priority,
    };

    this.entries.push(entry);
    if (this.entries.length > this.capacity) {
      this.entries.splice(0, this.entries.length - this.capacity);
    }

    for (const listener of this.listeners) {
      try {
        listener(entry);
      } catch (err: unknown) {
        this.log.warn({ err, seq: entry.seq }, 'Bus log listener threw');
      }
    }

    return entry;
  }

  /** Subscribe to every future entry. Returns an unsubscribe function. */
  onEntry(listener: BusLogListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Most recent entries, oldest first. */
  recent(limit: number = 100): readonly BusLogEntry[] {
    if (limit <= 0) return [];
    return this.entries.slice(-limit);
  }

  /** Total entries ever appended (including discarded ones). */
  get totalLogged(): number {
    return this.nextSeq - 1;
  }

  /** Entries currently retained. */
  get size(): number {
    return this.entries.length;
  }
}
