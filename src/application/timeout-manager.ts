import type { Logger } from 'pino';

export type DeadlineOutcome = 'acknowledged' | 'expired' | 'cancelled';

export type ExpiryCallback = (messageId: string) => void | Promise<void>;

export interface DeadlineHandle {
  readonly messageId: string;
  /** Absolute deadline, epoch ms. */
  readonly deadline: number;
  /** Resolves exactly once, with whichever outcome won. */
  readonly settled: Promise<DeadlineOutcome>;
}

interface Registration {
  readonly timer: NodeJS.Timeout;
  readonly onExpire: ExpiryCallback;
  readonly settle: (outcome: DeadlineOutcome) => void;
}

export interface TimeoutManagerOptions {
  log: Logger;
  now?: () => number;
}

/**
 * Tracks one deadline per outstanding request.
 *
 * Acknowledgement and expiry are mutually exclusive: whichever removes
 * the registration first wins, and the loser becomes a no-op. Because
 * the registration is deleted before the expiry callback runs, a late
 * `acknowledge()` simply returns false.
 */
export class TimeoutManager {
  private readonly registrations: Map<string, Registration> = new Map();
  private readonly log: Logger;
  private readonly now: () => number;

  constructor(options: TimeoutManagerOptions) {
    this.log = options.log;
    this.now = options.now ?? Date.now;
  }

  /**
   * Registers `onExpire` to run once `deadline` (epoch ms) passes without
   * an acknowledgement. Re-registering an id replaces the previous
   * deadline, which settles as `cancelled`.
   */
  register(messageId: string, deadline: number, onExpire: ExpiryCallback): DeadlineHandle {
    const existing = this.registrations.get(messageId);
    if (existing) {
      this.remove(messageId, existing, 'cancelled');
      this.log.warn({ message_id: messageId }, 'Deadline re-registered, previous one cancelled');
    }

    let settle: (outcome: DeadlineOutcome) => void = () => undefined;
    const settled = new Promise<DeadlineOutcome>((resolve) => {
      settle = resolve;
    });

    const delay = Math.max(0, deadline - this.now());
    const timer = setTimeout(() => {
      this.expire(messageId);
    }, delay);

    this.registrations.set(messageId, { timer, onExpire, settle });
    return { messageId, deadline, settled };
  }

  /** Convenience for a deadline `timeoutMs` from now. */
  registerAfter(messageId: string, timeoutMs: number, onExpire: ExpiryCallback): DeadlineHandle {
    return this.register(messageId, this.now() + timeoutMs, onExpire);
  }

  /**
   * Cancels the deadline of `messageId`.
   * Returns false when nothing was pending: unknown id, already
   * acknowledged, or already expired.
   */
  acknowledge(messageId: string): boolean {
    const registration = this.registrations.get(messageId);
    if (!registration) return false;

    this.remove(messageId, registration, 'acknowledged');
    return true;
  }

  get pendingCount(): number {
    return this.registrations.size;
  }

  /** Drops every pending deadline without invoking any callback. */
  cancelAll(): number {
    const count = this.registrations.size;
    for (const [messageId, registration] of this.registrations) {
      this.remove(messageId, registration, 'cancelled');
    }
    if (count > 0) {
      this.log.info({ count }, 'Pending deadlines cancelled');
    }
    return count;
  }

  private expire(messageId: string): void {
    const registration = this.registrations.get(messageId);
    if (!registration) return;

    this.remove(messageId, registration, 'expired');
    this.log.debug({ message_id: messageId }, 'Deadline expired');

    try {
      const result = registration.onExpire(messageId);
      if (result instanceof Promise) {
        void result.catch((err: unknown) => {
          this.log.error({ err, message_id: messageId }, 'Expiry callback failed');
        });
      }
    } catch (err: unknown) {
      this.log.error({ err, message_id: messageId }, 'Expiry callback failed');
    }
  }

  private remove(messageId: string, registration: Registration, outcome: DeadlineOutcome): void {
    clearTimeout(registration.timer);
    this.registrations.delete(messageId);
    registration.settle(outcome);
  }
}
