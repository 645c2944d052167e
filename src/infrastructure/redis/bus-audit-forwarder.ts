import type { Redis } from 'ioredis';
import type { Logger } from 'pino';
import type { BusLog, BusLogEntry } from '../../application/bus-log.js';

export const BUS_AUDIT_CHANNEL = 'bus_audit';

/**
 * Forwards every bus log entry to the `bus_audit` Pub/Sub channel for
 * external monitors.
 *
 * Best-effort: a failed publish is logged and never reaches the bus.
 * Returns a function that stops forwarding.
 */
export function startBusAuditForwarder(redis: Redis, log: Logger, busLog: BusLog): () => void {
  return busLog.onEntry((entry: BusLogEntry) => {
    redis.publish(BUS_AUDIT_CHANNEL, JSON.stringify(entry)).catch((err: unknown) => {
      log.warn({ err, seq: entry.seq, message_id: entry.message_id }, 'Failed to forward bus log entry');
    });
  });
}
