import type { Redis } from 'ioredis';
import type { Logger } from 'pino';
import type { IngestedRecord, IngestionSource } from '../../application/ingestion.js';

export const INPUT_STREAM_KEY = 'workflow_inputs';
const DEFAULT_GROUP = 'workflow_orchestrator';

export interface RedisStreamSourceOptions {
  stream?: string;
  group?: string;
  consumer?: string;
  /** How long one poll may block waiting for new entries. 0 = do not block. */
  blockMs?: number;
}

interface StreamEntry {
  id: string;
  fields: string[];
}

/**
 * Flattens an XREADGROUP reply into entries.
 * The reply shape is `[[stream, [[id, [field, value, ...]], ...]], ...]`;
 * anything that does not match it is skipped.
 */
export function parseReadReply(reply: unknown): StreamEntry[] {
  if (!Array.isArray(reply)) return [];

  const entries: StreamEntry[] = [];
  for (const stream of reply) {
    if (!Array.isArray(stream)) continue;
    const items: unknown = stream[1];
    if (!Array.isArray(items)) continue;

    for (const item of items) {
      if (!Array.isArray(item)) continue;
      const id: unknown = item[0];
      const fields: unknown = item[1];
      if (typeof id !== 'string') continue;
      entries.push({
        id,
        fields: Array.isArray(fields) ? fields.filter((f): f is string => typeof f === 'string') : [],
      });
    }
  }
  return entries;
}

/**
 * Turns the flat `[field, value, ...]` list written by `enqueueInput()`
 * back into an input body. A `payload` that is not valid JSON is passed
 * through as a string so that validation rejects it.
 */
export function parseInputFields(fields: string[]): Record<string, unknown> {
  const map = new Map<string, string>();
  for (let i = 0; i < fields.length; i += 2) {
    const key = fields[i];
    const value = fields[i + 1];
    if (key !== undefined && value !== undefined) {
      map.set(key, value);
    }
  }

  const body: Record<string, unknown> = { entity_id: map.get('entity_id') };

  const rawPayload = map.get('payload');
  if (rawPayload !== undefined) {
    try {
      body['payload'] = JSON.parse(rawPayload);
    } catch {
      body['payload'] = rawPayload;
    }
  }

  const receivedAt = map.get('received_at');
  if (receivedAt !== undefined && receivedAt !== '') {
    body['received_at'] = receivedAt;
  }

  return body;
}

/**
 * Ingestion source reading the `workflow_inputs` Redis Stream through a
 * consumer group.
 *
 * - The group is created on first poll, from the start of the stream,
 *   so inputs written before the orchestrator first ran are not lost.
 *   BUSYGROUP (group already exists) is ignored.
 * - Until this consumer's pending entries list is empty, polls re-read it
 *   (cursor "0"): entries delivered before a crash but never acknowledged.
 * - Entries are XACKed in `acknowledge()`, after the orchestrator has
 *   absorbed them, never before.
 */
export class RedisStreamSource implements IngestionSource {
  readonly name: string;

  private readonly redis: Redis;
  private readonly log: Logger;
  private readonly stream: string;
  private readonly group: string;
  private readonly consumer: string;
  private readonly blockMs: number;
  private groupReady = false;
  private recovering = true;

  constructor(redis: Redis, log: Logger, options: RedisStreamSourceOptions = {}) {
    this.redis = redis;
    this.log = log;
    this.stream = options.stream ?? INPUT_STREAM_KEY;
    this.group = options.group ?? DEFAULT_GROUP;
    this.consumer = options.consumer ?? process.env['WORKER_ID'] ?? 'orchestrator-1';
    this.blockMs = options.blockMs ?? 1000;
    this.name = `redis-stream:${this.stream}`;
  }

  async poll(max: number): Promise<IngestedRecord[]> {
    if (!this.groupReady) {
      await this.ensureConsumerGroup();
      this.groupReady = true;
    }

    if (this.recovering) {
      const pending = await this.read(max, '0');
      const live = pending.filter((entry) => entry.fields.length > 0);
      if (pending.length > 0) {
        this.log.info({ count: live.length, stream: this.stream }, 'Recovering pending inputs');
        // Entries whose data was trimmed away come back with no fields; release them too
        const emptied = pending.filter((entry) => entry.fields.length === 0).map((entry) => entry.id);
        if (emptied.length > 0) await this.redis.xack(this.stream, this.group, ...emptied);
        if (live.length > 0) return live.map(toRecord);
      }
      this.recovering = false;
    }

    const fresh = await this.read(max, '>');
    return fresh.map(toRecord);
  }

  async acknowledge(records: readonly IngestedRecord[]): Promise<void> {
    const ids = records
      .map((record) => record.receipt)
      .filter((id): id is string => id !== null);
    if (ids.length === 0) return;

    await this.redis.xack(this.stream, this.group, ...ids);
    this.log.debug({ count: ids.length, stream: this.stream }, 'Inputs acknowledged');
  }

  private async ensureConsumerGroup(): Promise<void> {
    try {
      await this.redis.xgroup('CREATE', this.stream, this.group, '0', 'MKSTREAM');
      this.log.info({ group: this.group, stream: this.stream }, 'Consumer group created');
    } catch (err: unknown) {
      if (err instanceof Error && err.message.includes('BUSYGROUP')) {
        this.log.debug({ group: this.group }, 'Consumer group already exists');
        return;
      }
      throw err;
    }
  }

  private async read(max: number, cursor: '0' | '>'): Promise<StreamEntry[]> {
    // Pending entries are returned immediately; only new ones may block
    const reply = cursor === '>' && this.blockMs > 0
      ? await this.redis.xreadgroup(
        'GROUP', this.group, this.consumer,
        'COUNT', max,
        'BLOCK', this.blockMs,
        'STREAMS', this.stream,
        cursor,
      )
      : await this.redis.xreadgroup(
        'GROUP', this.group, this.consumer,
        'COUNT', max,
        'STREAMS', this.stream,
        cursor,
      );

    return parseReadReply(reply);
  }
}

function toRecord(entry: StreamEntry): IngestedRecord {
  return { receipt: entry.id, body: parseInputFields(entry.fields) };
}
