import type { Redis } from 'ioredis';
import type { WorkflowInput } from '../../application/input-schema.js';
import { INPUT_STREAM_KEY } from './input-stream-source.js';

/**
 * Appends a validated input to the Redis Stream.
 *
 * Uses `XADD` with auto-generated stream IDs (`*`). Redis Streams hold
 * string values only, so the payload is JSON-serialized.
 *
 * @returns The stream entry ID assigned by Redis.
 */
export async function enqueueInput(redis: Redis, input: WorkflowInput): Promise<string> {
  const entryId = await redis.xadd(
    INPUT_STREAM_KEY,
    '*',
    'entity_id', input.entity_id,
    'payload', JSON.stringify(input.payload),
    'received_at', input.received_at ?? new Date().toISOString(),
  );

  if (entryId === null) {
    throw new Error(`XADD to ${INPUT_STREAM_KEY} returned no entry id`);
  }
  return entryId;
}
