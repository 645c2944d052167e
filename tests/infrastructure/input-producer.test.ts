import { describe, it, expect, vi } from 'vitest';
import type { Redis } from 'ioredis';
import { enqueueInput } from '../../src/infrastructure/redis/input-producer.js';

describe('enqueueInput', () => {
  it('appends the input with a JSON payload and returns the entry id', async () => {
    const xadd = vi.fn().mockResolvedValue('1700000000000-0');
    const redis = { xadd } as unknown as Redis;

    const id = await enqueueInput(redis, {
      entity_id: 'pump-7',
      payload: { vibration: 0.8 },
      received_at: '2026-03-01T10:00:00.000Z',
    });

    expect(id).toBe('1700000000000-0');
    expect(xadd).toHaveBeenCalledWith(
      'workflow_inputs',
      '*',
      'entity_id', 'pump-7',
      'payload', '{"vibration":0.8}',
      'received_at', '2026-03-01T10:00:00.000Z',
    );
  });

  it('throws when Redis returns no entry id', async () => {
    const redis = { xadd: vi.fn().mockResolvedValue(null) } as unknown as Redis;

    await expect(enqueueInput(redis, { entity_id: 'pump-7', payload: {} }))
      .rejects.toThrow('XADD to workflow_inputs returned no entry id');
  });
});
