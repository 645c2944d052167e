import { describe, it, expect } from 'vitest';
import { formatIssues, inputBatchSchema, inputSchema } from '../../src/application/input-schema.js';

describe('inputSchema', () => {
  it('accepts a minimal input and defaults the payload', () => {
    const result = inputSchema.safeParse({ entity_id: 'pump-7' });

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data).toEqual({ entity_id: 'pump-7', payload: {} });
    }
  });

  it('keeps an ISO received_at', () => {
    const result = inputSchema.safeParse({
      entity_id: 'pump-7',
      payload: { vibration: 0.8 },
      received_at: '2026-03-01T10:00:00.000Z',
    });

    expect(result.success).toBe(true);
  });

  it('reports an empty entity id by path', () => {
    const result = inputSchema.safeParse({ entity_id: '' });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatIssues(result.error)).toEqual(['entity_id: String must contain at least 1 character(s)']);
    }
  });

  it('rejects a malformed received_at', () => {
    const result = inputSchema.safeParse({ entity_id: 'pump-7', received_at: 'yesterday' });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatIssues(result.error)).toEqual(['received_at: Must be a valid ISO-8601 datetime']);
    }
  });

  it('rejects a non-object payload', () => {
    expect(inputSchema.safeParse({ entity_id: 'pump-7', payload: [1, 2] }).success).toBe(false);
  });
});

describe('inputBatchSchema', () => {
  it('rejects an empty batch', () => {
    const result = inputBatchSchema.safeParse([]);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatIssues(result.error)).toEqual(['Batch must contain at least one input']);
    }
  });

  it('prefixes issues with the item index', () => {
    const result = inputBatchSchema.safeParse([{ entity_id: 'a' }, { entity_id: 42 }]);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatIssues(result.error)).toEqual(['1.entity_id: Expected string, received number']);
    }
  });
});
