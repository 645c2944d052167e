import { describe, it, expect } from 'vitest';
import { classifyEscalation, computeBackoff, DEFAULT_RETRY_POLICY } from '../../src/application/retry-policy.js';
import type { Escalation } from '../../src/domain/index.js';

describe('computeBackoff', () => {
  it('doubles from the base delay', () => {
    expect(computeBackoff(DEFAULT_RETRY_POLICY, 1)).toBe(1000);
    expect(computeBackoff(DEFAULT_RETRY_POLICY, 2)).toBe(2000);
    expect(computeBackoff(DEFAULT_RETRY_POLICY, 3)).toBe(4000);
  });

  it('is capped at the maximum delay', () => {
    expect(computeBackoff(DEFAULT_RETRY_POLICY, 6)).toBe(30_000);
    expect(computeBackoff(DEFAULT_RETRY_POLICY, 20)).toBe(30_000);
  });

  it('is zero before the first retry', () => {
    expect(computeBackoff(DEFAULT_RETRY_POLICY, 0)).toBe(0);
  });
});

const ESCALATIONS: Array<[number, Escalation]> = [
  [0, 'none'],
  [1, 'retry_same'],
  [2, 'fallback_eligible'],
  [3, 'fatal'],
  [7, 'fatal'],
];

describe('classifyEscalation', () => {
  it.each(ESCALATIONS)('retry count %i is %s', (count, expected) => {
    expect(classifyEscalation(count)).toBe(expected);
  });
});
