import { describe, it, expect } from 'vitest';
import { createTimeToFailurePolicy } from '../../src/domain/index.js';
import type { Priority, WorkflowContext } from '../../src/domain/index.js';

const context: WorkflowContext = { inputs: [], results: {}, completion: null, urgency: null };

describe('time-to-failure policy', () => {
  const policy = createTimeToFailurePolicy();

  const bands: Array<[number, Priority]> = [
    [0.5, 'critical'],
    [3, 'high'],
    [14, 'normal'],
  ];

  it.each(bands)('engages at %s days with priority %s', (days, priority) => {
    expect(policy.assess({ predicted_days_to_failure: days }, context)).toEqual({
      action: 'engage',
      priority,
      reason: `Failure predicted in ${days} days`,
    });
  });

  it('completes when failure is far away', () => {
    expect(policy.assess({ predicted_days_to_failure: 90 }, context)).toEqual({
      action: 'complete',
      reason: 'Failure predicted in 90 days, no immediate action',
    });
  });

  it('completes when nothing is predicted', () => {
    expect(policy.assess({}, context)).toEqual({ action: 'complete', reason: 'No failure predicted' });
    expect(policy.assess({ predicted_days_to_failure: 'soon' }, context).action).toBe('complete');
  });

  it('honours custom thresholds', () => {
    const strict = createTimeToFailurePolicy({ criticalDays: 10, highDays: 20, normalDays: 30 });
    expect(strict.assess({ predicted_days_to_failure: 5 }, context)).toEqual(
      expect.objectContaining({ priority: 'critical' }),
    );
  });

  it('reads engagement and booking decisions', () => {
    expect(policy.engagementDecision({ decision: 'accepted' }, context)).toBe('accepted');
    expect(policy.engagementDecision({ decision: 'maybe' }, context)).toBe('declined');
    expect(policy.bookingDecision({ status: 'confirmed' }, context)).toBe('confirmed');
    expect(policy.bookingDecision({}, context)).toBe('rejected');
  });
});
