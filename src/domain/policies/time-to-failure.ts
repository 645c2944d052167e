import type { Data } from '../message.js';
import type {
  AssessmentDecision,
  BookingDecision,
  DecisionPolicy,
  EngagementDecision,
} from './types.js';

const POLICY_ID = 'time-to-failure';

export interface TimeToFailureThresholds {
  /** Below this many days the workflow is engaged at `critical`. */
  readonly criticalDays: number;
  /** Below this many days: `high`. */
  readonly highDays: number;
  /** Below this many days: `normal`. Anything later needs no action. */
  readonly normalDays: number;
}

export const DEFAULT_THRESHOLDS: TimeToFailureThresholds = {
  criticalDays: 1,
  highDays: 7,
  normalDays: 30,
};

function readNumber(data: Data, key: string): number | null {
  const value = data[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

/**
 * Default decision policy.
 *
 * Maps the analysis field `predicted_days_to_failure` onto a priority band.
 * Engagement is accepted when the collaborator reports
 * `decision: "accepted"`; a booking counts as confirmed when it reports
 * `status: "confirmed"`.
 *
 * Pure: reads only the result it is handed.
 */
export function createTimeToFailurePolicy(
  thresholds: TimeToFailureThresholds = DEFAULT_THRESHOLDS,
): DecisionPolicy {
  return {
    id: POLICY_ID,

    assess(analysis: Data): AssessmentDecision {
      const days = readNumber(analysis, 'predicted_days_to_failure');

      if (days === null) {
        return { action: 'complete', reason: 'No failure predicted' };
      }
      if (days < thresholds.criticalDays) {
        return { action: 'engage', priority: 'critical', reason: `Failure predicted in ${days} days` };
      }
      if (days < thresholds.highDays) {
        return { action: 'engage', priority: 'high', reason: `Failure predicted in ${days} days` };
      }
      if (days < thresholds.normalDays) {
        return { action: 'engage', priority: 'normal', reason: `Failure predicted in ${days} days` };
      }

      return { action: 'complete', reason: `Failure predicted in ${days} days, no immediate action` };
    },

    engagementDecision(result: Data): EngagementDecision {
      return result['decision'] === 'accepted' ? 'accepted' : 'declined';
    },

    bookingDecision(result: Data): BookingDecision {
      return result['status'] === 'confirmed' ? 'confirmed' : 'rejected';
    },
  };
}
