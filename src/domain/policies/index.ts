export type {
  DecisionPolicy,
  AssessmentDecision,
  EngagementDecision,
  BookingDecision,
  Escalation,
  RouteContext,
} from './types.js';
export { createTimeToFailurePolicy, DEFAULT_THRESHOLDS } from './time-to-failure.js';
export type { TimeToFailureThresholds } from './time-to-failure.js';
