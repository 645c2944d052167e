import type { Data, Priority, Stage } from '../message.js';
import type { WorkflowContext } from '../workflow.js';

/**
 * Outcome of assessing an analysis result.
 *
 * `engage` carries the priority used for every further request of the
 * workflow; `complete` ends it without external engagement.
 */
export type AssessmentDecision =
  | { readonly action: 'engage'; readonly priority: Priority; readonly reason: string }
  | { readonly action: 'complete'; readonly reason: string };

export type EngagementDecision = 'accepted' | 'declined';

export type BookingDecision = 'confirmed' | 'rejected';

/**
 * How far a workflow has escalated, derived from its retry counter.
 *
 * `retry_same`: first retry against the usual collaborator.
 * `fallback_eligible`: a fallback collaborator may be used.
 * `fatal`: the next failure is expected to end the workflow.
 */
export type Escalation = 'none' | 'retry_same' | 'fallback_eligible' | 'fatal';

export interface RouteContext {
  readonly entity_id: string;
  readonly stage: Stage;
  readonly escalation: Escalation;
  readonly retry_count: number;
}

/**
 * Business rules the orchestrator consults but never computes itself.
 *
 * Implementations must be pure and synchronous. No I/O, no mutation of
 * the context they are given. A thrown error is treated as a workflow
 * failure.
 */
export interface DecisionPolicy {
  readonly id: string;
  assess(analysis: Data, context: Readonly<WorkflowContext>): AssessmentDecision;
  engagementDecision(result: Data, context: Readonly<WorkflowContext>): EngagementDecision;
  bookingDecision(result: Data, context: Readonly<WorkflowContext>): BookingDecision;
  /**
   * Optional channel override for a request, e.g. a fallback collaborator
   * once the workflow is `fallback_eligible`. Returning `undefined` keeps
   * the stage's default request channel.
   */
  routeRequest?(route: RouteContext): string | undefined;
}
