import type { Escalation } from '../domain/index.js';

export interface RetryPolicy {
  /** Retries allowed per workflow before it is completed as failed. */
  readonly maxRetries: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30_000,
};

/**
 * Delay before retry number `attempt` (1-based):
 * `baseDelayMs * 2^(attempt - 1)`, capped at `maxDelayMs`.
 */
export function computeBackoff(policy: RetryPolicy, attempt: number): number {
  if (attempt <= 0) return 0;
  const delay = policy.baseDelayMs * 2 ** (attempt - 1);
  return Math.min(delay, policy.maxDelayMs);
}

/**
 * Escalation class for a retry counter. Advisory only; `maxRetries` is
 * the bound the orchestrator enforces.
 */
export function classifyEscalation(retryCount: number): Escalation {
  if (retryCount <= 0) return 'none';
  if (retryCount === 1) return 'retry_same';
  if (retryCount === 2) return 'fallback_eligible';
  return 'fatal';
}
