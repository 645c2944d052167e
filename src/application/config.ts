import { z } from 'zod';
import { ConfigError } from './errors.js';
import { formatIssues } from './input-schema.js';

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const nonNegativeInt = (fallback: number) => z.coerce.number().int().nonnegative().default(fallback);

/**
 * Environment variables read by the orchestration core.
 * Every value is optional; the defaults are the production settings.
 */
const envSchema = z.object({
  WORKFLOW_POLL_INTERVAL_MS: positiveInt(5000),
  WORKFLOW_INGEST_BATCH_SIZE: positiveInt(100),
  WORKFLOW_SWEEP_INTERVAL_MS: positiveInt(1000),
  WORKFLOW_TIMEOUT_MS: positiveInt(300_000),
  WORKFLOW_AWAITING_EXTERNAL_TIMEOUT_MS: positiveInt(604_800_000),
  WORKFLOW_REQUEST_TIMEOUT_MS: positiveInt(30_000),
  WORKFLOW_MAX_RETRIES: nonNegativeInt(3),
  WORKFLOW_RETRY_BASE_DELAY_MS: nonNegativeInt(1000),
  WORKFLOW_RETRY_MAX_DELAY_MS: nonNegativeInt(30_000),
  WORKFLOW_MESSAGE_TTL_MS: positiveInt(300_000),
  WORKFLOW_RETIRED_CAPACITY: positiveInt(1000),
  BUS_LOG_CAPACITY: positiveInt(100_000),
  BUS_QUEUE_DEPTH: positiveInt(10_000),
});

export interface OrchestratorConfig {
  pollIntervalMs: number;
  ingestBatchSize: number;
  sweepIntervalMs: number;
  /** Inactivity after which an active workflow is forced to fail. */
  workflowTimeoutMs: number;
  /** Same, while waiting for the external completion signal. */
  awaitingExternalTimeoutMs: number;
  /** Deadline for each collaborator request. */
  requestTimeoutMs: number;
  maxRetries: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
  messageTtlMs: number;
  retiredCapacity: number;
  busLogCapacity: number;
  busQueueDepth: number;
}

export const DEFAULT_ORCHESTRATOR_CONFIG: OrchestratorConfig = {
  pollIntervalMs: 5000,
  ingestBatchSize: 100,
  sweepIntervalMs: 1000,
  workflowTimeoutMs: 300_000,
  awaitingExternalTimeoutMs: 604_800_000,
  requestTimeoutMs: 30_000,
  maxRetries: 3,
  retryBaseDelayMs: 1000,
  retryMaxDelayMs: 30_000,
  messageTtlMs: 300_000,
  retiredCapacity: 1000,
  busLogCapacity: 100_000,
  busQueueDepth: 10_000,
};

/**
 * Reads the orchestrator settings from `env`.
 *
 * Empty strings count as unset. Throws `ConfigError` listing every
 * invalid variable.
 */
export function loadOrchestratorConfig(
  env: Record<string, string | undefined> = process.env,
): OrchestratorConfig {
  const present: Record<string, string> = {};
  for (const key of Object.keys(envSchema.shape)) {
    const value = env[key];
    if (value !== undefined && value.trim() !== '') present[key] = value;
  }

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(formatIssues(parsed.error));
  }

  const vars = parsed.data;
  if (vars.WORKFLOW_RETRY_MAX_DELAY_MS < vars.WORKFLOW_RETRY_BASE_DELAY_MS) {
    throw new ConfigError(['WORKFLOW_RETRY_MAX_DELAY_MS: must not be below WORKFLOW_RETRY_BASE_DELAY_MS']);
  }

  return {
    pollIntervalMs: vars.WORKFLOW_POLL_INTERVAL_MS,
    ingestBatchSize: vars.WORKFLOW_INGEST_BATCH_SIZE,
    sweepIntervalMs: vars.WORKFLOW_SWEEP_INTERVAL_MS,
    workflowTimeoutMs: vars.WORKFLOW_TIMEOUT_MS,
    awaitingExternalTimeoutMs: vars.WORKFLOW_AWAITING_EXTERNAL_TIMEOUT_MS,
    requestTimeoutMs: vars.WORKFLOW_REQUEST_TIMEOUT_MS,
    maxRetries: vars.WORKFLOW_MAX_RETRIES,
    retryBaseDelayMs: vars.WORKFLOW_RETRY_BASE_DELAY_MS,
    retryMaxDelayMs: vars.WORKFLOW_RETRY_MAX_DELAY_MS,
    messageTtlMs: vars.WORKFLOW_MESSAGE_TTL_MS,
    retiredCapacity: vars.WORKFLOW_RETIRED_CAPACITY,
    busLogCapacity: vars.BUS_LOG_CAPACITY,
    busQueueDepth: vars.BUS_QUEUE_DEPTH,
  };
}
