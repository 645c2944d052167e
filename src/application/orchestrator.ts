import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';
import type {
  Data,
  DecisionPolicy,
  ErrorKind,
  Message,
  Stage,
  StageResultPayload,
  TransitionTrigger,
  Workflow,
  WorkflowState,
  WorkflowStatus,
} from '../domain/index.js';
import {
  Channels,
  COLLABORATOR_IDS,
  ORCHESTRATOR_ID,
  STAGE_CHANNELS,
  STAGES,
  createTimeToFailurePolicy,
} from '../domain/index.js';
import type { RunOutcome, WorkflowArchive } from './archive.js';
import type { OrchestratorConfig } from './config.js';
import { DEFAULT_ORCHESTRATOR_CONFIG } from './config.js';
import { CollaboratorError, DeadlineExpiredError, IngestionSourceError, TransportError } from './errors.js';
import type { IngestedRecord, IngestionSource } from './ingestion.js';
import { formatIssues, inputSchema } from './input-schema.js';
import { KeyedSerializer } from './keyed-serializer.js';
import type { BusStats, MessageBus, Subscription } from './message-bus.js';
import { createMessage, createStageRequest, stageOfResult } from './message-factory.js';
import type { RetryPolicy } from './retry-policy.js';
import { classifyEscalation, computeBackoff } from './retry-policy.js';
import { TimeoutManager } from './timeout-manager.js';
import { applyTransition, canRetry, createWorkflow } from './workflow-machine.js';
import { WorkflowStore } from './workflow-store.js';

export interface OrchestratorDeps {
  bus: MessageBus;
  source: IngestionSource;
  log: Logger;
  config?: Partial<OrchestratorConfig>;
  policy?: DecisionPolicy;
  archive?: WorkflowArchive;
  timeouts?: TimeoutManager;
  now?: () => number;
  /** Called once the bus refuses a publish. The orchestrator cannot make progress after that. */
  onFatal?: (err: TransportError) => void;
}

export interface OrchestratorStatistics {
  running: boolean;
  policy: string;
  live_workflows: number;
  by_state: Record<WorkflowState, number>;
  retired_workflows: number;
  started: number;
  succeeded: number;
  failed: number;
  /** Every pass through the failure path, retried or terminal. */
  errors: number;
  retries: number;
  timeouts: number;
  inputs_ingested: number;
  inputs_rejected: number;
  ingestion_errors: number;
  stale_messages_dropped: number;
  rejected_transitions: number;
  pending_deadlines: number;
  pending_restarts: number;
  bus: BusStats;
}

interface Counters {
  started: number;
  succeeded: number;
  failed: number;
  errors: number;
  retries: number;
  timeouts: number;
  inputs_ingested: number;
  inputs_rejected: number;
  ingestion_errors: number;
  stale_messages_dropped: number;
  rejected_transitions: number;
}

/** Payload of a stage result, or `null` for every other message type. */
function resultPayload(message: Message): StageResultPayload | null {
  switch (message.type) {
    case 'analysis_result':
    case 'engagement_result':
    case 'scheduling_result':
    case 'outcome_result':
      return message.payload;
    default:
      return null;
  }
}

function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    const done = (): void => {
      clearTimeout(timer);
      signal.removeEventListener('abort', done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal.addEventListener('abort', done, { once: true });
  });
}

/**
 * Drives every workflow from ingestion to completion.
 *
 * Three duties run concurrently:
 * 1. Ingestion: poll the source, validate each record, start or extend
 *    the entity's workflow.
 * 2. Result processing: bus subscriptions on every result channel and on
 *    `service.completion`; each result advances its workflow one step.
 * 3. Staleness sweep: fail workflows that made no progress in time.
 *
 * Every mutation of a workflow runs inside that entity's serialized
 * section (`KeyedSerializer`), so a result, an expiry and a sweep for the
 * same entity never interleave. A result counts only when its `reply_to`
 * names the workflow's outstanding request; anything else is stale and
 * dropped.
 */
export class Orchestrator {
  private readonly bus: MessageBus;
  private readonly source: IngestionSource;
  private readonly log: Logger;
  private readonly config: OrchestratorConfig;
  private readonly policy: DecisionPolicy;
  private readonly archive: WorkflowArchive | undefined;
  private readonly timeouts: TimeoutManager;
  private readonly now: () => number;
  private readonly onFatal: ((err: TransportError) => void) | undefined;
  private readonly retryPolicy: RetryPolicy;

  private readonly store: WorkflowStore;
  private readonly serializer = new KeyedSerializer();
  /** Outstanding request id → entity id. */
  private readonly pendingIndex: Map<string, string> = new Map();
  private readonly restartTimers: Map<string, NodeJS.Timeout> = new Map();
  private readonly archiveWrites: Set<Promise<void>> = new Set();
  private subscriptions: Subscription[] = [];
  private abort: AbortController | null = null;
  private duties: Promise<void>[] = [];
  private counters: Counters = {
    started: 0,
    succeeded: 0,
    failed: 0,
    errors: 0,
    retries: 0,
    timeouts: 0,
    inputs_ingested: 0,
    inputs_rejected: 0,
    ingestion_errors: 0,
    stale_messages_dropped: 0,
    rejected_transitions: 0,
  };

  constructor(deps: OrchestratorDeps) {
    this.bus = deps.bus;
    this.source = deps.source;
    this.log = deps.log;
    this.config = { ...DEFAULT_ORCHESTRATOR_CONFIG, ...deps.config };
    this.policy = deps.policy ?? createTimeToFailurePolicy();
    this.archive = deps.archive;
    this.now = deps.now ?? Date.now;
    this.timeouts = deps.timeouts ?? new TimeoutManager({ log: deps.log, now: this.now });
    this.onFatal = deps.onFatal;
    this.retryPolicy = {
      maxRetries: this.config.maxRetries,
      baseDelayMs: this.config.retryBaseDelayMs,
      maxDelayMs: this.config.retryMaxDelayMs,
    };
    this.store = new WorkflowStore(this.config.retiredCapacity);
  }

  get running(): boolean {
    return this.abort !== null;
  }

  start(): void {
    if (this.abort) return;

    for (const stage of STAGES) {
      this.subscriptions.push(
        this.bus.subscribe(STAGE_CHANNELS[stage].result, (message) => this.onResult(message), `${ORCHESTRATOR_ID}:${stage}`),
      );
    }
    this.subscriptions.push(
      this.bus.subscribe(Channels.serviceCompletion, (message) => this.onCompletion(message), `${ORCHESTRATOR_ID}:completion`),
    );

    const abort = new AbortController();
    this.abort = abort;
    this.duties = [
      this.runDuty('ingestion', this.config.pollIntervalMs, () => this.pollOnce(), abort.signal),
      this.runDuty('staleness-sweep', this.config.sweepIntervalMs, () => this.sweepStale(), abort.signal),
    ];

    // stop() cancelled their restart timers
    for (const workflow of this.store.liveWorkflows()) {
      if (workflow.state === 'idle' && !this.restartTimers.has(workflow.entity_id)) {
        this.scheduleRestart(workflow);
      }
    }

    this.log.info(
      { source: this.source.name, policy: this.policy.id, pollIntervalMs: this.config.pollIntervalMs },
      'Orchestrator started',
    );
  }

  /**
   * Stops ingestion and the sweep, lets in-flight results finish, then
   * cancels pending deadlines and restarts and waits for archive writes.
   */
  async stop(): Promise<void> {
    const abort = this.abort;
    if (!abort) return;

    abort.abort();
    await Promise.all(this.duties);
    this.duties = [];

    for (const subscription of this.subscriptions) {
      this.bus.unsubscribe(subscription);
    }
    this.subscriptions = [];

    await this.bus.idle();
    await this.serializer.drain();

    for (const timer of this.restartTimers.values()) clearTimeout(timer);
    this.restartTimers.clear();
    this.timeouts.cancelAll();

    await Promise.allSettled([...this.archiveWrites]);

    this.abort = null;
    this.log.info({ live_workflows: this.store.liveCount }, 'Orchestrator stopped');
  }

  // ── Ingestion ───────────────────────────────────────────────────────

  /**
   * One ingestion cycle. Returns the number of valid inputs absorbed.
   * Records are acknowledged to the source only after all of them have
   * been absorbed.
   */
  async pollOnce(): Promise<number> {
    let records: IngestedRecord[];
    try {
      records = await this.source.poll(this.config.ingestBatchSize);
    } catch (err: unknown) {
      this.counters.ingestion_errors++;
      const error = new IngestionSourceError(`Polling ${this.source.name} failed`, err);
      this.log.error({ err: error, source: this.source.name }, 'Ingestion poll failed');
      return 0;
    }

    if (records.length === 0) return 0;

    let absorbed = 0;
    for (const record of records) {
      if (await this.ingest(record.body)) absorbed++;
    }

    if (this.source.acknowledge) {
      try {
        await this.source.acknowledge(records);
      } catch (err: unknown) {
        this.counters.ingestion_errors++;
        this.log.error({ err, source: this.source.name, count: records.length }, 'Ingestion acknowledge failed');
      }
    }

    this.log.debug({ received: records.length, absorbed }, 'Ingestion cycle complete');
    return absorbed;
  }

  /**
   * Validates one raw input and merges it into the entity's workflow,
   * creating and starting the workflow when none is live.
   * Returns false for an input that does not validate.
   */
  async ingest(body: unknown): Promise<boolean> {
    const parsed = inputSchema.safeParse(body);
    if (!parsed.success) {
      this.counters.inputs_rejected++;
      this.log.warn({ issues: formatIssues(parsed.error) }, 'Invalid input skipped');
      return false;
    }

    const input = parsed.data;
    await this.serializer.run(input.entity_id, () => {
      let workflow = this.store.get(input.entity_id);
      if (!workflow) {
        workflow = createWorkflow({
          entity_id: input.entity_id,
          correlation_id: randomUUID(),
          max_retries: this.config.maxRetries,
          now: this.now(),
        });
        this.store.add(workflow);
        this.counters.started++;
        this.log.info(
          { entity_id: workflow.entity_id, correlation_id: workflow.correlation_id },
          'Workflow created',
        );
      }

      workflow.context.inputs.push(structuredClone(input.payload));
      this.counters.inputs_ingested++;

      if (workflow.state === 'idle' && !this.restartTimers.has(workflow.entity_id)) {
        this.startRun(workflow, 'Input received');
      } else {
        this.log.debug({ entity_id: workflow.entity_id, state: workflow.state }, 'Input merged into active workflow');
      }
    });
    return true;
  }

  // ── Result processing ───────────────────────────────────────────────

  private async onResult(message: Message): Promise<void> {
    const requestId = message.reply_to;
    const entityId = requestId === null ? undefined : this.pendingIndex.get(requestId);

    if (requestId === null || entityId === undefined) {
      this.dropStale(message, 'No outstanding request matches reply_to');
      return;
    }

    await this.serializer.run(entityId, () => {
      const workflow = this.store.get(entityId);
      const pending = workflow?.pending_request;

      if (!workflow || !pending || pending.message_id !== requestId) {
        this.dropStale(message, 'Result answers a superseded request');
        return;
      }
      if (message.correlation_id !== workflow.correlation_id) {
        this.dropStale(message, 'Correlation id mismatch');
        return;
      }

      if (message.type === 'error') {
        this.clearPending(workflow);
        this.handleFailure(workflow, 'collaborator_error', `${pending.stage} collaborator error: ${message.payload.message}`);
        return;
      }

      const stage = stageOfResult(message);
      const payload = resultPayload(message);
      if (stage === null || payload === null || stage !== pending.stage) {
        this.dropStale(message, `Unexpected ${message.type} while waiting on ${pending.stage}`);
        return;
      }

      this.clearPending(workflow);

      if (payload.outcome === 'failure') {
        this.handleFailure(workflow, 'collaborator_error', new CollaboratorError(stage, payload.error).message);
        return;
      }

      workflow.context.results[stage] = structuredClone(payload.data);
      this.advance(workflow, stage, payload.data);
    });
  }

  private advance(workflow: Workflow, stage: Stage, data: Data): void {
    switch (stage) {
      case 'analysis': {
        if (!this.transition(workflow, 'analysis_completed', 'Analysis result received')) return;

        const decision = this.decide(workflow, () => this.policy.assess(data, workflow.context));
        if (decision === undefined) return;

        if (decision.action === 'engage') {
          workflow.context.urgency = decision.priority;
          if (this.transition(workflow, 'engagement_required', decision.reason)) {
            this.issueRequest(workflow, 'engagement');
          }
        } else if (this.transition(workflow, 'no_action_required', decision.reason)) {
          this.retire(workflow, 'succeeded', decision.reason);
        }
        return;
      }

      case 'engagement': {
        const decision = this.decide(workflow, () => this.policy.engagementDecision(data, workflow.context));
        if (decision === undefined) return;

        if (decision === 'accepted') {
          if (this.transition(workflow, 'engagement_accepted', 'Engagement accepted')) {
            this.issueRequest(workflow, 'scheduling');
          }
        } else if (this.transition(workflow, 'engagement_declined', 'Engagement declined')) {
          this.retire(workflow, 'succeeded', 'Engagement declined');
        }
        return;
      }

      case 'scheduling': {
        const decision = this.decide(workflow, () => this.policy.bookingDecision(data, workflow.context));
        if (decision === undefined) return;

        if (decision === 'confirmed') {
          this.transition(workflow, 'booking_confirmed', 'Booking confirmed');
        } else {
          this.handleFailure(workflow, 'booking_rejected', 'Booking rejected by scheduling collaborator');
        }
        return;
      }

      case 'outcome':
        if (this.transition(workflow, 'outcome_recorded', 'Outcome recorded')) {
          this.retire(workflow, 'succeeded', 'Outcome recorded');
        }
        return;
    }
  }

  private async onCompletion(message: Message): Promise<void> {
    if (message.type !== 'completion_signal') {
      this.dropStale(message, `Unexpected ${message.type} on ${Channels.serviceCompletion}`);
      return;
    }

    const { entity_id: entityId, data } = message.payload;
    await this.serializer.run(entityId, () => {
      const workflow = this.store.get(entityId);
      if (!workflow || workflow.state !== 'awaiting_external') {
        this.dropStale(message, 'Entity is not awaiting completion');
        return;
      }
      if (message.correlation_id !== workflow.correlation_id) {
        this.dropStale(message, 'Correlation id mismatch');
        return;
      }

      workflow.context.completion = structuredClone(data);
      if (this.transition(workflow, 'external_completed', 'Completion signal received')) {
        this.issueRequest(workflow, 'outcome');
      }
    });
  }

  private onDeadlineExpired(messageId: string): Promise<void> | undefined {
    const entityId = this.pendingIndex.get(messageId);
    if (entityId === undefined) return undefined;

    return this.serializer.run(entityId, () => {
      const workflow = this.store.get(entityId);
      const pending = workflow?.pending_request;
      if (!workflow || !pending || pending.message_id !== messageId) return;

      this.clearPending(workflow);
      this.counters.timeouts++;
      this.log.warn(
        { entity_id: entityId, stage: pending.stage, message_id: messageId, retry_count: workflow.retry_count },
        'Collaborator deadline expired',
      );

      this.publish(
        Channels.systemTimeout,
        createMessage({
          type: 'timeout',
          payload: {
            entity_id: entityId,
            stage: pending.stage,
            expired_message_id: messageId,
            retry_count: workflow.retry_count,
          },
          sender: ORCHESTRATOR_ID,
          correlation_id: workflow.correlation_id,
          priority: 'high',
          ttl_ms: this.config.messageTtlMs,
          now: this.now(),
        }),
      );

      this.handleFailure(workflow, 'deadline_expired', new DeadlineExpiredError(pending.stage, messageId).message);
    });
  }

  // ── Staleness sweep ─────────────────────────────────────────────────

  /** Forces every stale workflow through the failure path. Returns how many. */
  async sweepStale(): Promise<number> {
    let failed = 0;

    for (const candidate of this.store.liveWorkflows()) {
      if (!this.isStale(candidate, this.now())) continue;

      await this.serializer.run(candidate.entity_id, () => {
        const workflow = this.store.get(candidate.entity_id);
        const now = this.now();
        if (workflow !== candidate || !this.isStale(workflow, now)) return;

        const idleFor = now - workflow.last_update;
        this.log.warn({ entity_id: workflow.entity_id, state: workflow.state, idle_ms: idleFor }, 'Stale workflow');
        this.clearPending(workflow);
        this.handleFailure(workflow, 'stale_workflow', `No progress in ${workflow.state} for ${idleFor} ms`);
        failed++;
      });
    }

    return failed;
  }

  private isStale(workflow: Workflow, now: number): boolean {
    if (workflow.state === 'idle' || workflow.state === 'completed' || workflow.state === 'error') return false;

    const limit = workflow.state === 'awaiting_external'
      ? this.config.awaitingExternalTimeoutMs
      : this.config.workflowTimeoutMs;
    return now - workflow.last_update > limit;
  }

  // ── Failure path ────────────────────────────────────────────────────

  /**
   * `→ error`, report on `system.error`, then either `→ idle` with a
   * delayed restart or `→ completed` once retries are exhausted.
   * The caller has already cleared the outstanding request.
   */
  private handleFailure(workflow: Workflow, kind: ErrorKind, reason: string): void {
    const failedIn = workflow.state;
    if (!this.transition(workflow, 'failure', reason)) return;
    workflow.error_count++;
    this.counters.errors++;

    this.publish(
      Channels.systemError,
      createMessage({
        type: 'error',
        payload: {
          entity_id: workflow.entity_id,
          kind,
          message: reason,
          state: failedIn,
          error_count: workflow.error_count,
        },
        sender: ORCHESTRATOR_ID,
        correlation_id: workflow.correlation_id,
        priority: 'high',
        ttl_ms: this.config.messageTtlMs,
        now: this.now(),
      }),
    );

    if (canRetry(workflow)) {
      const attempt = workflow.retry_count + 1;
      if (!this.transition(workflow, 'retry', `Retry ${attempt} of ${workflow.max_retries}`)) return;
      workflow.retry_count = attempt;
      this.counters.retries++;
      this.scheduleRestart(workflow);
      return;
    }

    workflow.failure_reason = reason;
    if (this.transition(workflow, 'retries_exhausted', reason)) {
      this.retire(workflow, 'failed', reason);
    }
  }

  private scheduleRestart(workflow: Workflow): void {
    const entityId = workflow.entity_id;
    const delay = computeBackoff(this.retryPolicy, workflow.retry_count);

    this.log.info({ entity_id: entityId, retry_count: workflow.retry_count, delay_ms: delay }, 'Workflow restart scheduled');

    const timer = setTimeout(() => {
      this.restartTimers.delete(entityId);
      void this.serializer
        .run(entityId, () => {
          const current = this.store.get(entityId);
          if (current !== workflow || current.state !== 'idle') return;

          current.context.results = {};
          current.context.completion = null;
          this.startRun(current, `Restart after failure (retry ${current.retry_count})`);
        })
        .catch((err: unknown) => {
          this.log.error({ err, entity_id: entityId }, 'Workflow restart failed');
        });
    }, delay);

    this.restartTimers.set(entityId, timer);
  }

  // ── Helpers ─────────────────────────────────────────────────────────

  private startRun(workflow: Workflow, reason: string): void {
    if (this.transition(workflow, 'input_received', reason)) {
      this.issueRequest(workflow, 'analysis');
    }
  }

  /** Publishes the request for `stage` and arms its deadline. */
  private issueRequest(workflow: Workflow, stage: Stage): void {
    const now = this.now();
    const channel = this.policy.routeRequest?.({
      entity_id: workflow.entity_id,
      stage,
      escalation: classifyEscalation(workflow.retry_count),
      retry_count: workflow.retry_count,
    }) ?? STAGE_CHANNELS[stage].request;

    const message = createStageRequest(
      stage,
      {
        entity_id: workflow.entity_id,
        attempt: workflow.retry_count,
        context: structuredClone({
          inputs: workflow.context.inputs,
          results: workflow.context.results,
          completion: workflow.context.completion,
          urgency: workflow.context.urgency,
        }),
      },
      {
        sender: ORCHESTRATOR_ID,
        receiver: COLLABORATOR_IDS[stage],
        correlation_id: workflow.correlation_id,
        priority: workflow.context.urgency ?? 'normal',
        ttl_ms: this.config.messageTtlMs,
        now,
      },
    );

    const { deadline } = this.timeouts.registerAfter(
      message.message_id,
      this.config.requestTimeoutMs,
      (id) => this.onDeadlineExpired(id),
    );
    workflow.pending_request = { message_id: message.message_id, stage, channel, issued_at: now, deadline };
    this.pendingIndex.set(message.message_id, workflow.entity_id);

    this.publish(channel, message);
    this.log.debug({ entity_id: workflow.entity_id, stage, channel, message_id: message.message_id }, 'Request issued');
  }

  private clearPending(workflow: Workflow): void {
    const pending = workflow.pending_request;
    if (!pending) return;

    this.timeouts.acknowledge(pending.message_id);
    this.pendingIndex.delete(pending.message_id);
    workflow.pending_request = null;
  }

  private transition(workflow: Workflow, trigger: TransitionTrigger, reason: string): boolean {
    const result = applyTransition(workflow, trigger, reason, this.now());
    if (!result.accepted) {
      this.counters.rejected_transitions++;
      this.log.warn({ err: result.error, entity_id: workflow.entity_id }, 'Transition rejected');
      return false;
    }

    this.log.debug({ entity_id: workflow.entity_id, from: result.from, to: result.to, trigger }, 'Workflow transition');
    return true;
  }

  /** Runs a policy decision; a throwing policy sends the workflow down the failure path. */
  private decide<T>(workflow: Workflow, decision: () => T): T | undefined {
    try {
      return decision();
    } catch (err: unknown) {
      this.log.error({ err, entity_id: workflow.entity_id, policy: this.policy.id }, 'Decision policy threw');
      const message = err instanceof Error ? err.message : String(err);
      this.handleFailure(workflow, 'decision_failed', `Decision policy failed: ${message}`);
      return undefined;
    }
  }

  private retire(workflow: Workflow, outcome: RunOutcome, reason: string): void {
    this.clearPending(workflow);
    const snapshot = this.store.retire(workflow);
    if (outcome === 'succeeded') this.counters.succeeded++;
    else this.counters.failed++;

    this.log.info(
      { entity_id: workflow.entity_id, outcome, reason, retry_count: workflow.retry_count },
      'Workflow retired',
    );

    this.archiveRun(snapshot, outcome);

    this.publish(
      Channels.qualityInsight,
      createMessage({
        type: 'quality_insight',
        payload: {
          entity_id: workflow.entity_id,
          status: outcome,
          reason,
          urgency: workflow.context.urgency,
          retry_count: workflow.retry_count,
          error_count: workflow.error_count,
          results: structuredClone(workflow.context.results),
        },
        sender: ORCHESTRATOR_ID,
        correlation_id: workflow.correlation_id,
        priority: 'low',
        ttl_ms: this.config.messageTtlMs,
        now: this.now(),
      }),
    );
  }

  private archiveRun(snapshot: WorkflowStatus, outcome: RunOutcome): void {
    if (!this.archive) return;

    const write: Promise<void> = this.archive
      .save(snapshot, outcome)
      .catch((err: unknown) => {
        this.log.error({ err, entity_id: snapshot.entity_id }, 'Failed to archive workflow');
      })
      .finally(() => {
        this.archiveWrites.delete(write);
      });
    this.archiveWrites.add(write);
  }

  private publish(channel: string, message: Message): void {
    if (this.bus.publish(channel, message)) return;

    const err = new TransportError(channel);
    this.log.fatal({ err, message_id: message.message_id }, 'Message bus unavailable');
    this.onFatal?.(err);
    throw err;
  }

  private dropStale(message: Message, reason: string): void {
    this.counters.stale_messages_dropped++;
    this.log.warn(
      { message_id: message.message_id, type: message.type, reply_to: message.reply_to, reason },
      'Stale message dropped',
    );
  }

  private async runDuty(
    name: string,
    intervalMs: number,
    duty: () => Promise<unknown>,
    signal: AbortSignal,
  ): Promise<void> {
    while (!signal.aborted) {
      try {
        await duty();
      } catch (err: unknown) {
        this.log.error({ err, duty: name }, 'Orchestrator duty failed');
      }
      await sleep(intervalMs, signal);
    }
  }

  // ── Query surface ───────────────────────────────────────────────────

  /** Deep-copied snapshot, live or retired; `null` for an unknown entity. */
  getWorkflowStatus(entityId: string): WorkflowStatus | null {
    return this.store.status(entityId);
  }

  getStatistics(): OrchestratorStatistics {
    return {
      running: this.running,
      policy: this.policy.id,
      live_workflows: this.store.liveCount,
      by_state: this.store.countByState(),
      retired_workflows: this.store.retiredCount,
      ...this.counters,
      pending_deadlines: this.timeouts.pendingCount,
      pending_restarts: this.restartTimers.size,
      bus: this.bus.stats(),
    };
  }
}
