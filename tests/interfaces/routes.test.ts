import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

vi.mock('../../src/infrastructure/db/index.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../../src/infrastructure/db/index.js')>()),
  findArchivedRuns: vi.fn().mockResolvedValue([]),
}));

import { fastify as createServer } from 'fastify';
import type { FastifyInstance } from 'fastify';
import fp from 'fastify-plugin';
import type { Redis } from 'ioredis';
import { MessageBus } from '../../src/application/message-bus.js';
import { startCollaborator } from '../../src/application/collaborator.js';
import { createStageResult } from '../../src/application/message-factory.js';
import { Orchestrator } from '../../src/application/orchestrator.js';
import { TimeoutManager } from '../../src/application/timeout-manager.js';
import { InMemoryInputSource } from '../../src/infrastructure/ingestion/index.js';
import { findArchivedRuns } from '../../src/infrastructure/db/index.js';
import type { Database } from '../../src/infrastructure/db/index.js';
import { busRoutes, inputRoutes, workflowRoutes } from '../../src/interfaces/http/index.js';
import type { Message } from '../../src/domain/index.js';
import { fakeLogger, flush, makeRequest } from '../helpers.js';

const mockFindArchivedRuns = vi.mocked(findArchivedRuns);

function fakeRedis() {
  return {
    xadd: vi.fn().mockResolvedValue('1-0'),
    ping: vi.fn().mockResolvedValue('PONG'),
  };
}

describe('HTTP routes', () => {
  let app: FastifyInstance;
  let redis: ReturnType<typeof fakeRedis>;
  let bus: MessageBus;
  let timeouts: TimeoutManager;
  let orchestrator: Orchestrator;

  async function buildApp(options: { withDb?: boolean } = {}): Promise<FastifyInstance> {
    app = createServer();

    await app.register(fp(async (instance) => {
      instance.decorate('redis', redis as unknown as Redis);
    }, { name: 'redis' }));

    if (options.withDb) {
      await app.register(fp(async (instance) => {
        instance.decorate('db', {} as Database);
      }, { name: 'db' }));
    }

    await app.register(fp(async (instance) => {
      instance.decorate('bus', bus);
      instance.decorate('orchestrator', orchestrator);
    }, { name: 'orchestrator', dependencies: ['redis'] }));

    await app.register(inputRoutes);
    await app.register(workflowRoutes);
    await app.register(busRoutes);
    await app.ready();
    return app;
  }

  beforeEach(() => {
    vi.clearAllMocks();
    const log = fakeLogger();
    redis = fakeRedis();
    bus = new MessageBus({ log });
    timeouts = new TimeoutManager({ log });
    orchestrator = new Orchestrator({ bus, source: new InMemoryInputSource(), log, timeouts });
  });

  afterEach(async () => {
    await orchestrator.stop();
    timeouts.cancelAll();
    await app.close();
  });

  /** Runs pump-7 up to `awaiting_external` with in-process collaborators. */
  async function driveToAwaitingExternal(): Promise<string> {
    const log = fakeLogger();
    startCollaborator(bus, { stage: 'analysis', log, handle: () => ({ outcome: 'success', data: { predicted_days_to_failure: 3 } }) });
    startCollaborator(bus, { stage: 'engagement', log, handle: () => ({ outcome: 'success', data: { decision: 'accepted' } }) });
    startCollaborator(bus, { stage: 'scheduling', log, handle: () => ({ outcome: 'success', data: { status: 'confirmed' } }) });
    startCollaborator(bus, { stage: 'outcome', log, handle: () => ({ outcome: 'success', data: { satisfaction: 4 } }) });
    orchestrator.start();

    await orchestrator.ingest({ entity_id: 'pump-7' });
    await flush();

    const status = orchestrator.getWorkflowStatus('pump-7');
    expect(status?.state).toBe('awaiting_external');
    return status?.correlation_id ?? '';
  }

  // --- inputs ---

  it('POST /api/v1/inputs appends a valid input', async () => {
    await buildApp();

    const response = await app.inject({
      method: 'POST',
      url: '/api/v1/inputs',
      payload: { entity_id: 'pump-7', payload: { vibration: 0.8 }, received_at: '2026-03-01T10:00:00.000Z' },
    });

    expect(response.statusCode).toBe(202);
    expect(response.json()).toEqual({ status: 'accepted', entity_id: 'pump-7', entry_id: '1-0' });
    expect(redis.xadd).toHaveBeenCalledWith(
      'workflow_inputs', '*',
      'entity_id', 'pump-7',
      'payload', '{"vibration":0.8}',
      'received_at', '2026-03-01T10:00:00.000Z',
    );
  });

  it('POST /api/v1/inputs rejects an invalid input', async () => {
    await buildApp();

    const response = await app.inject({ method: 'POST', url: '/api/v1/inputs', payload: { payload: {} } });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual(expect.objectContaining({ error: 'Validation failed' }));
    expect(redis.xadd).not.toHaveBeenCalled();
  });

  it('POST /api/v1/inputs answers 503 when the stream is unreachable', async () => {
    redis.xadd.mockRejectedValue(new Error('connection refused'));
    await buildApp();

    const response = await app.inject({ method: 'POST', url: '/api/v1/inputs', payload: { entity_id: 'pump-7' } });

    expect(response.statusCode).toBe(503);
    expect(response.json()).toEqual({ error: 'Input stream unavailable' });
  });

  it('POST /api/v1/inputs/batch appends every input', async () => {
    redis.xadd.mockResolvedValueOnce('1-0').mockResolvedValueOnce('2-0');
    await buildApp();

    const response = await app.inject({
      method: 'POST',
      url: '/api/v1/inputs/batch',
      payload: [{ entity_id: 'pump-7' }, { entity_id: 'pump-8' }],
    });

    expect(response.statusCode).toBe(202);
    expect(response.json()).toEqual({ status: 'accepted', count: 2, entry_ids: ['1-0', '2-0'] });
  });

  it('POST /api/v1/inputs/batch rejects the whole batch on one invalid input', async () => {
    await buildApp();

    const response = await app.inject({
      method: 'POST',
      url: '/api/v1/inputs/batch',
      payload: [{ entity_id: 'pump-7' }, { entity_id: '' }],
    });

    expect(response.statusCode).toBe(400);
    expect(redis.xadd).not.toHaveBeenCalled();
  });

  // --- health ---

  it('GET /api/v1/health reports a stopped orchestrator as degraded', async () => {
    await buildApp();

    const response = await app.inject({ method: 'GET', url: '/api/v1/health' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ status: 'degraded', redis: 'PONG', orchestrator: 'stopped' });
  });

  it('GET /api/v1/health answers 503 when Redis does not respond', async () => {
    redis.ping.mockRejectedValue(new Error('timeout'));
    await buildApp();

    const response = await app.inject({ method: 'GET', url: '/api/v1/health' });

    expect(response.statusCode).toBe(503);
    expect(response.json()).toEqual({ status: 'degraded', redis: 'unreachable', orchestrator: 'stopped' });
  });

  // --- workflows ---

  it('GET /api/v1/workflows/:entity_id returns the live status', async () => {
    await buildApp();
    await orchestrator.ingest({ entity_id: 'pump-7', payload: { reading: 1 } });

    const response = await app.inject({ method: 'GET', url: '/api/v1/workflows/pump-7' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual(expect.objectContaining({
      entity_id: 'pump-7',
      state: 'analyzing',
      live: true,
      pending_stage: 'analysis',
    }));
  });

  it('GET /api/v1/workflows/:entity_id answers 404 for an unknown entity', async () => {
    await buildApp();

    const response = await app.inject({ method: 'GET', url: '/api/v1/workflows/nobody' });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toEqual({ error: 'Workflow not found' });
  });

  it('GET /api/v1/workflows/stats returns orchestrator statistics', async () => {
    await buildApp();
    await orchestrator.ingest({ entity_id: 'pump-7' });

    const response = await app.inject({ method: 'GET', url: '/api/v1/workflows/stats' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual(expect.objectContaining({
      running: false,
      policy: 'time-to-failure',
      live_workflows: 1,
      started: 1,
      pending_deadlines: 1,
    }));
  });

  it('GET /api/v1/workflows/:entity_id/archive answers 503 without the db plugin', async () => {
    await buildApp();

    const response = await app.inject({ method: 'GET', url: '/api/v1/workflows/pump-7/archive' });

    expect(response.statusCode).toBe(503);
    expect(response.json()).toEqual({ error: 'Workflow archive is not enabled' });
  });

  it('GET /api/v1/workflows/:entity_id/archive rejects a non-integer limit', async () => {
    await buildApp({ withDb: true });

    const response = await app.inject({ method: 'GET', url: '/api/v1/workflows/pump-7/archive?limit=abc' });

    expect(response.statusCode).toBe(400);
    expect(mockFindArchivedRuns).not.toHaveBeenCalled();
  });

  it('GET /api/v1/workflows/:entity_id/archive lists archived runs', async () => {
    await buildApp({ withDb: true });

    const response = await app.inject({ method: 'GET', url: '/api/v1/workflows/pump-7/archive?limit=5' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ entity_id: 'pump-7', data: [], pagination: { limit: 5, count: 0 } });
    expect(mockFindArchivedRuns).toHaveBeenCalledWith(expect.anything(), 'pump-7', 5);
  });

  it('POST /api/v1/workflows/:entity_id/completion completes an awaiting workflow', async () => {
    await buildApp();
    const correlationId = await driveToAwaitingExternal();

    const response = await app.inject({
      method: 'POST',
      url: '/api/v1/workflows/pump-7/completion',
      payload: { data: { closed_by: 'tech-1' } },
    });

    expect(response.statusCode).toBe(202);
    expect(response.json()).toEqual({ status: 'accepted', entity_id: 'pump-7', correlation_id: correlationId });

    await flush();
    const status = orchestrator.getWorkflowStatus('pump-7');
    expect(status?.state).toBe('completed');
    expect(status?.context.completion).toEqual({ closed_by: 'tech-1' });
  });

  it('POST /api/v1/workflows/:entity_id/completion rejects a foreign correlation id', async () => {
    await buildApp();
    await driveToAwaitingExternal();

    const response = await app.inject({
      method: 'POST',
      url: '/api/v1/workflows/pump-7/completion',
      payload: { correlation_id: 'another-run' },
    });

    expect(response.statusCode).toBe(409);
    expect(response.json()).toEqual({ error: 'Correlation id does not match the live workflow' });
    expect(orchestrator.getWorkflowStatus('pump-7')?.state).toBe('awaiting_external');
  });

  it('POST /api/v1/workflows/:entity_id/completion answers 409 before the workflow awaits completion', async () => {
    await buildApp();
    await orchestrator.ingest({ entity_id: 'pump-7' });

    const response = await app.inject({ method: 'POST', url: '/api/v1/workflows/pump-7/completion', payload: {} });

    expect(response.statusCode).toBe(409);
    expect(response.json()).toEqual({ error: 'Workflow is not awaiting completion', state: 'analyzing' });
  });

  it('POST /api/v1/workflows/:entity_id/completion answers 404 without a live workflow', async () => {
    await buildApp();

    const response = await app.inject({ method: 'POST', url: '/api/v1/workflows/nobody/completion', payload: {} });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toEqual({ error: 'No live workflow for entity' });
  });

  it('POST /api/v1/workflows/:entity_id/completion rejects non-object data', async () => {
    await buildApp();

    const response = await app.inject({
      method: 'POST',
      url: '/api/v1/workflows/pump-7/completion',
      payload: { data: 'done' },
    });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual(expect.objectContaining({ error: 'Validation failed' }));
  });

  // --- bus ---

  it('POST /api/v1/bus/:channel/publish feeds an external result to the orchestrator', async () => {
    await buildApp();
    const requests: Message[] = [];
    bus.subscribe('analysis.request', (message) => {
      requests.push(message);
    });
    orchestrator.start();
    await orchestrator.ingest({ entity_id: 'pump-7' });
    await flush();

    const request = requests[0];
    expect(request).toBeDefined();
    if (!request) return;
    const result = createStageResult(
      'analysis',
      { entity_id: 'pump-7', outcome: 'success', data: { predicted_days_to_failure: 90 } },
      { sender: 'remote-analysis', correlation_id: request.correlation_id, reply_to: request.message_id },
    );

    const response = await app.inject({ method: 'POST', url: '/api/v1/bus/analysis.result/publish', payload: result });

    expect(response.statusCode).toBe(202);
    expect(response.json()).toEqual({ status: 'accepted', channel: 'analysis.result', message_id: result.message_id });

    await flush();
    expect(orchestrator.getWorkflowStatus('pump-7')?.state).toBe('completed');
  });

  it('POST /api/v1/bus/:channel/publish refuses channels that only carry internal traffic', async () => {
    await buildApp();

    const response = await app.inject({
      method: 'POST',
      url: '/api/v1/bus/analysis.request/publish',
      payload: makeRequest(),
    });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual(expect.objectContaining({ error: 'Channel does not accept external messages' }));
    expect(bus.stats().published).toBe(0);
  });

  it('POST /api/v1/bus/:channel/publish rejects a malformed message', async () => {
    await buildApp();

    const response = await app.inject({
      method: 'POST',
      url: '/api/v1/bus/outcome.result/publish',
      payload: { type: 'outcome_result' },
    });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual(expect.objectContaining({ error: 'Validation failed' }));
    expect(bus.stats().published).toBe(0);
  });


  it('GET /api/v1/bus/log returns the most recent entries', async () => {
    await buildApp();
    bus.publish('analysis.request', makeRequest());
    bus.publish('analysis.request', makeRequest());

    const response = await app.inject({ method: 'GET', url: '/api/v1/bus/log?limit=1' });

    expect(response.statusCode).toBe(200);
    const body = response.json();
    expect(body.total_logged).toBe(2);
    expect(body.pagination).toEqual({ limit: 1, count: 1 });
    expect(body.data[0].seq).toBe(2);
  });

  it('GET /api/v1/bus/stats returns per-channel counters', async () => {
    await buildApp();
    bus.publish('analysis.request', makeRequest());

    const response = await app.inject({ method: 'GET', url: '/api/v1/bus/stats' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual(expect.objectContaining({
      published: 1,
      channels: { 'analysis.request': { subscribers: 0, queue_depth: 0, published: 1 } },
    }));
  });
});
