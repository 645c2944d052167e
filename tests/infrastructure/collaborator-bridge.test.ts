import { EventEmitter } from 'node:events';
import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { Redis } from 'ioredis';
import { MessageBus } from '../../src/application/message-bus.js';
import { createStageResult } from '../../src/application/message-factory.js';
import { startCollaboratorBridge } from '../../src/infrastructure/redis/collaborator-bridge.js';
import type { Message } from '../../src/domain/index.js';
import { fakeLogger, flush, makeRequest } from '../helpers.js';

class FakeSubscriber extends EventEmitter {
  subscribe = vi.fn().mockResolvedValue(5);
  unsubscribe = vi.fn().mockResolvedValue(0);
}

function analysisResult(): Message {
  return createStageResult(
    'analysis',
    { entity_id: 'pump-7', outcome: 'success', data: { predicted_days_to_failure: 12 } },
    { sender: 'remote-analysis', correlation_id: 'corr-1', reply_to: 'req-1' },
  );
}

describe('startCollaboratorBridge', () => {
  let log: ReturnType<typeof fakeLogger>;
  let bus: MessageBus;
  let publish: ReturnType<typeof vi.fn>;
  let subscriber: FakeSubscriber;

  async function start() {
    return startCollaboratorBridge({
      bus,
      publisher: { publish } as unknown as Redis,
      subscriber: subscriber as unknown as Redis,
      log,
    });
  }

  function capture(channel: string): Message[] {
    const messages: Message[] = [];
    bus.subscribe(channel, (message) => {
      messages.push(message);
    });
    return messages;
  }

  beforeEach(() => {
    log = fakeLogger();
    bus = new MessageBus({ log });
    publish = vi.fn().mockResolvedValue(1);
    subscriber = new FakeSubscriber();
  });

  it('subscribes to every inbound channel', async () => {
    await start();

    expect(subscriber.subscribe).toHaveBeenCalledWith(
      'analysis.result',
      'engagement.result',
      'scheduling.result',
      'outcome.result',
      'service.completion',
    );
  });

  it('forwards stage requests to Redis as JSON', async () => {
    const bridge = await start();
    const request = makeRequest('high');

    bus.publish('analysis.request', request);
    await bus.idle();

    expect(bridge.outboundChannels).toEqual(['analysis.request', 'engagement.request', 'scheduling.request', 'outcome.request']);
    expect(publish).toHaveBeenCalledWith('analysis.request', JSON.stringify(request));
  });

  it('republishes a valid inbound result on the bus', async () => {
    await start();
    const results = capture('analysis.result');
    const result = analysisResult();

    subscriber.emit('message', 'analysis.result', JSON.stringify(result));
    await bus.idle();

    expect(results).toEqual([result]);
  });

  it('drops malformed inbound messages', async () => {
    await start();

    subscriber.emit('message', 'analysis.result', '{not json');
    subscriber.emit('message', 'analysis.result', JSON.stringify({ type: 'analysis_result' }));

    expect(bus.stats().published).toBe(0);
    expect(log.warn).toHaveBeenCalledWith(
      expect.objectContaining({ channel: 'analysis.result', err: expect.any(SyntaxError) }),
      'Inbound message is not valid JSON',
    );
    expect(log.warn).toHaveBeenCalledWith(
      expect.objectContaining({ channel: 'analysis.result', issues: expect.any(Array) }),
      'Invalid inbound message dropped',
    );
  });

  it('ignores messages on channels it does not bridge in', async () => {
    await start();

    subscriber.emit('message', 'analysis.request', JSON.stringify(makeRequest()));

    expect(bus.stats().published).toBe(0);
  });

  it('logs a request it could not forward', async () => {
    publish.mockRejectedValue(new Error('connection lost'));
    await start();
    const request = makeRequest();

    bus.publish('analysis.request', request);
    await bus.idle();

    expect(log.warn).toHaveBeenCalledWith(
      expect.objectContaining({ channel: 'analysis.request', message_id: request.message_id, err: expect.any(Error) }),
      'Failed to forward request',
    );
  });

  it('stops bridging in both directions', async () => {
    const bridge = await start();

    await bridge.stop();
    bus.publish('analysis.request', makeRequest());
    subscriber.emit('message', 'analysis.result', JSON.stringify(analysisResult()));
    await flush();

    expect(publish).not.toHaveBeenCalled();
    expect(subscriber.listenerCount('message')).toBe(0);
    expect(subscriber.unsubscribe).toHaveBeenCalledTimes(1);
    expect(bus.stats().published).toBe(1);
  });
});
