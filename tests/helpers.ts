import { vi } from 'vitest';
import type { Logger } from 'pino';
import type { Message, Priority } from '../src/domain/index.js';
import { createMessage } from '../src/application/message-factory.js';

/** Minimal fake logger. `child()` returns the same fake. */
export function fakeLogger() {
  const log = {
    fatal: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    info: vi.fn(),
    debug: vi.fn(),
    trace: vi.fn(),
    child: vi.fn(),
  };
  log.child.mockReturnValue(log);
  return log as unknown as Logger;
}

let counter = 0;

/**
 * Factory for analysis requests with sensible defaults.
 * `attempt` doubles as a sequence marker in ordering tests.
 */
export function makeRequest(
  priority: Priority = 'normal',
  overrides: { attempt?: number; entity_id?: string; now?: number; ttl_ms?: number } = {},
): Message {
  counter++;
  return createMessage({
    type: 'analysis_request',
    payload: {
      entity_id: overrides.entity_id ?? `entity-${counter}`,
      attempt: overrides.attempt ?? 0,
      context: {},
    },
    sender: 'test',
    correlation_id: `corr-${counter}`,
    priority,
    ttl_ms: overrides.ttl_ms,
    now: overrides.now,
  });
}

/** Attempt number of a request built by `makeRequest`. */
export function attemptOf(message: Message): number | undefined {
  return message.type === 'analysis_request' ? message.payload.attempt : undefined;
}

/** Resolves once every queued microtask has run. */
export function flush(): Promise<void> {
  return new Promise((resolve) => {
    setImmediate(resolve);
  });
}
