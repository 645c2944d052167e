import { describe, it, expect } from 'vitest';
import { KeyedSerializer } from '../../src/application/keyed-serializer.js';

function deferred() {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('KeyedSerializer', () => {
  it('runs tasks for one key strictly in order', async () => {
    const serializer = new KeyedSerializer();
    const events: string[] = [];
    const gate = deferred();

    const first = serializer.run('a', async () => {
      events.push('start-1');
      await gate.promise;
      events.push('end-1');
    });
    const second = serializer.run('a', () => {
      events.push('run-2');
    });

    await Promise.resolve();
    await Promise.resolve();
    expect(events).toEqual(['start-1']);

    gate.resolve();
    await Promise.all([first, second]);
    expect(events).toEqual(['start-1', 'end-1', 'run-2']);
  });

  it('lets different keys interleave', async () => {
    const serializer = new KeyedSerializer();
    const gate = deferred();
    const events: string[] = [];

    const blocked = serializer.run('a', async () => {
      await gate.promise;
      events.push('a');
    });
    await serializer.run('b', () => {
      events.push('b');
    });

    expect(events).toEqual(['b']);
    gate.resolve();
    await blocked;
    expect(events).toEqual(['b', 'a']);
  });

  it('keeps the chain alive after a rejected task', async () => {
    const serializer = new KeyedSerializer();

    await expect(serializer.run('a', () => {
      throw new Error('boom');
    })).rejects.toThrow('boom');
    await expect(serializer.run('a', () => 7)).resolves.toBe(7);
  });

  it('forgets a key once its chain settles', async () => {
    const serializer = new KeyedSerializer();
    const gate = deferred();

    const task = serializer.run('a', () => gate.promise);
    expect(serializer.activeKeys).toBe(1);

    gate.resolve();
    await task;
    await serializer.drain();
    expect(serializer.activeKeys).toBe(0);
  });
});
