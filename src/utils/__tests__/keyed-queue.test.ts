import { describe, it, expect } from 'vitest';
import { KeyedQueue } from '../keyed-queue';

function deferred<T>() {
  let resolve: (value: T) => void = () => {};
  let reject: (reason: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

describe('KeyedQueue', () => {
  it('should run tasks for the same key in order', async () => {
    const queue = new KeyedQueue();
    const events: string[] = [];
    const gate = deferred<void>();

    const first = queue.run('c1', async () => {
      events.push('first:start');
      await gate.promise;
      events.push('first:end');
      return 1;
    });
    const second = queue.run('c1', async () => {
      events.push('second:start');
      return 2;
    });

    await Promise.resolve();
    expect(events).toEqual(['first:start']);

    gate.resolve();
    expect(await first).toBe(1);
    expect(await second).toBe(2);
    expect(events).toEqual(['first:start', 'first:end', 'second:start']);
  });

  it('should not block other keys', async () => {
    const queue = new KeyedQueue();
    const gate = deferred<void>();

    const blocked = queue.run('c1', () => gate.promise.then(() => 'c1'));
    const other = await queue.run('c2', async () => 'c2');

    expect(other).toBe('c2');
    gate.resolve();
    expect(await blocked).toBe('c1');
  });

  it('should keep going after a failed task', async () => {
    const queue = new KeyedQueue();

    const failing = queue.run('c1', async () => {
      throw new Error('boom');
    });
    const next = queue.run('c1', async () => 'ok');

    await expect(failing).rejects.toThrow('boom');
    expect(await next).toBe('ok');
  });

  it('should forget keys once their work settles', async () => {
    const queue = new KeyedQueue();
    await queue.run('c1', async () => undefined);
    await new Promise((resolve) => setTimeout(resolve, 0));
    expect(queue.size()).toBe(0);
  });
});
