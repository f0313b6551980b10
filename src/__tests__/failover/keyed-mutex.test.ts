import { describe, test, expect } from 'vitest';
import { KeyedMutex } from '../../failover/keyed-mutex.js';
import { deferred } from '../helpers/agents.js';

describe('KeyedMutex', () => {
  test('work under one key runs in order', async () => {
    const mutex = new KeyedMutex();
    const gate = deferred<void>();
    const order: string[] = [];

    const first = mutex.run('k', async () => {
      await gate.promise;
      order.push('first');
    });
    const second = mutex.run('k', () => {
      order.push('second');
    });

    gate.resolve();
    await Promise.all([first, second]);
    expect(order).toEqual(['first', 'second']);
  });

  test('different keys do not wait on each other', async () => {
    const mutex = new KeyedMutex();
    const gate = deferred<void>();
    const blocked = mutex.run('a', () => gate.promise);

    await expect(mutex.run('b', () => 42)).resolves.toBe(42);

    gate.resolve();
    await blocked;
  });

  test('a rejected task does not block the next one', async () => {
    const mutex = new KeyedMutex();
    const failing = mutex.run('k', () => {
      throw new Error('nope');
    });

    await expect(failing).rejects.toThrow('nope');
    await expect(mutex.run('k', () => 'ok')).resolves.toBe('ok');
  });

  test('keys are released once their queue drains', async () => {
    const mutex = new KeyedMutex();
    await mutex.run('k', () => undefined);
    await new Promise((r) => setImmediate(r));
    expect(mutex.pending).toBe(0);
  });
});
