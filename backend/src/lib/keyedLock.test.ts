import { describe, it, expect } from 'vitest';
import { KeyedLock } from './keyedLock.js';

function deferred() {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('KeyedLock', () => {
  it('runs tasks on a shared key in submission order', async () => {
    const lock = new KeyedLock();
    const order: string[] = [];
    const gate = deferred();

    const first = lock.run(['CERT:1'], async () => {
      await gate.promise;
      order.push('first');
    });
    const second = lock.run(['CERT:1'], async () => {
      order.push('second');
    });

    gate.resolve();
    await Promise.all([first, second]);
    expect(order).toEqual(['first', 'second']);
  });

  it('runs tasks with disjoint keys concurrently', async () => {
    const lock = new KeyedLock();
    const order: string[] = [];
    const gate = deferred();

    const blocked = lock.run(['CERT:1'], async () => {
      await gate.promise;
      order.push('blocked');
    });
    await lock.run(['CERT:2'], async () => {
      order.push('free');
    });

    gate.resolve();
    await blocked;
    expect(order).toEqual(['free', 'blocked']);
  });

  it('waits for every key a task registers', async () => {
    const lock = new KeyedLock();
    const order: string[] = [];
    const gate = deferred();

    const holder = lock.run(['NAME:acme'], async () => {
      await gate.promise;
      order.push('holder');
    });
    const both = lock.run(['CERT:1', 'NAME:acme'], async () => {
      order.push('both');
    });

    gate.resolve();
    await Promise.all([holder, both]);
    expect(order).toEqual(['holder', 'both']);
  });

  it('releases keys when a task throws', async () => {
    const lock = new KeyedLock();

    await expect(
      lock.run(['CERT:1'], async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    await expect(lock.run(['CERT:1'], async () => 'next')).resolves.toBe('next');
    expect(lock.size).toBe(0);
  });
});
