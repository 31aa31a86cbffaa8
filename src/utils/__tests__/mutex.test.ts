import { describe, it, expect } from 'vitest';
import { KeyedMutex } from '../mutex.js';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve = (): void => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('KeyedMutex', () => {
  it('runs work under one key in submission order', async () => {
    const mutex = new KeyedMutex();
    const gate = deferred();
    const order: string[] = [];

    const first = mutex.runExclusive('keep', async () => {
      await gate.promise;
      order.push('first');
    });
    const second = mutex.runExclusive('keep', async () => {
      order.push('second');
    });

    expect(mutex.isLocked('keep')).toBe(true);
    gate.resolve();
    await Promise.all([first, second]);

    expect(order).toEqual(['first', 'second']);
    expect(mutex.isLocked('keep')).toBe(false);
  });

  it('does not make other keys wait', async () => {
    const mutex = new KeyedMutex();
    const gate = deferred();
    const blocked = mutex.runExclusive('keep', () => gate.promise);

    await expect(mutex.runExclusive('crypt', async () => 'done')).resolves.toBe('done');
    gate.resolve();
    await blocked;
  });

  it('keeps going after a failure', async () => {
    const mutex = new KeyedMutex();
    const failed = mutex.runExclusive('keep', async () => {
      throw new Error('boom');
    });
    const next = mutex.runExclusive('keep', async () => 2);

    await expect(failed).rejects.toThrow('boom');
    await expect(next).resolves.toBe(2);
  });

  it('drain waits for queued work', async () => {
    const mutex = new KeyedMutex();
    const gate = deferred();
    let finished = false;
    const work = mutex.runExclusive('keep', async () => {
      await gate.promise;
      finished = true;
    });

    const drained = mutex.drain();
    gate.resolve();
    await drained;
    expect(finished).toBe(true);
    await work;
  });
});
