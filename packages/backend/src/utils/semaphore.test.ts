import { describe, expect, it } from 'vitest';
import { Semaphore } from './semaphore.js';

describe('Semaphore', () => {
  it('hands permits to waiters in FIFO order', async () => {
    const semaphore = new Semaphore(1);
    const order: string[] = [];

    await semaphore.acquire();
    const first = semaphore.acquire().then(() => order.push('first'));
    const second = semaphore.acquire().then(() => order.push('second'));
    expect(semaphore.inUse).toBe(1);

    semaphore.release();
    await first;
    semaphore.release();
    await second;

    expect(order).toEqual(['first', 'second']);
    semaphore.release();
    expect(semaphore.inUse).toBe(0);
  });

  it('releases the permit when the task fails', async () => {
    const semaphore = new Semaphore(1);
    await expect(semaphore.run(async () => Promise.reject(new Error('boom')))).rejects.toThrow('boom');
    expect(semaphore.inUse).toBe(0);
  });

  it('rejects invalid permit counts', () => {
    expect(() => new Semaphore(0)).toThrow(RangeError);
  });
});
