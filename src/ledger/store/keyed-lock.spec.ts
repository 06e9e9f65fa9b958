import { BusyException } from '../exceptions/busy.exception';
import { KeyedLock } from './keyed-lock';

describe('KeyedLock', () => {
  it('should grant waiters in arrival order', async () => {
    const lock = new KeyedLock();
    const order: string[] = [];

    const first = await lock.acquire(1, 100);
    const second = lock.acquire(1, 100).then((release) => {
      order.push('second');
      release();
    });
    const third = lock.acquire(1, 100).then((release) => {
      order.push('third');
      release();
    });

    order.push('first');
    first();
    await Promise.all([second, third]);

    expect(order).toEqual(['first', 'second', 'third']);
    expect(lock.isLocked(1)).toBe(false);
  });

  it('should reject with Busy after the timeout and keep the queue intact', async () => {
    const lock = new KeyedLock();
    const holder = await lock.acquire(7, 100);

    await expect(lock.acquire(7, 10)).rejects.toThrow(BusyException);

    holder();
    expect(lock.isLocked(7)).toBe(false);
  });

  it('should treat a second release as a no-op', async () => {
    const lock = new KeyedLock();
    const first = await lock.acquire(3, 100);
    const pending = lock.acquire(3, 100);

    first();
    const second = await pending;
    first();

    expect(lock.isLocked(3)).toBe(true);
    second();
    expect(lock.isLocked(3)).toBe(false);
  });

  it('should release already held keys when a later key times out', async () => {
    const lock = new KeyedLock();
    const blocker = await lock.acquire(20, 100);

    await expect(lock.acquireAll([20, 10], 10)).rejects.toThrow(BusyException);

    expect(lock.isLocked(10)).toBe(false);
    blocker();
  });

  it('should lock keys in ascending order regardless of argument order', async () => {
    const lock = new KeyedLock();
    const acquired: number[] = [];
    const acquire = lock.acquire.bind(lock);
    jest.spyOn(lock, 'acquire').mockImplementation((key, timeoutMs) => {
      acquired.push(key);
      return acquire(key, timeoutMs);
    });

    const release = await lock.acquireAll([30, 10, 20, 10], 100);
    release();

    expect(acquired).toEqual([10, 20, 30]);
  });
});
