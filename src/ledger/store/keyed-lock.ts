import { BusyException } from '../exceptions/busy.exception';
import { AccountNumber, lockOrder } from '../ledger.types';

export type Release = () => void;

interface Waiter {
  grant: () => void;
}

/**
 * FIFO exclusive locks keyed by account number, with a bounded wait.
 * The head of each queue holds the lock.
 */
export class KeyedLock {
  private readonly queues = new Map<AccountNumber, Waiter[]>();

  acquire(key: AccountNumber, timeoutMs: number): Promise<Release> {
    return new Promise<Release>((resolve, reject) => {
      const queue = this.queues.get(key) ?? [];
      let timer: NodeJS.Timeout | undefined;

      const waiter: Waiter = {
        grant: () => {
          if (timer !== undefined) {
            clearTimeout(timer);
          }
          resolve(() => this.release(key, waiter));
        },
      };

      queue.push(waiter);
      this.queues.set(key, queue);

      if (queue.length === 1) {
        waiter.grant();
        return;
      }

      timer = setTimeout(() => {
        const index = queue.indexOf(waiter);
        if (index > 0) {
          queue.splice(index, 1);
        }
        reject(
          new BusyException(
            `Timed out after ${timeoutMs}ms waiting for account ${key}`,
          ),
        );
      }, timeoutMs);
    });
  }

  /**
   * Acquires every key in ascending order. If any wait times out, the keys
   * already held are released before the rejection propagates.
   */
  async acquireAll(
    keys: Iterable<AccountNumber>,
    timeoutMs: number,
  ): Promise<Release> {
    const held: Release[] = [];
    try {
      for (const key of lockOrder(keys)) {
        held.push(await this.acquire(key, timeoutMs));
      }
    } catch (error) {
      releaseAll(held);
      throw error;
    }
    return () => releaseAll(held);
  }

  isLocked(key: AccountNumber): boolean {
    return this.queues.has(key);
  }

  private release(key: AccountNumber, waiter: Waiter): void {
    const queue = this.queues.get(key);
    if (!queue || queue[0] !== waiter) {
      return;
    }
    queue.shift();
    const next = queue[0];
    if (next) {
      next.grant();
    } else {
      this.queues.delete(key);
    }
  }
}

function releaseAll(held: Release[]): void {
  for (const release of [...held].reverse()) {
    release();
  }
}
