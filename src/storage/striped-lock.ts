import { LockTimeoutError } from '../core/errors.js';
import type { SessionId } from '../core/session.js';

interface Waiter {
  key: SessionId;
  grant: () => void;
}

interface Stripe {
  owner?: SessionId;
  waiters: Waiter[];
}

function hashKey(key: SessionId): number {
  if (typeof key === 'number' && Number.isSafeInteger(key)) {
    return Math.abs(key);
  }
  const text = String(key);
  let hash = 0;
  for (let i = 0; i < text.length; i++) {
    hash = (Math.imul(31, hash) + text.charCodeAt(i)) | 0;
  }
  return Math.abs(hash);
}

/**
 * StripedLock is a set of async mutexes that keys hash onto. Two keys on the same
 * stripe exclude each other, which bounds memory at the cost of occasional false
 * contention. Waiters on a stripe are granted the lock in arrival order.
 */
export class StripedLock {
  private stripes: Stripe[];

  constructor(stripeCount = 1000) {
    if (!Number.isInteger(stripeCount) || stripeCount < 1) {
      throw new RangeError(`Stripe count must be a positive integer, got ${stripeCount}`);
    }
    this.stripes = Array.from({ length: stripeCount }, () => ({ waiters: [] }));
  }

  stripeOf(key: SessionId): number {
    return hashKey(key) % this.stripes.length;
  }

  acquire(key: SessionId, timeoutMs?: number): Promise<void> {
    const stripe = this.stripes[this.stripeOf(key)];

    if (stripe.owner === undefined) {
      stripe.owner = key;
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      let timer: NodeJS.Timeout | undefined;
      const waiter: Waiter = {
        key,
        grant: () => {
          if (timer) clearTimeout(timer);
          resolve();
        },
      };
      stripe.waiters.push(waiter);

      if (timeoutMs !== undefined) {
        timer = setTimeout(() => {
          const index = stripe.waiters.indexOf(waiter);
          if (index !== -1) {
            stripe.waiters.splice(index, 1);
            reject(new LockTimeoutError(key, timeoutMs));
          }
        }, timeoutMs);
      }
    });
  }

  /**
   * Releases the stripe held for `key`. Returns false, and changes nothing, when
   * `key` is not the current owner.
   */
  release(key: SessionId): boolean {
    const stripe = this.stripes[this.stripeOf(key)];
    if (stripe.owner === undefined || stripe.owner !== key) {
      return false;
    }

    const next = stripe.waiters.shift();
    if (next) {
      stripe.owner = next.key;
      next.grant();
    } else {
      stripe.owner = undefined;
    }
    return true;
  }

  isLocked(key: SessionId): boolean {
    return this.stripes[this.stripeOf(key)].owner === key;
  }

  waiting(key: SessionId): number {
    return this.stripes[this.stripeOf(key)].waiters.length;
  }
}
