/**
 * Write Lock
 *
 * Async mutex serializing knowledge-base writes. Waiters are served in FIFO
 * order; a waiter that cannot get the lock within its timeout is rejected.
 * Readers never take this lock.
 */

import { LockTimeoutError } from '../errors';

export const DEFAULT_LOCK_TIMEOUT_MS = 30_000;

interface Waiter {
  grant: () => void;
}

export class WriteLock {
  private held = false;
  private waiters: Waiter[] = [];

  constructor(private readonly defaultTimeoutMs: number = DEFAULT_LOCK_TIMEOUT_MS) {}

  get isLocked(): boolean {
    return this.held;
  }

  get queueLength(): number {
    return this.waiters.length;
  }

  /**
   * Wait for the lock; resolves with a release function that is safe to call twice
   */
  acquire(timeoutMs: number = this.defaultTimeoutMs): Promise<() => void> {
    if (!this.held) {
      this.held = true;
      return Promise.resolve(this.createRelease());
    }

    return new Promise((resolve, reject) => {
      const waiter: Waiter = {
        grant: () => {
          clearTimeout(timeoutId);
          resolve(this.createRelease());
        },
      };

      const timeoutId = setTimeout(() => {
        const index = this.waiters.indexOf(waiter);
        if (index !== -1) {
          this.waiters.splice(index, 1);
        }
        reject(new LockTimeoutError(timeoutMs));
      }, timeoutMs);

      this.waiters.push(waiter);
    });
  }

  /**
   * Run `fn` while holding the lock
   */
  async runExclusive<T>(fn: () => T | Promise<T>, timeoutMs?: number): Promise<T> {
    const release = await this.acquire(timeoutMs);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  private createRelease(): () => void {
    let released = false;
    return () => {
      if (released) return;
      released = true;

      // Hand the lock straight to the next waiter so nobody can barge in
      const next = this.waiters.shift();
      if (next) {
        next.grant();
      } else {
        this.held = false;
      }
    };
  }
}
