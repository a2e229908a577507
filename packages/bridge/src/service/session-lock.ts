/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { CommandCancelled } from '../errors.js';

type Waiter = {
  grant: (release: () => void) => void;
};

/**
 * FIFO mutex around the analyzer session. A command holds it for its whole
 * multi-step exchange; waiters are granted in submission order.
 */
export class SessionLock {
  private held = false;
  private readonly queue: Waiter[] = [];

  get locked(): boolean {
    return this.held;
  }

  get waiting(): number {
    return this.queue.length;
  }

  /**
   * Resolves with a release function once the lock is granted. Aborting
   * `signal` while still queued removes the waiter and rejects with
   * `CommandCancelled`.
   */
  acquire(signal?: AbortSignal, command?: string): Promise<() => void> {
    if (signal?.aborted) {
      return Promise.reject(new CommandCancelled(command));
    }
    if (!this.held) {
      this.held = true;
      return Promise.resolve(this.createRelease());
    }

    return new Promise<() => void>((resolve, reject) => {
      const onAbort = (): void => {
        const index = this.queue.indexOf(waiter);
        if (index !== -1) {
          this.queue.splice(index, 1);
          reject(new CommandCancelled(command));
        }
      };
      const waiter: Waiter = {
        grant: (release) => {
          signal?.removeEventListener('abort', onAbort);
          resolve(release);
        },
      };
      this.queue.push(waiter);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  async runExclusive<T>(
    task: () => Promise<T>,
    signal?: AbortSignal,
  ): Promise<T> {
    const release = await this.acquire(signal);
    try {
      return await task();
    } finally {
      release();
    }
  }

  private createRelease(): () => void {
    let released = false;
    return () => {
      if (released) {
        return;
      }
      released = true;
      const next = this.queue.shift();
      if (next) {
        next.grant(this.createRelease());
      } else {
        this.held = false;
      }
    };
  }
}
