/**
 * Asynchronous reader/writer lock.
 *
 * Any number of readers may hold the lock together; a writer holds it
 * alone. Waiters are served strictly in arrival order, so a queued writer
 * holds back the readers that arrive after it and is never starved.
 *
 * @module positions/rw-lock
 */
import type { Release } from './types.js';

interface Waiter {
  mode: 'read' | 'write';
  grant: (release: Release) => void;
}

export class RwLock {
  private activeReaders = 0;
  private activeWriter = false;
  private readonly waiters: Waiter[] = [];

  /** Number of readers currently holding the lock. */
  get readers(): number {
    return this.activeReaders;
  }

  /** Whether a writer currently holds the lock. */
  get writing(): boolean {
    return this.activeWriter;
  }

  /** Number of callers waiting for the lock. */
  get pending(): number {
    return this.waiters.length;
  }

  /**
   * Acquire shared access.
   *
   * @returns A release function. Calling it more than once is a no-op.
   */
  acquireRead(): Promise<Release> {
    if (!this.activeWriter && this.waiters.length === 0) {
      this.activeReaders++;
      return Promise.resolve(this.releaser('read'));
    }
    return new Promise((grant) => {
      this.waiters.push({ mode: 'read', grant });
    });
  }

  /**
   * Acquire exclusive access.
   *
   * @returns A release function. Calling it more than once is a no-op.
   */
  acquireWrite(): Promise<Release> {
    if (!this.activeWriter && this.activeReaders === 0 && this.waiters.length === 0) {
      this.activeWriter = true;
      return Promise.resolve(this.releaser('write'));
    }
    return new Promise((grant) => {
      this.waiters.push({ mode: 'write', grant });
    });
  }

  /** Run `fn` under shared access, releasing when it settles. */
  async withRead<T>(fn: () => T | Promise<T>): Promise<T> {
    const release = await this.acquireRead();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  /** Run `fn` under exclusive access, releasing when it settles. */
  async withWrite<T>(fn: () => T | Promise<T>): Promise<T> {
    const release = await this.acquireWrite();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  private releaser(mode: 'read' | 'write'): Release {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      if (mode === 'read') {
        this.activeReaders--;
      } else {
        this.activeWriter = false;
      }
      this.dispatch();
    };
  }

  /** Hand the lock to as many queued waiters as the current state admits. */
  private dispatch(): void {
    while (this.waiters.length > 0 && !this.activeWriter) {
      const next = this.waiters[0];
      if (next.mode === 'write') {
        if (this.activeReaders > 0) return;
        this.waiters.shift();
        this.activeWriter = true;
        next.grant(this.releaser('write'));
        return;
      }
      this.waiters.shift();
      this.activeReaders++;
      next.grant(this.releaser('read'));
    }
  }
}
