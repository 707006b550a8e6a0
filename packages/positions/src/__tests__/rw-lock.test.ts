import { describe, it, expect, beforeEach } from 'vitest';
import { RwLock } from '../rw-lock.js';

const tick = () => new Promise<void>((resolve) => setTimeout(resolve, 0));

describe('RwLock', () => {
  let lock: RwLock;

  beforeEach(() => {
    lock = new RwLock();
  });

  it('lets readers hold the lock together', async () => {
    const r1 = await lock.acquireRead();
    const r2 = await lock.acquireRead();

    expect(lock.readers).toBe(2);
    expect(lock.pending).toBe(0);

    r1();
    r2();
    expect(lock.readers).toBe(0);
  });

  it('makes readers wait for an active writer', async () => {
    const releaseWrite = await lock.acquireWrite();
    let granted = false;
    const pending = lock.acquireRead().then((release) => {
      granted = true;
      return release;
    });

    await tick();
    expect(granted).toBe(false);
    expect(lock.pending).toBe(1);

    releaseWrite();
    const releaseRead = await pending;
    expect(granted).toBe(true);
    expect(lock.readers).toBe(1);
    releaseRead();
  });

  it('makes a writer wait for active readers', async () => {
    const releaseRead = await lock.acquireRead();
    let granted = false;
    const pending = lock.acquireWrite().then((release) => {
      granted = true;
      return release;
    });

    await tick();
    expect(granted).toBe(false);

    releaseRead();
    const releaseWrite = await pending;
    expect(lock.writing).toBe(true);
    releaseWrite();
    expect(lock.writing).toBe(false);
  });

  it('serves a queued writer before readers that arrive after it', async () => {
    const r1 = await lock.acquireRead();
    const order: string[] = [];
    const writer = lock.acquireWrite().then((release) => {
      order.push('write');
      return release;
    });
    const reader = lock.acquireRead().then((release) => {
      order.push('read');
      return release;
    });

    await tick();
    expect(order).toEqual([]);
    expect(lock.pending).toBe(2);

    r1();
    const releaseWrite = await writer;
    await tick();
    expect(order).toEqual(['write']);
    expect(lock.readers).toBe(0);

    releaseWrite();
    const releaseRead = await reader;
    expect(order).toEqual(['write', 'read']);
    releaseRead();
  });

  it('admits consecutive queued readers together', async () => {
    const releaseWrite = await lock.acquireWrite();
    const a = lock.acquireRead();
    const b = lock.acquireRead();

    releaseWrite();
    const [ra, rb] = await Promise.all([a, b]);
    expect(lock.readers).toBe(2);
    ra();
    rb();
  });

  it('ignores a second call to the same release function', async () => {
    const r1 = await lock.acquireRead();
    await lock.acquireRead();

    r1();
    r1();
    expect(lock.readers).toBe(1);
  });

  it('returns the value from withRead', async () => {
    await expect(lock.withRead(() => 42)).resolves.toBe(42);
    expect(lock.readers).toBe(0);
  });

  it('releases after withWrite throws', async () => {
    await expect(
      lock.withWrite(() => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');

    expect(lock.writing).toBe(false);
  });

  it('releases after an async withRead rejects', async () => {
    await expect(
      lock.withRead(async () => {
        await tick();
        throw new Error('late boom');
      }),
    ).rejects.toThrow('late boom');

    expect(lock.readers).toBe(0);
  });
});
