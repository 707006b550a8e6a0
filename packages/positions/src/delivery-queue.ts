/**
 * Bounded FIFO delivery queue for a single enabled-set subscriber.
 *
 * Snapshots are pushed by the membership mutator and handed to the
 * subscriber's handler one at a time by a dispatch loop owned by the queue.
 * The mutator waits for the push only, never for the handler. When the
 * queue is full the configured {@link OverflowPolicy} decides between
 * waiting for room and discarding the oldest snapshot.
 *
 * @module positions/delivery-queue
 */
import type { Logger } from '@meshsim/shared/logger';
import { logError } from '@meshsim/shared/logger';
import { checkQueuePressure, isPressureWarning } from './queue-pressure.js';
import type { EnabledChangedHandler, OverflowPolicy, QueuePressureConfig } from './types.js';

export interface DeliveryQueueOptions extends QueuePressureConfig {
  overflow: OverflowPolicy;
  logger: Logger;
}

export class DeliveryQueue {
  private readonly items: (readonly number[])[] = [];
  private readonly spaceWaiters: Array<() => void> = [];
  private running = false;
  private closed = false;
  private idle: Promise<void> = Promise.resolve();
  private deliveredCount = 0;
  private droppedCount = 0;

  constructor(
    readonly id: string,
    private readonly handler: EnabledChangedHandler,
    private readonly options: DeliveryQueueOptions,
  ) {
    if (!Number.isInteger(options.maxQueueSize) || options.maxQueueSize < 1) {
      throw new Error(`Invalid maxQueueSize: ${options.maxQueueSize}`);
    }
  }

  /** Snapshots waiting for the handler. */
  get depth(): number {
    return this.items.length;
  }

  /** Snapshots the handler has finished with, including ones it threw on. */
  get delivered(): number {
    return this.deliveredCount;
  }

  get dropped(): number {
    return this.droppedCount;
  }

  /**
   * Queue a snapshot for delivery.
   *
   * Resolves once the snapshot is queued. Under the `block` policy that may
   * mean waiting for the handler to make room. Pushing to a closed queue
   * is a no-op.
   */
  async push(snapshot: readonly number[]): Promise<void> {
    let check = checkQueuePressure(this.items.length, this.options);
    while (!check.allowed && !this.closed) {
      if (this.options.overflow === 'drop-oldest') {
        this.items.shift();
        this.droppedCount++;
        this.options.logger.warn(`[positions] ${check.reason}, dropped oldest snapshot`, {
          subscription: this.id,
        });
      } else {
        this.options.logger.debug(`[positions] ${check.reason}, waiting for subscriber`, {
          subscription: this.id,
        });
        await new Promise<void>((resolve) => this.spaceWaiters.push(resolve));
      }
      check = checkQueuePressure(this.items.length, this.options);
    }
    if (this.closed) return;

    this.items.push(snapshot);

    const after = checkQueuePressure(this.items.length, this.options);
    if (isPressureWarning(after, this.options)) {
      this.options.logger.warn('[positions] subscriber queue under pressure', {
        subscription: this.id,
        depth: after.depth,
        pressure: after.pressure,
      });
    }

    this.kick();
  }

  /** Resolve once every queued snapshot has been handed to the handler. */
  async flush(): Promise<void> {
    while (this.running) {
      await this.idle;
    }
  }

  /** Discard queued snapshots and stop accepting new ones. */
  close(): void {
    this.closed = true;
    this.items.length = 0;
    this.wakeWriters();
  }

  private kick(): void {
    if (this.running) return;
    this.running = true;
    this.idle = this.drain();
  }

  private async drain(): Promise<void> {
    try {
      // Handlers run on a later microtask, off the pusher's call stack.
      await Promise.resolve();
      for (let snapshot = this.items.shift(); snapshot !== undefined; snapshot = this.items.shift()) {
        this.wakeWriters();
        try {
          await this.handler(snapshot);
        } catch (err) {
          this.options.logger.warn('[positions] enabled-set handler failed', {
            subscription: this.id,
            ...logError(err),
          });
        }
        this.deliveredCount++;
      }
    } finally {
      this.running = false;
    }
  }

  private wakeWriters(): void {
    for (const resolve of this.spaceWaiters.splice(0)) {
      resolve();
    }
  }
}
