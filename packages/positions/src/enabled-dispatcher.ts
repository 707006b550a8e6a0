/**
 * Fan-out of enabled-set snapshots to registered subscribers.
 *
 * Each subscriber gets its own {@link DeliveryQueue}, so a slow handler only
 * delays its own snapshots. Subscriptions are kept in registration order and
 * every publish hands each of them a fresh copy of the snapshot.
 *
 * @module positions/enabled-dispatcher
 */
import { monotonicFactory } from 'ulidx';
import type { Logger } from '@meshsim/shared/logger';
import { DeliveryQueue } from './delivery-queue.js';
import type {
  EnabledChangedHandler,
  NotificationConfig,
  SubscriptionInfo,
  Unsubscribe,
} from './types.js';

/** ULID generator for subscription IDs. Monotonic to guarantee ordering. */
const generateUlid = monotonicFactory();

interface SubscriptionEntry {
  queue: DeliveryQueue;
  createdAt: string;
}

export class EnabledSetDispatcher {
  /** Subscription ID -> entry mapping, in registration order. */
  private readonly subscriptions = new Map<string, SubscriptionEntry>();

  constructor(
    private readonly config: Omit<NotificationConfig, 'initialSnapshot'>,
    private readonly logger: Logger,
  ) {}

  /**
   * Add a subscriber.
   *
   * The caller is expected to hold the membership lock exclusively.
   *
   * @returns The subscription ID and a function that removes the subscription
   *   and discards its undelivered snapshots
   */
  subscribe(handler: EnabledChangedHandler): { id: string; unsubscribe: Unsubscribe } {
    const id = generateUlid();
    const queue = new DeliveryQueue(id, handler, {
      maxQueueSize: this.config.maxQueueSize,
      pressureWarningAt: this.config.pressureWarningAt,
      overflow: this.config.overflow,
      logger: this.logger,
    });

    this.subscriptions.set(id, { queue, createdAt: new Date().toISOString() });
    this.logger.debug('[positions] enabled-set subscriber registered', { subscription: id });

    return {
      id,
      unsubscribe: () => {
        const entry = this.subscriptions.get(id);
        if (!entry) return;
        entry.queue.close();
        this.subscriptions.delete(id);
      },
    };
  }

  /**
   * Queue a snapshot for every subscriber, in registration order.
   *
   * Resolves once every queue has accepted its copy.
   */
  async publish(snapshot: readonly number[]): Promise<void> {
    for (const entry of this.subscriptions.values()) {
      await entry.queue.push([...snapshot]);
    }
  }

  /** Queue a snapshot for one subscriber only. */
  async publishTo(id: string, snapshot: readonly number[]): Promise<void> {
    await this.subscriptions.get(id)?.queue.push([...snapshot]);
  }

  /** Resolve once every subscriber queue is drained. */
  async flush(): Promise<void> {
    for (const entry of this.subscriptions.values()) {
      await entry.queue.flush();
    }
  }

  listSubscriptions(): SubscriptionInfo[] {
    const result: SubscriptionInfo[] = [];

    for (const [id, entry] of this.subscriptions.entries()) {
      result.push({
        id,
        createdAt: entry.createdAt,
        queueDepth: entry.queue.depth,
        delivered: entry.queue.delivered,
        dropped: entry.queue.dropped,
      });
    }

    return result;
  }
}
