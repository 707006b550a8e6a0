/**
 * Enabled flags for every slot plus the enabled-set subscriber list.
 *
 * Both are guarded by one membership lock, separate from the per-slot
 * position locks. Enable, disable and registration take it exclusively;
 * `isEnabled` and `enabled` share it.
 *
 * @module positions/membership-table
 */
import type { Logger } from '@meshsim/shared/logger';
import { assertIndex } from './errors.js';
import type { EnabledSetDispatcher } from './enabled-dispatcher.js';
import { RwLock } from './rw-lock.js';
import type { EnabledChangedHandler, MembershipView, Unsubscribe } from './types.js';

export class MembershipTable implements MembershipView {
  private readonly flags: boolean[];
  private readonly lock = new RwLock();

  constructor(
    readonly capacity: number,
    private readonly dispatcher: EnabledSetDispatcher,
    private readonly logger: Logger,
    private readonly initialSnapshot = false,
  ) {
    this.flags = new Array<boolean>(capacity).fill(false);
  }

  /** Mark a slot enabled and notify every subscriber. */
  async enable(index: number): Promise<void> {
    await this.setFlag(index, true);
  }

  /**
   * Mark a slot disabled and notify every subscriber.
   *
   * Subscribers are notified even when the slot was already disabled.
   */
  async disable(index: number): Promise<void> {
    await this.setFlag(index, false);
  }

  async isEnabled(index: number): Promise<boolean> {
    assertIndex(index, this.capacity);
    return this.lock.withRead(() => this.flags[index]);
  }

  /** Ascending indices of every enabled slot. */
  async enabled(): Promise<number[]> {
    return this.lock.withRead(() => this.computeEnabled());
  }

  /**
   * Register a handler for enabled-set changes.
   *
   * Only changes made after registration are delivered, unless the table was
   * built with `initialSnapshot`, in which case the current set is queued
   * first.
   */
  async registerEnabledChanged(handler: EnabledChangedHandler): Promise<Unsubscribe> {
    return this.lock.withWrite(async () => {
      const { id, unsubscribe } = this.dispatcher.subscribe(handler);
      if (this.initialSnapshot) {
        await this.dispatcher.publishTo(id, this.computeEnabled());
      }
      return unsubscribe;
    });
  }

  peek(index: number): boolean {
    return this.flags[index] === true;
  }

  private async setFlag(index: number, value: boolean): Promise<void> {
    assertIndex(index, this.capacity);
    await this.lock.withWrite(async () => {
      this.flags[index] = value;
      const snapshot = this.computeEnabled();
      this.logger.debug(`[positions] node ${index} ${value ? 'enabled' : 'disabled'}`, {
        enabled: snapshot.length,
      });
      await this.dispatcher.publish(snapshot);
    });
  }

  private computeEnabled(): number[] {
    const enabled: number[] = [];
    for (let i = 0; i < this.flags.length; i++) {
      if (this.flags[i]) {
        enabled.push(i);
      }
    }
    return enabled;
  }
}
