/**
 * Position registry: node positions, membership, and enabled-set broadcast.
 *
 * Composes a {@link PositionTable} (per-slot locks), a {@link MembershipTable}
 * (one membership lock shared by the enabled flags and subscriber list) and
 * an {@link EnabledSetDispatcher}. Address-based operations resolve through
 * an optional {@link AddressResolver} and then delegate to the index-based
 * ones, adding no locking of their own.
 *
 * @module positions/position-registry
 */
import { NotificationConfigSchema } from '@meshsim/shared/config-schema';
import type { Logger } from '@meshsim/shared/logger';
import { noopLogger } from '@meshsim/shared/logger';
import { EnabledSetDispatcher } from './enabled-dispatcher.js';
import { PositionRegistryError } from './errors.js';
import { MembershipTable } from './membership-table.js';
import { PositionTable } from './position-table.js';
import type {
  AddressResolver,
  EnabledChangedHandler,
  NotificationConfig,
  Position,
  PositionRegistryOptions,
  SubscriptionInfo,
  Unsubscribe,
} from './types.js';

/**
 * Registry of every simulated node's position and enabled state.
 *
 * All slots start disabled at `(0, 0, 0)`. Capacity is fixed for the
 * lifetime of the registry.
 *
 * @example
 * ```ts
 * const registry = createPositionRegistry(4, new AddressBook([['02:00:00:00:00:01', 1]]));
 *
 * await registry.registerEnabledChanged((enabled) => topology.rebuild(enabled));
 * await registry.enable(1);
 * await registry.setByAddress('02:00:00:00:00:01', 10, 20, 1.5);
 *
 * await registry.distance(1, 3); // Number.MAX_VALUE while node 3 is disabled
 * ```
 */
export class PositionRegistry {
  private readonly table: PositionTable;
  private readonly membership: MembershipTable;
  private readonly dispatcher: EnabledSetDispatcher;
  private readonly resolver: AddressResolver | undefined;

  /**
   * @throws If `capacity` is not a non-negative integer
   * @throws {ZodError} If `options.notifications` is invalid
   */
  constructor(capacity: number, addressResolver?: AddressResolver, options: PositionRegistryOptions = {}) {
    if (!Number.isInteger(capacity) || capacity < 0) {
      throw new Error(`Invalid capacity: ${capacity}`);
    }
    const logger: Logger = options.logger ?? noopLogger;
    const notifications: NotificationConfig = NotificationConfigSchema.parse(options.notifications ?? {});

    this.resolver = addressResolver;
    this.dispatcher = new EnabledSetDispatcher(notifications, logger);
    this.membership = new MembershipTable(
      capacity,
      this.dispatcher,
      logger,
      notifications.initialSnapshot,
    );
    this.table = new PositionTable(capacity, this.membership, logger);
  }

  get capacity(): number {
    return this.table.capacity;
  }

  // ---------------------------------------------------------------------------
  // Positions
  // ---------------------------------------------------------------------------

  /**
   * Read a copy of a node's position.
   *
   * @throws {PositionRegistryError} `INDEX_OUT_OF_RANGE` or `NODE_DISABLED`
   */
  get(index: number): Promise<Position> {
    return this.table.get(index);
  }

  /**
   * Overwrite a node's position.
   *
   * @throws {PositionRegistryError} `INDEX_OUT_OF_RANGE`, `NODE_DISABLED` or `INVALID_POSITION`
   */
  set(index: number, x: number, y: number, height: number): Promise<void> {
    return this.table.set(index, x, y, height);
  }

  setPosition(index: number, position: Position): Promise<void> {
    return this.table.setPosition(index, position);
  }

  /** Read-modify-write a node's position under its slot lock. */
  update(
    index: number,
    updater: (current: Position) => Position | Promise<Position>,
  ): Promise<Position> {
    return this.table.update(index, updater);
  }

  /**
   * Euclidean distance between two nodes, or `Number.MAX_VALUE` when either
   * node is out of range or disabled.
   */
  distance(index1: number, index2: number): Promise<number> {
    return this.table.distance(index1, index2);
  }

  // ---------------------------------------------------------------------------
  // Address indirection
  // ---------------------------------------------------------------------------

  async getByAddress(address: string): Promise<Position> {
    return this.table.get(this.resolve(address));
  }

  async setByAddress(address: string, x: number, y: number, height: number): Promise<void> {
    await this.table.set(this.resolve(address), x, y, height);
  }

  async setPositionByAddress(address: string, position: Position): Promise<void> {
    await this.table.setPosition(this.resolve(address), position);
  }

  // ---------------------------------------------------------------------------
  // Membership
  // ---------------------------------------------------------------------------

  enable(index: number): Promise<void> {
    return this.membership.enable(index);
  }

  disable(index: number): Promise<void> {
    return this.membership.disable(index);
  }

  isEnabled(index: number): Promise<boolean> {
    return this.membership.isEnabled(index);
  }

  /** Ascending indices of every enabled node. */
  enabled(): Promise<number[]> {
    return this.membership.enabled();
  }

  /**
   * Receive the full enabled set after every enable/disable call.
   *
   * Handlers are called from a per-subscriber queue. enable/disable wait
   * for the snapshot to be queued, not for the handler, and each handler
   * sees snapshots in the order the changes were made. A throwing handler
   * is logged and keeps receiving snapshots.
   */
  registerEnabledChanged(handler: EnabledChangedHandler): Promise<Unsubscribe> {
    return this.membership.registerEnabledChanged(handler);
  }

  listSubscriptions(): SubscriptionInfo[] {
    return this.dispatcher.listSubscriptions();
  }

  /** Resolve once every queued enabled-set snapshot has been delivered. */
  flush(): Promise<void> {
    return this.dispatcher.flush();
  }

  private resolve(address: string): number {
    if (!this.resolver) {
      throw new PositionRegistryError(
        `cannot resolve ${address}: registry has no address resolver`,
        'NO_ADDRESS_RESOLVER',
      );
    }
    const index = this.resolver.resolve(address);
    if (index === undefined) {
      throw new PositionRegistryError(
        `node with hardware address ${address} is not found`,
        'ADDRESS_NOT_FOUND',
      );
    }
    return index;
  }
}

/** Create a registry with `capacity` disabled slots. */
export function createPositionRegistry(
  capacity: number,
  addressResolver?: AddressResolver,
  options?: PositionRegistryOptions,
): PositionRegistry {
  return new PositionRegistry(capacity, addressResolver, options);
}
