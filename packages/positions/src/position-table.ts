/**
 * Fixed-capacity table of node positions with one reader/writer lock per slot.
 *
 * Slots are independent: operations on different indices never wait on each
 * other. A slot's three coordinates are replaced in a single step while its
 * write lock is held, so readers never see a half-updated position.
 *
 * Access to a disabled slot is refused, but its stored position is kept.
 *
 * @module positions/position-table
 */
import type { Logger } from '@meshsim/shared/logger';
import { PositionSchema } from '@meshsim/shared/position-schemas';
import { PositionRegistryError, assertIndex, isPositionRegistryError } from './errors.js';
import { RwLock } from './rw-lock.js';
import type { MembershipView, Position } from './types.js';

/** Distance reported when either endpoint cannot be read. */
export const UNREACHABLE_DISTANCE = Number.MAX_VALUE;

interface Slot {
  position: Position;
  lock: RwLock;
}

export class PositionTable {
  private readonly slots: Slot[];

  constructor(
    readonly capacity: number,
    private readonly membership: MembershipView,
    private readonly logger: Logger,
  ) {
    this.slots = Array.from({ length: capacity }, () => ({
      position: { x: 0, y: 0, height: 0 },
      lock: new RwLock(),
    }));
  }

  /** Read a copy of the position at `index`. */
  async get(index: number): Promise<Position> {
    const slot = this.slot(index);
    return slot.lock.withRead(() => {
      this.assertEnabled(index);
      return { ...slot.position };
    });
  }

  async set(index: number, x: number, y: number, height: number): Promise<void> {
    await this.setPosition(index, { x, y, height });
  }

  async setPosition(index: number, position: Position): Promise<void> {
    const slot = this.slot(index);
    await slot.lock.withWrite(() => {
      this.assertEnabled(index);
      this.write(index, slot, position);
    });
  }

  /**
   * Read-modify-write a position under the slot's write lock.
   *
   * The updater receives a copy of the current position. Other readers and
   * writers of the same slot wait until it settles; other slots do not.
   * If the slot is disabled before the updater settles, nothing is written.
   *
   * @returns The stored position
   */
  async update(
    index: number,
    updater: (current: Position) => Position | Promise<Position>,
  ): Promise<Position> {
    const slot = this.slot(index);
    return slot.lock.withWrite(async () => {
      this.assertEnabled(index);
      const next = await updater({ ...slot.position });
      // membership may have changed while the updater was pending
      this.assertEnabled(index);
      this.write(index, slot, next);
      return { ...slot.position };
    });
  }

  /**
   * Euclidean distance between two slots.
   *
   * Returns {@link UNREACHABLE_DISTANCE} instead of failing when either slot
   * is out of range or disabled.
   */
  async distance(index1: number, index2: number): Promise<number> {
    const positions = await Promise.all([this.get(index1), this.get(index2)]).catch(
      (err: unknown) => {
        if (isPositionRegistryError(err)) return undefined;
        throw err;
      },
    );
    if (!positions) return UNREACHABLE_DISTANCE;

    const [pos1, pos2] = positions;
    return Math.hypot(pos1.x - pos2.x, pos1.y - pos2.y, pos1.height - pos2.height);
  }

  private slot(index: number): Slot {
    assertIndex(index, this.capacity);
    return this.slots[index];
  }

  private assertEnabled(index: number): void {
    if (!this.membership.peek(index)) {
      throw new PositionRegistryError(`node with index ${index} is disabled`, 'NODE_DISABLED');
    }
  }

  private write(index: number, slot: Slot, position: Position): void {
    const parsed = PositionSchema.safeParse(position);
    if (!parsed.success) {
      throw new PositionRegistryError(
        `invalid position for node ${index}: ${parsed.error.issues.map((i) => `${i.path.join('.')} ${i.message}`).join(', ')}`,
        'INVALID_POSITION',
      );
    }
    slot.position = parsed.data;
    this.logger.debug(`[positions] position for ${index} is updated`, parsed.data);
  }
}
