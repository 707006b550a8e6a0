/**
 * Zod schemas for node positions and enabled-set delivery.
 *
 * @module shared/position-schemas
 */
import { z } from 'zod';

// === Position ===

export const PositionSchema = z.object({
  x: z.number().finite(),
  y: z.number().finite(),
  height: z.number().finite(),
});

export type Position = z.infer<typeof PositionSchema>;

// === Delivery ===

/**
 * What a full subscriber queue does with a new snapshot.
 *
 * - `block`: the membership change waits until the subscriber makes room.
 * - `drop-oldest`: the oldest queued snapshot is discarded.
 */
export const OverflowPolicySchema = z.enum(['block', 'drop-oldest']);

export type OverflowPolicy = z.infer<typeof OverflowPolicySchema>;
