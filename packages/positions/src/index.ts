/**
 * @meshsim/positions -- Position and membership registry for the mesh simulator.
 *
 * Tracks every simulated node's position under per-slot reader/writer
 * locks, computes Euclidean distances, and broadcasts the enabled-node set
 * to subscribers through bounded per-subscriber queues.
 *
 * @module positions
 */

// Main entry point
export { PositionRegistry, createPositionRegistry } from './position-registry.js';
export { createPositionRegistryFromConfig } from './config.js';
export type { RegistryOverrides } from './config.js';

// Sub-modules (for advanced usage)
export { PositionTable, UNREACHABLE_DISTANCE } from './position-table.js';
export { MembershipTable } from './membership-table.js';
export { EnabledSetDispatcher } from './enabled-dispatcher.js';
export { DeliveryQueue } from './delivery-queue.js';
export type { DeliveryQueueOptions } from './delivery-queue.js';
export { AddressBook } from './address-book.js';
export { RwLock } from './rw-lock.js';

// Errors
export { PositionRegistryError, isPositionRegistryError } from './errors.js';
export type { PositionRegistryErrorCode } from './errors.js';

// Pure functions
export { checkQueuePressure, DEFAULT_QUEUE_PRESSURE_CONFIG } from './queue-pressure.js';

// Types
export type {
  Position,
  OverflowPolicy,
  NotificationConfig,
  EnabledChangedHandler,
  Unsubscribe,
  Release,
  AddressResolver,
  MembershipView,
  SubscriptionInfo,
  QueuePressureConfig,
  QueuePressureResult,
  PositionRegistryOptions,
} from './types.js';
