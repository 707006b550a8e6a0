/**
 * Shared type definitions for the @meshsim/positions package.
 *
 * Config types (OverflowPolicy, NotificationConfig) and the Position shape
 * come from @meshsim/shared and are re-exported to avoid drift.
 *
 * @module positions/types
 */
import type { Position, OverflowPolicy } from '@meshsim/shared/position-schemas';
import type { NotificationConfig } from '@meshsim/shared/config-schema';
import type { Logger } from '@meshsim/shared/logger';

export type { Position, OverflowPolicy, NotificationConfig };

// --- Core handler and utility types ---

/** Receives the ascending list of enabled node indices after every membership change. */
export type EnabledChangedHandler = (enabled: readonly number[]) => void | Promise<void>;
export type Unsubscribe = () => void;
export type Release = () => void;

/** Maps an opaque hardware/node address to a slot index. */
export interface AddressResolver {
  resolve(address: string): number | undefined;
}

/** Read-only view of slot membership, consulted by the position table. */
export interface MembershipView {
  /** Read a slot's enabled flag without taking the membership lock. */
  peek(index: number): boolean;
}

export interface SubscriptionInfo {
  id: string;
  createdAt: string;
  /** Snapshots waiting to be handed to the handler. */
  queueDepth: number;
  delivered: number;
  dropped: number;
}

// --- Queue pressure ---

export interface QueuePressureConfig {
  maxQueueSize: number;
  /** Pressure ratio (0-1) at which a warning is logged. */
  pressureWarningAt: number;
}

export interface QueuePressureResult {
  allowed: boolean;
  reason?: string;
  depth: number;
  /** depth / maxQueueSize, capped at 1.0. */
  pressure: number;
}

// --- Registry ---

export interface PositionRegistryOptions {
  logger?: Logger;
  notifications?: Partial<NotificationConfig>;
}
