/**
 * Fill level of an enabled-set subscriber queue.
 *
 * A {@link DeliveryQueue} consults this before every push: a refused push
 * makes it wait (`block`) or discard its oldest snapshot (`drop-oldest`),
 * and a reading at or past `pressureWarningAt` logs a warning that the
 * subscriber is falling behind membership changes.
 *
 * @module positions/queue-pressure
 */
import type { QueuePressureConfig, QueuePressureResult } from './types.js';

/** Matches the notification defaults in `@meshsim/shared/config-schema`. */
const DEFAULT_QUEUE_PRESSURE_CONFIG: QueuePressureConfig = {
  maxQueueSize: 64,
  pressureWarningAt: 0.8,
};

/**
 * Whether a subscriber queue holding `depth` snapshots has room for one more.
 *
 * `pressure` is depth over capacity, at most 1.0; a queue without capacity
 * reports 0 and refuses everything.
 */
export function checkQueuePressure(
  depth: number,
  config: QueuePressureConfig = DEFAULT_QUEUE_PRESSURE_CONFIG,
): QueuePressureResult {
  const pressure = config.maxQueueSize > 0 ? Math.min(depth / config.maxQueueSize, 1.0) : 0;

  if (depth >= config.maxQueueSize) {
    return {
      allowed: false,
      reason: `backpressure: queue full (${depth}/${config.maxQueueSize})`,
      depth,
      pressure,
    };
  }

  return { allowed: true, depth, pressure };
}

/** Whether a subscriber is far enough behind to be worth a warning. */
export function isPressureWarning(
  result: QueuePressureResult,
  config: QueuePressureConfig = DEFAULT_QUEUE_PRESSURE_CONFIG,
): boolean {
  return result.pressure >= config.pressureWarningAt;
}

export { DEFAULT_QUEUE_PRESSURE_CONFIG };
