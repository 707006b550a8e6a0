import { describe, it, expect } from 'vitest';
import {
  NotificationConfigSchema,
  PositionRegistryConfigSchema,
  LOG_LEVEL_MAP,
  NOTIFICATION_DEFAULTS,
} from '../config-schema.js';
import { PositionSchema } from '../position-schemas.js';

describe('PositionRegistryConfigSchema', () => {
  it('fills notification and logging defaults', () => {
    const config = PositionRegistryConfigSchema.parse({ capacity: 8 });

    expect(config).toEqual({
      capacity: 8,
      notifications: {
        maxQueueSize: 64,
        overflow: 'block',
        pressureWarningAt: 0.8,
        initialSnapshot: false,
      },
      logging: { level: 'info' },
    });
  });

  it('fills defaults inside a partial notifications block', () => {
    const config = PositionRegistryConfigSchema.parse({
      capacity: 2,
      notifications: { overflow: 'drop-oldest' },
    });

    expect(config.notifications).toEqual({
      maxQueueSize: 64,
      overflow: 'drop-oldest',
      pressureWarningAt: 0.8,
      initialSnapshot: false,
    });
  });

  it('accepts an address map', () => {
    const config = PositionRegistryConfigSchema.parse({
      capacity: 2,
      addresses: { '02:00:00:00:00:01': 1 },
    });

    expect(config.addresses).toEqual({ '02:00:00:00:00:01': 1 });
  });

  it('rejects a negative or fractional capacity', () => {
    expect(PositionRegistryConfigSchema.safeParse({ capacity: -1 }).success).toBe(false);
    expect(PositionRegistryConfigSchema.safeParse({ capacity: 1.5 }).success).toBe(false);
  });

  it('rejects an unknown overflow policy', () => {
    const result = PositionRegistryConfigSchema.safeParse({
      capacity: 2,
      notifications: { overflow: 'drop-newest' },
    });

    expect(result.success).toBe(false);
  });

  it('rejects a zero queue size', () => {
    const result = PositionRegistryConfigSchema.safeParse({
      capacity: 2,
      notifications: { maxQueueSize: 0 },
    });

    expect(result.success).toBe(false);
  });

  it('rejects negative address indices', () => {
    const result = PositionRegistryConfigSchema.safeParse({
      capacity: 2,
      addresses: { '02:00:00:00:00:01': -1 },
    });

    expect(result.success).toBe(false);
  });
});

describe('NotificationConfigSchema', () => {
  it('fills every field from a partial object', () => {
    expect(NotificationConfigSchema.parse({ overflow: 'drop-oldest' })).toEqual({
      maxQueueSize: 64,
      overflow: 'drop-oldest',
      pressureWarningAt: 0.8,
      initialSnapshot: false,
    });
  });

  it('rejects a queue size below 1', () => {
    expect(NotificationConfigSchema.safeParse({ maxQueueSize: 0 }).success).toBe(false);
    expect(NotificationConfigSchema.safeParse({ maxQueueSize: 1.5 }).success).toBe(false);
  });
});

describe('NOTIFICATION_DEFAULTS', () => {
  it('matches the schema defaults', () => {
    expect(NOTIFICATION_DEFAULTS).toEqual({
      maxQueueSize: 64,
      overflow: 'block',
      pressureWarningAt: 0.8,
      initialSnapshot: false,
    });
  });
});

describe('LOG_LEVEL_MAP', () => {
  it('maps level names to consola levels', () => {
    expect(LOG_LEVEL_MAP).toEqual({ fatal: 0, error: 1, warn: 2, info: 3, debug: 4, trace: 5 });
  });
});

describe('PositionSchema', () => {
  it('accepts finite coordinates', () => {
    expect(PositionSchema.parse({ x: 1.5, y: -2, height: 0 })).toEqual({ x: 1.5, y: -2, height: 0 });
  });

  it('rejects NaN and infinite coordinates', () => {
    expect(PositionSchema.safeParse({ x: Number.NaN, y: 0, height: 0 }).success).toBe(false);
    expect(PositionSchema.safeParse({ x: 0, y: Number.NEGATIVE_INFINITY, height: 0 }).success).toBe(
      false,
    );
  });

  it('rejects a missing axis', () => {
    expect(PositionSchema.safeParse({ x: 0, y: 0 }).success).toBe(false);
  });
});
