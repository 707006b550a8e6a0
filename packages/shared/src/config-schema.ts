import { z } from 'zod';
import { OverflowPolicySchema } from './position-schemas.js';

export const LogLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']);

export type LogLevel = z.infer<typeof LogLevelSchema>;

export const NotificationConfigSchema = z.object({
  maxQueueSize: z.number().int().min(1).default(64),
  overflow: OverflowPolicySchema.default('block'),
  pressureWarningAt: z.number().min(0).max(1).default(0.8),
  initialSnapshot: z.boolean().default(false),
});

export type NotificationConfig = z.infer<typeof NotificationConfigSchema>;

const LoggingConfigSchema = z.object({
  level: LogLevelSchema.default('info'),
});

export const PositionRegistryConfigSchema = z.object({
  capacity: z.number().int().min(0),
  notifications: NotificationConfigSchema.default(() => ({
    maxQueueSize: 64,
    overflow: 'block' as const,
    pressureWarningAt: 0.8,
    initialSnapshot: false,
  })),
  logging: LoggingConfigSchema.default(() => ({ level: 'info' as const })),
  addresses: z
    .record(z.string().min(1), z.number().int().min(0))
    .optional()
    .describe('Hardware address -> node index'),
});

export type PositionRegistryConfig = z.infer<typeof PositionRegistryConfigSchema>;

/** Maps log level names to numeric values for consola compatibility */
export const LOG_LEVEL_MAP: Record<LogLevel, number> = {
  fatal: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
  trace: 5,
};

/** Notification defaults extracted from the schema. */
export const NOTIFICATION_DEFAULTS: NotificationConfig = NotificationConfigSchema.parse({});
