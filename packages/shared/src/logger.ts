import { createConsola } from 'consola';
import { LOG_LEVEL_MAP, type LogLevel } from './config-schema.js';

/** Minimal logger interface for cross-package dependency injection. */
export interface Logger {
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
  debug: (...args: unknown[]) => void;
}

/** No-op logger for tests and optional logger defaults. */
export const noopLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
  debug: () => {},
};

/**
 * Create a console logger backed by consola.
 *
 * @param options.level - Named log level. Defaults to `info`.
 * @param options.tag - Component tag prefixed to every line.
 */
export function createLogger(options?: { level?: LogLevel; tag?: string }): Logger {
  const consola = createConsola({ level: LOG_LEVEL_MAP[options?.level ?? 'info'] });
  return options?.tag ? consola.withTag(options.tag) : consola;
}

/** Extract structured error fields for consistent log context. */
export function logError(err: unknown): { error: string; stack?: string } {
  if (err instanceof Error) return { error: err.message, stack: err.stack };
  return { error: String(err) };
}
