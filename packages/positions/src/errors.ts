/**
 * Error class for position registry operations.
 *
 * Includes a machine-readable `code` for programmatic error handling.
 *
 * @module positions/errors
 */

/** Machine-readable error codes for registry operations. */
export type PositionRegistryErrorCode =
  | 'INDEX_OUT_OF_RANGE'
  | 'NODE_DISABLED'
  | 'ADDRESS_NOT_FOUND'
  | 'NO_ADDRESS_RESOLVER'
  | 'INVALID_POSITION';

export class PositionRegistryError extends Error {
  constructor(
    message: string,
    public readonly code: PositionRegistryErrorCode,
  ) {
    super(message);
    this.name = 'PositionRegistryError';
  }
}

/** Narrow an unknown error to a registry error, optionally of one code. */
export function isPositionRegistryError(
  err: unknown,
  code?: PositionRegistryErrorCode,
): err is PositionRegistryError {
  return err instanceof PositionRegistryError && (code === undefined || err.code === code);
}

/** Throw `INDEX_OUT_OF_RANGE` unless `index` is an integer in `[0, capacity)`. */
export function assertIndex(index: number, capacity: number): void {
  if (!Number.isInteger(index) || index < 0 || index >= capacity) {
    throw new PositionRegistryError(
      `invalid index ${index}. capacity is ${capacity}`,
      'INDEX_OUT_OF_RANGE',
    );
  }
}
