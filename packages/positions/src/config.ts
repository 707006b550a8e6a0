/**
 * Build a position registry from a plain configuration object.
 *
 * @module positions/config
 */
import { PositionRegistryConfigSchema } from '@meshsim/shared/config-schema';
import type { PositionRegistryConfig } from '@meshsim/shared/config-schema';
import { createLogger } from '@meshsim/shared/logger';
import type { Logger } from '@meshsim/shared/logger';
import { AddressBook } from './address-book.js';
import { PositionRegistry } from './position-registry.js';
import type { AddressResolver } from './types.js';

export interface RegistryOverrides {
  /** Used instead of the consola logger built from `logging.level`. */
  logger?: Logger;
  /** Used instead of an {@link AddressBook} built from `addresses`. */
  addressResolver?: AddressResolver;
}

/**
 * Validate `raw` against {@link PositionRegistryConfigSchema} and build the
 * registry it describes.
 *
 * @throws {ZodError} If the configuration is invalid
 * @throws If an address maps outside `[0, capacity)` or two addresses share an index
 */
export function createPositionRegistryFromConfig(
  raw: unknown,
  overrides: RegistryOverrides = {},
): PositionRegistry {
  const config: PositionRegistryConfig = PositionRegistryConfigSchema.parse(raw);

  let resolver = overrides.addressResolver;
  if (!resolver && config.addresses) {
    const entries = Object.entries(config.addresses);
    for (const [address, index] of entries) {
      if (index >= config.capacity) {
        throw new Error(`Address ${address} maps to index ${index}, capacity is ${config.capacity}`);
      }
    }
    resolver = new AddressBook(entries);
  }

  const logger = overrides.logger ?? createLogger({ level: config.logging.level, tag: 'positions' });

  return new PositionRegistry(config.capacity, resolver, {
    logger,
    notifications: config.notifications,
  });
}
