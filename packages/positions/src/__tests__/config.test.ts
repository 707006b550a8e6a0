import { describe, it, expect, vi } from 'vitest';
import { ZodError } from 'zod';
import { noopLogger } from '@meshsim/shared/logger';
import { createPositionRegistryFromConfig } from '../config.js';
import { AddressBook } from '../address-book.js';

describe('createPositionRegistryFromConfig', () => {
  it('builds a registry with the configured capacity', () => {
    const registry = createPositionRegistryFromConfig({ capacity: 6 }, { logger: noopLogger });

    expect(registry.capacity).toBe(6);
  });

  it('builds an address book from the addresses map', async () => {
    const registry = createPositionRegistryFromConfig(
      { capacity: 3, addresses: { '02:00:00:00:00:02': 2 } },
      { logger: noopLogger },
    );

    await registry.enable(2);
    await registry.setByAddress('02:00:00:00:00:02', 1, 1, 1);
    await expect(registry.get(2)).resolves.toEqual({ x: 1, y: 1, height: 1 });
  });

  it('prefers an explicit resolver over the addresses map', async () => {
    const registry = createPositionRegistryFromConfig(
      { capacity: 3, addresses: { '02:00:00:00:00:02': 2 } },
      { logger: noopLogger, addressResolver: new AddressBook([['node-a', 0]]) },
    );

    await registry.enable(0);
    await expect(registry.getByAddress('node-a')).resolves.toEqual({ x: 0, y: 0, height: 0 });
    await expect(registry.getByAddress('02:00:00:00:00:02')).rejects.toMatchObject({
      code: 'ADDRESS_NOT_FOUND',
    });
  });

  it('applies notification settings', async () => {
    const registry = createPositionRegistryFromConfig(
      { capacity: 2, notifications: { initialSnapshot: true } },
      { logger: noopLogger },
    );
    await registry.enable(1);

    const handler = vi.fn();
    await registry.registerEnabledChanged(handler);
    await registry.flush();

    expect(handler).toHaveBeenCalledWith([1]);
  });

  it('throws a ZodError for an invalid capacity', () => {
    expect(() => createPositionRegistryFromConfig({ capacity: -1 })).toThrow(ZodError);
    expect(() => createPositionRegistryFromConfig({})).toThrow(ZodError);
  });

  it('rejects an address mapped outside the capacity', () => {
    expect(() =>
      createPositionRegistryFromConfig(
        { capacity: 2, addresses: { '02:00:00:00:00:09': 2 } },
        { logger: noopLogger },
      ),
    ).toThrow('Address 02:00:00:00:00:09 maps to index 2, capacity is 2');
  });

  it('rejects two addresses mapped to one index', () => {
    expect(() =>
      createPositionRegistryFromConfig(
        { capacity: 4, addresses: { 'node-a': 1, 'node-b': 1 } },
        { logger: noopLogger },
      ),
    ).toThrow('Index 1 is already bound to node-a');
  });
});
