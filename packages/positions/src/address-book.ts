/**
 * In-memory hardware address -> slot index mapping.
 *
 * Addresses are normalized (trimmed, lower-cased) on the way in and on
 * lookup, so `AA:BB:CC:00:00:01` and `aa:bb:cc:00:00:01` name the same node.
 * Each address maps to one index and each index to at most one address.
 *
 * @module positions/address-book
 */
import type { AddressResolver } from './types.js';

function normalizeAddress(address: string): string {
  return address.trim().toLowerCase();
}

export class AddressBook implements AddressResolver {
  private readonly byAddress = new Map<string, number>();
  private readonly byIndex = new Map<number, string>();

  constructor(entries?: Iterable<readonly [string, number]>) {
    if (entries) {
      for (const [address, index] of entries) {
        this.add(address, index);
      }
    }
  }

  /**
   * Bind an address to a slot index.
   *
   * @throws If the address is empty or already bound, the index is not a
   *   non-negative integer, or the index already has an address
   */
  add(address: string, index: number): void {
    const key = normalizeAddress(address);
    if (key.length === 0) {
      throw new Error('Address must not be empty');
    }
    if (!Number.isInteger(index) || index < 0) {
      throw new Error(`Invalid index for ${key}: ${index}`);
    }
    if (this.byAddress.has(key)) {
      throw new Error(`Address already registered: ${key}`);
    }
    const existing = this.byIndex.get(index);
    if (existing !== undefined) {
      throw new Error(`Index ${index} is already bound to ${existing}`);
    }

    this.byAddress.set(key, index);
    this.byIndex.set(index, key);
  }

  /** @returns `true` if the address was bound and is now removed */
  remove(address: string): boolean {
    const key = normalizeAddress(address);
    const index = this.byAddress.get(key);
    if (index === undefined) {
      return false;
    }
    this.byAddress.delete(key);
    this.byIndex.delete(index);
    return true;
  }

  resolve(address: string): number | undefined {
    return this.byAddress.get(normalizeAddress(address));
  }

  /** Normalized address bound to `index`, if any. */
  addressOf(index: number): string | undefined {
    return this.byIndex.get(index);
  }

  entries(): Array<[string, number]> {
    return Array.from(this.byAddress.entries());
  }

  get size(): number {
    return this.byAddress.size;
  }
}
