import type { KeyValueStore } from './kv-store.js';
import { KEYS } from './keys.js';
import { AddressValue, decodeRecord, encodeRecord } from './codec.js';

/** Longest delegation chain followed when looking for a cycle. */
export const MAX_DELEGATION_DEPTH = 5;

/**
 * One outgoing delegation per voter. A voter who has delegated votes
 * with zero power until the delegation is revoked.
 */
export class DelegationRegistry {
  constructor(private store: KeyValueStore) {}

  getDelegate(delegator: string): string | null {
    const key = KEYS.delegation(delegator);
    const raw = this.store.get(key);
    return raw === null ? null : decodeRecord(AddressValue, key, raw);
  }

  hasDelegated(delegator: string): boolean {
    return this.getDelegate(delegator) !== null;
  }

  /**
   * Follows the chain starting at `delegate` for up to MAX_DELEGATION_DEPTH
   * hops; true when it leads back to `delegator`.
   */
  wouldCycle(delegator: string, delegate: string): boolean {
    let current: string | null = delegate;
    for (let depth = 0; current !== null && depth < MAX_DELEGATION_DEPTH; depth++) {
      if (current === delegator) return true;
      current = this.getDelegate(current);
    }
    return false;
  }

  set(delegator: string, delegate: string): void {
    this.store.put(KEYS.delegation(delegator), encodeRecord(delegate));
  }

  remove(delegator: string): void {
    this.store.delete(KEYS.delegation(delegator));
  }
}
