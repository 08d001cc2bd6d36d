/**
 * Point-lookup key-value storage used by every engine component.
 * Keys are `{prefix}{entity id}` strings; values are encoded records.
 */
export interface KeyValueStore {
  get(key: string): string | null;
  put(key: string, value: string): void;
  delete(key: string): void;
}

/**
 * A store that can apply a group of writes atomically. Writes made through
 * the store handed to `fn` become visible together when `fn` returns, and
 * none of them do if it throws.
 */
export interface TransactionalStore extends KeyValueStore {
  transaction<T>(fn: (tx: KeyValueStore) => T): T;
}

const DELETED = Symbol('deleted');

/** Write buffer layered over a base store until commit. */
class BufferedTransaction implements KeyValueStore {
  private writes = new Map<string, string | typeof DELETED>();

  constructor(private base: KeyValueStore) {}

  get(key: string): string | null {
    const pending = this.writes.get(key);
    if (pending === DELETED) return null;
    if (pending !== undefined) return pending;
    return this.base.get(key);
  }

  put(key: string, value: string): void {
    this.writes.set(key, value);
  }

  delete(key: string): void {
    this.writes.set(key, DELETED);
  }

  commit(): void {
    for (const [key, value] of this.writes) {
      if (value === DELETED) {
        this.base.delete(key);
      } else {
        this.base.put(key, value);
      }
    }
    this.writes.clear();
  }
}

/**
 * In-process store. Used by tests and by embedders that do not need
 * durability.
 */
export class MemoryKeyValueStore implements TransactionalStore {
  private entries = new Map<string, string>();
  private inTransaction = false;

  get(key: string): string | null {
    return this.entries.get(key) ?? null;
  }

  put(key: string, value: string): void {
    this.entries.set(key, value);
  }

  delete(key: string): void {
    this.entries.delete(key);
  }

  transaction<T>(fn: (tx: KeyValueStore) => T): T {
    if (this.inTransaction) {
      throw new Error('Nested transactions are not supported');
    }
    this.inTransaction = true;
    try {
      const tx = new BufferedTransaction(this);
      const result = fn(tx);
      tx.commit();
      return result;
    } finally {
      this.inTransaction = false;
    }
  }

  /** Number of stored keys. */
  get size(): number {
    return this.entries.size;
  }
}
