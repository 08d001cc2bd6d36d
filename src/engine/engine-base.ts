import type { GovernanceEvent, GovernanceListener } from '../shared/events.js';
import type { KeyValueStore, TransactionalStore } from './kv-store.js';

export type Emit = (event: GovernanceEvent) => void;

/**
 * Shared plumbing for engine components: one atomic commit per operation,
 * with the events it raised delivered to listeners only once it has
 * committed. An operation that throws delivers nothing. A listener that
 * throws is logged and skipped; the committed result still returns.
 */
export abstract class TransactionalEngine {
  private listeners = new Set<GovernanceListener>();

  constructor(protected store: TransactionalStore) {}

  onEvent(listener: GovernanceListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  protected commit<T>(fn: (tx: KeyValueStore, emit: Emit) => T): T {
    const pending: GovernanceEvent[] = [];
    const result = this.store.transaction((tx) => fn(tx, (event) => pending.push(event)));
    for (const event of pending) {
      this.emit(event);
    }
    return result;
  }

  private emit(event: GovernanceEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (err) {
        console.error(`[GOVERNANCE] Event listener failed on ${event.type}: ${(err as Error).message}`);
      }
    }
  }
}
