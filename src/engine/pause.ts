import { StateConflictError } from '../shared/errors.js';
import type { KeyValueStore } from './kv-store.js';
import { KEYS } from './keys.js';
import { decodeRecord, encodeRecord, Flag } from './codec.js';

export function isPaused(store: KeyValueStore): boolean {
  const raw = store.get(KEYS.paused);
  return raw === null ? false : decodeRecord(Flag, KEYS.paused, raw);
}

export function writePaused(store: KeyValueStore, paused: boolean): void {
  store.put(KEYS.paused, encodeRecord(paused));
}

/** Guard for every state-changing operation except the pause switch itself. */
export function assertNotPaused(store: KeyValueStore): void {
  if (isPaused(store)) {
    throw new StateConflictError('Governance is paused');
  }
}
