import type { Proposal, Vote } from '../shared/types.js';
import type { KeyValueStore } from './kv-store.js';
import { KEYS } from './keys.js';
import { Counter, decodeRecord, encodeRecord, ProposalRecord, VoteRecord } from './codec.js';

/**
 * Persists proposals, their votes and the proposal counter.
 */
export class ProposalStore {
  constructor(private store: KeyValueStore) {}

  count(): number {
    const raw = this.store.get(KEYS.proposalCount);
    return raw === null ? 0 : decodeRecord(Counter, KEYS.proposalCount, raw);
  }

  /** Increments the counter and returns the new value. */
  incrementCount(): number {
    const next = this.count() + 1;
    this.store.put(KEYS.proposalCount, encodeRecord(next));
    return next;
  }

  get(id: string): Proposal | null {
    const key = KEYS.proposal(id);
    const raw = this.store.get(key);
    return raw === null ? null : decodeRecord(ProposalRecord, key, raw);
  }

  /** The stored encoding of a proposal, exactly as persisted. */
  getRecord(id: string): string | null {
    return this.store.get(KEYS.proposal(id));
  }

  exists(id: string): boolean {
    return this.store.get(KEYS.proposal(id)) !== null;
  }

  save(proposal: Proposal): void {
    this.store.put(KEYS.proposal(proposal.id), encodeRecord(proposal));
  }

  getVote(proposalId: string, voter: string): Vote | null {
    const key = KEYS.vote(proposalId, voter);
    const raw = this.store.get(key);
    return raw === null ? null : decodeRecord(VoteRecord, key, raw);
  }

  hasVoted(proposalId: string, voter: string): boolean {
    return this.store.get(KEYS.vote(proposalId, voter)) !== null;
  }

  saveVote(vote: Vote): void {
    this.store.put(KEYS.vote(vote.proposalId, vote.voter), encodeRecord(vote));
  }
}
