import type { VoterInfo } from '../shared/types.js';
import { NotFoundError } from '../shared/errors.js';
import type { KeyValueStore } from './kv-store.js';
import { KEYS } from './keys.js';
import { decodeRecord, encodeRecord, VoterRecord, WeightValue } from './codec.js';

/**
 * Maps voter addresses to voting power. Every write keeps the running
 * total of active voting power in step with the individual records.
 */
export class VoterRegistry {
  constructor(private store: KeyValueStore) {}

  get(address: string): VoterInfo | null {
    const key = KEYS.voter(address);
    const raw = this.store.get(key);
    return raw === null ? null : decodeRecord(VoterRecord, key, raw);
  }

  /** True when the address is registered and active. */
  isRegistered(address: string): boolean {
    return this.get(address)?.isActive ?? false;
  }

  /** Power of an active voter, 0 otherwise. */
  votingPower(address: string): bigint {
    const voter = this.get(address);
    return voter?.isActive ? voter.votingPower : 0n;
  }

  totalVotingPower(): bigint {
    const raw = this.store.get(KEYS.totalVotingPower);
    return raw === null ? 0n : decodeRecord(WeightValue, KEYS.totalVotingPower, raw);
  }

  /** Registers or overwrites a voter. Re-registration resets `votesCast`. */
  register(address: string, votingPower: bigint, now: number): VoterInfo {
    const previousPower = this.votingPower(address);
    const voter: VoterInfo = {
      address,
      votingPower,
      registeredAt: now,
      isActive: true,
      votesCast: 0,
    };
    this.save(voter);
    this.setTotal(this.totalVotingPower() - previousPower + votingPower);
    return voter;
  }

  deactivate(address: string): VoterInfo {
    const voter = this.get(address);
    if (!voter || !voter.isActive) {
      throw new NotFoundError(`Voter not registered: ${address}`, { address });
    }
    const updated: VoterInfo = { ...voter, isActive: false };
    this.save(updated);
    this.setTotal(this.totalVotingPower() - voter.votingPower);
    return updated;
  }

  recordVoteCast(address: string): void {
    const voter = this.get(address);
    if (!voter) return;
    this.save({ ...voter, votesCast: voter.votesCast + 1 });
  }

  private save(voter: VoterInfo): void {
    this.store.put(KEYS.voter(voter.address), encodeRecord(voter));
  }

  private setTotal(total: bigint): void {
    this.store.put(KEYS.totalVotingPower, encodeRecord(total));
  }
}
