import type { VotingConfig } from '../shared/types.js';
import { ValidationError } from '../shared/errors.js';
import type { KeyValueStore } from './kv-store.js';
import { KEYS } from './keys.js';
import { decodeRecord, encodeRecord, VotingConfigRecord } from './codec.js';

export const DEFAULT_VOTING_CONFIG: VotingConfig = {
  votingPeriod: 604_800,
  executionDelay: 86_400,
  quorumThresholdBps: 5_000,
  requireRegistration: true,
};

export const MIN_VOTING_PERIOD = 3_600;

export function validateVotingConfig(config: VotingConfig): void {
  const problems: string[] = [];
  if (!Number.isInteger(config.votingPeriod) || config.votingPeriod < MIN_VOTING_PERIOD) {
    problems.push(`votingPeriod must be an integer of at least ${MIN_VOTING_PERIOD} seconds`);
  }
  if (!Number.isInteger(config.executionDelay) || config.executionDelay < 0) {
    problems.push('executionDelay must be a non-negative integer');
  }
  if (
    !Number.isInteger(config.quorumThresholdBps)
    || config.quorumThresholdBps < 1
    || config.quorumThresholdBps > 10_000
  ) {
    problems.push('quorumThresholdBps must be between 1 and 10000');
  }
  if (problems.length > 0) {
    throw new ValidationError('Invalid voting config', { problems });
  }
}

/** Stored configuration, or `defaults` when none has been written. */
export function readVotingConfig(store: KeyValueStore, defaults: VotingConfig = DEFAULT_VOTING_CONFIG): VotingConfig {
  const raw = store.get(KEYS.votingConfig);
  return raw === null ? { ...defaults } : decodeRecord(VotingConfigRecord, KEYS.votingConfig, raw);
}

export function writeVotingConfig(store: KeyValueStore, config: VotingConfig): void {
  store.put(KEYS.votingConfig, encodeRecord({
    votingPeriod: config.votingPeriod,
    executionDelay: config.executionDelay,
    quorumThresholdBps: config.quorumThresholdBps,
    requireRegistration: config.requireRegistration,
  }));
}
