import type { Proposal } from '../shared/types.js';

export const BPS_DENOMINATOR = 10_000n;

/**
 * Minimum cast weight for a proposal, rounded down:
 * `snapshot * thresholdBps / 10000`.
 */
export function requiredQuorum(snapshot: bigint, thresholdBps: number): bigint {
  return (snapshot * BigInt(thresholdBps)) / BPS_DENOMINATOR;
}

export function totalCast(proposal: Pick<Proposal, 'yesWeight' | 'noWeight'>): bigint {
  return proposal.yesWeight + proposal.noWeight;
}

export function quorumMet(
  proposal: Pick<Proposal, 'yesWeight' | 'noWeight' | 'totalVotingPowerSnapshot'>,
  thresholdBps: number,
): boolean {
  return totalCast(proposal) >= requiredQuorum(proposal.totalVotingPowerSnapshot, thresholdBps);
}

/** Quorum met and strictly more yes weight than no weight. */
export function passes(
  proposal: Pick<Proposal, 'yesWeight' | 'noWeight' | 'totalVotingPowerSnapshot'>,
  thresholdBps: number,
): boolean {
  return quorumMet(proposal, thresholdBps) && proposal.yesWeight > proposal.noWeight;
}

/** Returns a copy of the proposal with the vote weight added to one side. */
export function applyVote(proposal: Proposal, support: boolean, weight: bigint): Proposal {
  return support
    ? { ...proposal, yesWeight: proposal.yesWeight + weight }
    : { ...proposal, noWeight: proposal.noWeight + weight };
}
