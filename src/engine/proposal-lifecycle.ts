import type { ProposalStatus } from '../shared/types.js';
import { StateConflictError } from '../shared/errors.js';

const transitions: Record<ProposalStatus, ProposalStatus[]> = {
  active: ['quorum_reached', 'executed', 'failed', 'execution_failed', 'cancelled'],
  quorum_reached: ['executed', 'failed', 'execution_failed'],
  executed: [],
  failed: [],
  cancelled: [],
  execution_failed: [],
};

export function validTransitions(current: ProposalStatus): ProposalStatus[] {
  return transitions[current] ?? [];
}

export function isTerminal(status: ProposalStatus): boolean {
  return validTransitions(status).length === 0;
}

/** Statuses in which the voting window accepts ballots. */
export function acceptsVotes(status: ProposalStatus): boolean {
  return status === 'active' || status === 'quorum_reached';
}

export function assertTransition(proposalId: string, from: ProposalStatus, to: ProposalStatus): void {
  if (!validTransitions(from).includes(to)) {
    throw new StateConflictError(`Invalid transition: ${from} → ${to}`, { proposalId, from, to });
  }
}
