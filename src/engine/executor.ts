import type { ExecutorType, Proposal } from '../shared/types.js';

/**
 * Carries out the payload of a passed proposal. Called synchronously inside
 * the execution commit; throwing marks the proposal `execution_failed`.
 */
export interface ProposalExecutor {
  execute(proposal: Proposal): void;
}

/**
 * LogProposalExecutor - records the call it would make and returns.
 */
export class LogProposalExecutor implements ProposalExecutor {
  execute(proposal: Proposal): void {
    const target = proposal.target || '(no target)';
    console.log(`[EXECUTOR] Proposal ${proposal.id} → ${target}`);
    console.log(
      `[EXECUTOR] Payload: ${proposal.payload.substring(0, 200)}${proposal.payload.length > 200 ? '...' : ''}`,
    );
  }
}

export function createExecutor(config: { type: ExecutorType }): ProposalExecutor {
  switch (config.type) {
    case 'log':
      return new LogProposalExecutor();
    default: {
      const unknown: never = config.type;
      throw new Error(`Unknown executor type: ${String(unknown)}`);
    }
  }
}
