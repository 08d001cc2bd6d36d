import type {
  Proposal,
  ProposalStatus,
  Vote,
  VoterInfo,
  VotingConfig,
  VotingStrategy,
  StrategyExecution,
  NodeMetrics,
  NodeBehaviorAnalysis,
} from './types.js';

// ── Engine events (delivered after the owning transaction commits) ──

export type GovernanceEvent =
  | { type: 'proposal:created'; proposal: Proposal }
  | { type: 'vote:cast'; vote: Vote }
  | { type: 'proposal:quorum_reached'; proposalId: string; totalWeight: bigint; requiredQuorum: bigint }
  | { type: 'proposal:executed'; proposalId: string; passed: boolean; status: ProposalStatus }
  | { type: 'proposal:cancelled'; proposalId: string; cancelledBy: string }
  | { type: 'voter:registered'; voter: VoterInfo }
  | { type: 'voter:deactivated'; address: string }
  | { type: 'vote:delegated'; delegator: string; delegate: string }
  | { type: 'delegation:revoked'; delegator: string; delegate: string }
  | { type: 'governance:paused'; paused: boolean; changedBy: string }
  | { type: 'config:updated'; config: VotingConfig; updatedBy: string }
  | { type: 'strategy:created'; strategy: VotingStrategy }
  | { type: 'strategy:triggered'; strategyId: string; creator: string; triggeredBy: string }
  | { type: 'strategy:executed'; execution: StrategyExecution }
  | { type: 'strategy:deactivated'; strategyId: string; deactivatedBy: string }
  | { type: 'strategy:recommendation'; strategyId: string; candidates: string[]; riskScore: number }
  | { type: 'node:metrics_updated'; metrics: NodeMetrics }
  | { type: 'risk:alert'; subject: string; message: string; riskScore: number }
  | { type: 'node:analyzed'; analysis: NodeBehaviorAnalysis };

export type GovernanceListener = (event: GovernanceEvent) => void;

/** An event as recorded in the ordered event log. */
export interface LoggedEvent {
  sequence: number;
  recordedAt: number;
  event: GovernanceEvent;
}

// ── WebSocket frames (server → clients) ──

export interface WsEventFrame {
  type: 'event';
  sequence: number;
  recordedAt: number;
  event: GovernanceEvent;
}
