// ── Proposals ──

export type ProposalStatus =
  | 'active'
  | 'quorum_reached'
  | 'executed'
  | 'failed'
  | 'cancelled'
  | 'execution_failed';

export interface Proposal {
  id: string;
  title: string;
  description: string;
  proposer: string;
  target: string;
  payload: string;
  createdAt: number;
  votingStart: number;
  votingEnd: number;
  executionTime: number;
  status: ProposalStatus;
  yesWeight: bigint;
  noWeight: bigint;
  totalVotingPowerSnapshot: bigint;
}

export interface Vote {
  proposalId: string;
  voter: string;
  support: boolean;
  weight: bigint;
  reason: string;
  castAt: number;
}

// ── Voters ──

export interface VoterInfo {
  address: string;
  votingPower: bigint;
  registeredAt: number;
  isActive: boolean;
  votesCast: number;
}

// ── Configuration ──

export interface VotingConfig {
  /** Seconds between creation and the end of the voting window. */
  votingPeriod: number;
  /** Seconds between the end of voting and execution eligibility. */
  executionDelay: number;
  /** Quorum in basis points of the voting-power snapshot (1–10000). */
  quorumThresholdBps: number;
  requireRegistration: boolean;
}

export interface RiskConfig {
  /** Aggregate risk above this value suppresses strategy execution. */
  maxRiskThreshold: number;
  /** Per-node risk ceiling used by the risk-adjusted selector. */
  riskTolerance: number;
  lowRiskScore: number;
  highRiskScore: number;
}

export type ExecutorType = 'log';

// ── Node monitoring ──

export type TrendDirection = -1 | 0 | 1;

export interface NodeMetrics {
  nodeAddress: string;
  uptimePercentage: number;
  performanceScore: number;
  blocksProduced: number;
  consensusParticipation: number;
  lastUpdated: number;
  trendDirection: TrendDirection;
  performanceHistory: number[];
  reportedBy: string;
}

export type RiskLevel = 'low' | 'high';

export type NodeRecommendation = 'excellent' | 'good' | 'fair' | 'poor';

export interface NodeBehaviorAnalysis {
  nodeAddress: string;
  analysisPeriod: number;
  reliabilityScore: number;
  consistencyScore: number;
  participationScore: number;
  riskLevel: RiskLevel;
  riskScore: number;
  overallScore: number;
  recommendation: NodeRecommendation;
  analyzedAt: number;
}

// ── Strategies ──

export type StrategyType = 'performance' | 'risk_adjusted' | 'diversification' | 'ml_driven';

export interface VotingStrategy {
  id: string;
  name: string;
  description: string;
  creator: string;
  type: StrategyType;
  maxCandidates: number;
  minScore: number;
  autoExecute: boolean;
  executionInterval: number;
  createdAt: number;
  lastExecution: number | null;
  nextExecution: number | null;
  isActive: boolean;
  executionCount: number;
}

export interface StrategyExecution {
  strategyId: string;
  sequence: number;
  executedAt: number;
  executor: string;
  candidates: string[];
  riskScore: number;
  success: boolean;
}

export type StrategyRejectionReason =
  | 'risk_threshold_exceeded'
  | 'not_scheduled'
  | 'not_due';

/** Outcome of a strategy run. A rejection is reported, never thrown. */
export type StrategyRunResult =
  | {
    success: true;
    dryRun: boolean;
    candidates: string[];
    riskScore: number;
    execution: StrategyExecution | null;
  }
  | {
    success: false;
    reason: StrategyRejectionReason;
    candidates: string[];
    riskScore: number;
  };
