import type { StrategyType } from '../../shared/types.js';

/** A reported node as seen by the selectors. */
export interface CandidateNode {
  address: string;
  performanceScore: number;
  uptimePercentage: number;
  riskScore: number;
}

export interface SelectionCriteria {
  maxCandidates: number;
  minScore: number;
  /** Per-node risk ceiling for risk-aware selectors. */
  riskTolerance: number;
}

export interface CandidateSelector {
  readonly type: StrategyType;
  select(nodes: CandidateNode[], criteria: SelectionCriteria): string[];
}
