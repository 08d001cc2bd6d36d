import type { CandidateNode, CandidateSelector, SelectionCriteria } from './types.js';
import { selectByPerformance } from './performance.js';

export const RISK_ADJUSTED_MIN_SCORE = 70;

/**
 * Draws a wider performance shortlist, then drops nodes whose risk is
 * above the tolerance.
 */
export class RiskAdjustedSelector implements CandidateSelector {
  readonly type = 'risk_adjusted';

  select(nodes: CandidateNode[], criteria: SelectionCriteria): string[] {
    const shortlist = selectByPerformance(
      nodes,
      criteria.maxCandidates * 2,
      Math.max(criteria.minScore, RISK_ADJUSTED_MIN_SCORE),
    );
    return shortlist
      .filter((n) => n.riskScore <= criteria.riskTolerance)
      .slice(0, criteria.maxCandidates)
      .map((n) => n.address);
  }
}
