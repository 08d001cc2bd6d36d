import type { StrategyType } from '../../shared/types.js';
import type { CandidateSelector } from './types.js';
import { PerformanceSelector } from './performance.js';
import { RiskAdjustedSelector } from './risk-adjusted.js';
import { DiversificationSelector } from './diversification.js';

export type { CandidateNode, CandidateSelector, SelectionCriteria } from './types.js';

// ml_driven has no model behind it yet and ranks by performance
const selectors: Record<StrategyType, () => CandidateSelector> = {
  performance: () => new PerformanceSelector(),
  risk_adjusted: () => new RiskAdjustedSelector(),
  diversification: () => new DiversificationSelector(),
  ml_driven: () => new PerformanceSelector(),
};

export function createCandidateSelector(type: StrategyType): CandidateSelector {
  return selectors[type]();
}

/** Types that run another type's selector in their place. */
export function isFallbackSelector(type: StrategyType): boolean {
  return createCandidateSelector(type).type !== type;
}

export {
  PerformanceSelector,
  RiskAdjustedSelector,
  DiversificationSelector,
};
