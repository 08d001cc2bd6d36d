import type { CandidateNode, CandidateSelector, SelectionCriteria } from './types.js';

/** Best performance first, then best uptime, then address. */
export function rankByPerformance(nodes: CandidateNode[]): CandidateNode[] {
  return [...nodes].sort((a, b) =>
    b.performanceScore - a.performanceScore
    || b.uptimePercentage - a.uptimePercentage
    || (a.address < b.address ? -1 : a.address > b.address ? 1 : 0));
}

export function selectByPerformance(nodes: CandidateNode[], limit: number, minScore: number): CandidateNode[] {
  return rankByPerformance(nodes.filter((n) => n.performanceScore >= minScore)).slice(0, limit);
}

export class PerformanceSelector implements CandidateSelector {
  readonly type = 'performance';

  select(nodes: CandidateNode[], criteria: SelectionCriteria): string[] {
    return selectByPerformance(nodes, criteria.maxCandidates, criteria.minScore).map((n) => n.address);
  }
}
