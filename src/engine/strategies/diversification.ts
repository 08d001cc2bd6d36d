import type { CandidateNode, CandidateSelector, SelectionCriteria } from './types.js';
import { selectByPerformance } from './performance.js';

export const DIVERSIFICATION_MIN_SCORE = 60;

/**
 * Spreads picks across the ranking: takes every n-th node of a shortlist
 * three times the requested size.
 */
export class DiversificationSelector implements CandidateSelector {
  readonly type = 'diversification';

  select(nodes: CandidateNode[], criteria: SelectionCriteria): string[] {
    const shortlist = selectByPerformance(
      nodes,
      criteria.maxCandidates * 3,
      Math.max(criteria.minScore, DIVERSIFICATION_MIN_SCORE),
    );
    const step = Math.max(1, Math.floor(shortlist.length / criteria.maxCandidates));
    const picked: string[] = [];
    for (let i = 0; i < shortlist.length && picked.length < criteria.maxCandidates; i += step) {
      picked.push(shortlist[i].address);
    }
    return picked;
  }
}
