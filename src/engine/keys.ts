// ── Storage key layout ──
// Every record lives under `{prefix}{entity id}`; composite ids join with ':'.

export const KEYS = {
  proposalCount: 'proposal_count',
  votingConfig: 'voting_config',
  totalVotingPower: 'total_voting_power',
  nodeIndex: 'node_index',
  paused: 'paused',
  proposal: (id: string) => `proposal:${id}`,
  vote: (proposalId: string, voter: string) => `vote:${proposalId}:${voter}`,
  voter: (address: string) => `voter:${address}`,
  delegation: (delegator: string) => `delegation:${delegator}`,
  strategy: (id: string) => `strategy:${id}`,
  strategyExecution: (strategyId: string, sequence: number) => `strategy_exec:${strategyId}:${sequence}`,
  nodeMetrics: (address: string) => `node_metrics:${address}`,
  nodeAnalysis: (address: string) => `node_analysis:${address}`,
} as const;
