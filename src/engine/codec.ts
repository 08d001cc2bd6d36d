import { z } from 'zod';
import type {
  Proposal,
  Vote,
  VoterInfo,
  VotingConfig,
  NodeMetrics,
  NodeBehaviorAnalysis,
  VotingStrategy,
  StrategyExecution,
} from '../shared/types.js';

// ── Record encoding ──
// Records are stored as JSON; bigint weights travel as decimal strings.

export function bigintReplacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}

export function encodeRecord(value: unknown): string {
  return JSON.stringify(value, bigintReplacer);
}

export class CorruptRecordError extends Error {
  constructor(public readonly key: string, detail: string) {
    super(`Corrupt record at ${key}: ${detail}`);
    this.name = 'CorruptRecordError';
  }
}

export function decodeRecord<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, key: string, raw: string): T {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new CorruptRecordError(key, (err as Error).message);
  }
  const result = schema.safeParse(parsed);
  if (!result.success) {
    throw new CorruptRecordError(
      key,
      result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; '),
    );
  }
  return result.data;
}

// ── Stored record schemas ──

const Weight = z.string().regex(/^\d+$/).transform((v) => BigInt(v));
const Timestamp = z.number().int().min(0);

export const ProposalRecord: z.ZodType<Proposal, z.ZodTypeDef, unknown> = z.object({
  id: z.string(),
  title: z.string(),
  description: z.string(),
  proposer: z.string(),
  target: z.string(),
  payload: z.string(),
  createdAt: Timestamp,
  votingStart: Timestamp,
  votingEnd: Timestamp,
  executionTime: Timestamp,
  status: z.enum(['active', 'quorum_reached', 'executed', 'failed', 'cancelled', 'execution_failed']),
  yesWeight: Weight,
  noWeight: Weight,
  totalVotingPowerSnapshot: Weight,
});

export const VoteRecord: z.ZodType<Vote, z.ZodTypeDef, unknown> = z.object({
  proposalId: z.string(),
  voter: z.string(),
  support: z.boolean(),
  weight: Weight,
  reason: z.string(),
  castAt: Timestamp,
});

export const VoterRecord: z.ZodType<VoterInfo, z.ZodTypeDef, unknown> = z.object({
  address: z.string(),
  votingPower: Weight,
  registeredAt: Timestamp,
  isActive: z.boolean(),
  votesCast: z.number().int().min(0),
});

export const VotingConfigRecord: z.ZodType<VotingConfig, z.ZodTypeDef, unknown> = z.object({
  votingPeriod: z.number().int(),
  executionDelay: z.number().int(),
  quorumThresholdBps: z.number().int(),
  requireRegistration: z.boolean(),
});

export const NodeMetricsRecord: z.ZodType<NodeMetrics, z.ZodTypeDef, unknown> = z.object({
  nodeAddress: z.string(),
  uptimePercentage: z.number().int(),
  performanceScore: z.number().int(),
  blocksProduced: z.number().int(),
  consensusParticipation: z.number().int(),
  lastUpdated: Timestamp,
  trendDirection: z.union([z.literal(-1), z.literal(0), z.literal(1)]),
  performanceHistory: z.array(z.number().int()),
  reportedBy: z.string(),
});

export const NodeAnalysisRecord: z.ZodType<NodeBehaviorAnalysis, z.ZodTypeDef, unknown> = z.object({
  nodeAddress: z.string(),
  analysisPeriod: z.number().int(),
  reliabilityScore: z.number().int(),
  consistencyScore: z.number().int(),
  participationScore: z.number().int(),
  riskLevel: z.enum(['low', 'high']),
  riskScore: z.number().int(),
  overallScore: z.number().int(),
  recommendation: z.enum(['excellent', 'good', 'fair', 'poor']),
  analyzedAt: Timestamp,
});

export const StrategyRecord: z.ZodType<VotingStrategy, z.ZodTypeDef, unknown> = z.object({
  id: z.string(),
  name: z.string(),
  description: z.string(),
  creator: z.string(),
  type: z.enum(['performance', 'risk_adjusted', 'diversification', 'ml_driven']),
  maxCandidates: z.number().int(),
  minScore: z.number().int(),
  autoExecute: z.boolean(),
  executionInterval: z.number().int(),
  createdAt: Timestamp,
  lastExecution: Timestamp.nullable(),
  nextExecution: Timestamp.nullable(),
  isActive: z.boolean(),
  executionCount: z.number().int(),
});

export const StrategyExecutionRecord: z.ZodType<StrategyExecution, z.ZodTypeDef, unknown> = z.object({
  strategyId: z.string(),
  sequence: z.number().int(),
  executedAt: Timestamp,
  executor: z.string(),
  candidates: z.array(z.string()),
  riskScore: z.number().int(),
  success: z.boolean(),
});

export const StringList = z.array(z.string());

export const Counter = z.number().int().min(0);

export const WeightValue = Weight;

export const AddressValue = z.string().min(1);

export const Flag = z.boolean();
