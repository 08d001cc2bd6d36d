import { z } from 'zod';

// ── Zod schemas for YAML config validation ──

const VotingDefaultsSchema = z.object({
  voting_period: z.number().int().min(3600).default(604800),
  execution_delay: z.number().int().min(0).default(86400),
  quorum_threshold_bps: z.number().int().min(1).max(10000).default(5000),
  require_registration: z.boolean().default(true),
}).transform((v) => ({
  votingPeriod: v.voting_period,
  executionDelay: v.execution_delay,
  quorumThresholdBps: v.quorum_threshold_bps,
  requireRegistration: v.require_registration,
}));

const RiskConfigSchema = z.object({
  max_risk_threshold: z.number().int().min(0).max(100).default(80),
  risk_tolerance: z.number().int().min(0).max(100).default(80),
  low_risk_score: z.number().int().min(0).max(100).default(40),
  high_risk_score: z.number().int().min(0).max(100).default(100),
}).refine(
  (r) => r.low_risk_score <= r.high_risk_score,
  { message: 'low_risk_score must not exceed high_risk_score' },
).transform((r) => ({
  maxRiskThreshold: r.max_risk_threshold,
  riskTolerance: r.risk_tolerance,
  lowRiskScore: r.low_risk_score,
  highRiskScore: r.high_risk_score,
}));

const ExecutorConfigSchema = z.object({
  type: z.enum(['log']).default('log'),
});

const CallerSchema = z.object({
  identity: z.string().min(1),
  token: z.string().min(1),
});

const GovernanceBodySchema = z.object({
  name: z.string().min(1),
  description: z.string().default(''),
  admins: z.array(z.string().min(1)).default([]),
  callers: z.array(CallerSchema).default([]),
  voting_defaults: VotingDefaultsSchema.default({}),
  risk: RiskConfigSchema.default({}),
  executor: ExecutorConfigSchema.default({ type: 'log' }),
}).transform(({ voting_defaults, ...rest }) => ({
  ...rest,
  votingDefaults: voting_defaults,
}));

export const GovernanceConfigSchema = z.object({
  version: z.literal('1'),
  governance: GovernanceBodySchema,
});

export type ValidatedGovernanceConfig = z.infer<typeof GovernanceConfigSchema>;

// Callers must carry distinct identities and tokens
export function validateCallerReferences(config: ValidatedGovernanceConfig): string[] {
  const errors: string[] = [];
  const identities = new Set<string>();
  const tokens = new Set<string>();

  for (const caller of config.governance.callers) {
    if (identities.has(caller.identity)) {
      errors.push(`Caller identity "${caller.identity}" is declared more than once`);
    }
    if (tokens.has(caller.token)) {
      errors.push(`Caller "${caller.identity}" reuses a token already assigned to another caller`);
    }
    identities.add(caller.identity);
    tokens.add(caller.token);
  }

  const known = new Set(config.governance.callers.map((c) => c.identity));
  if (known.size > 0) {
    for (const admin of config.governance.admins) {
      if (!known.has(admin)) {
        errors.push(`Admin "${admin}" has no caller token`);
      }
    }
  }

  return errors;
}

// ── Request bodies for the HTTP API ──

const WeightSchema = z
  .union([z.string().regex(/^-?\d+$/, 'must be an integer string'), z.number().int()])
  .transform((v) => BigInt(v));

export const CreateProposalBodySchema = z.object({
  title: z.string(),
  description: z.string(),
  target: z.string().default(''),
  payload: z.string().default(''),
  entropy: z.string().optional(),
});

export const CastVoteBodySchema = z.object({
  support: z.boolean(),
  reason: z.string().default(''),
});

export const RegisterVoterBodySchema = z.object({
  address: z.string(),
  votingPower: WeightSchema,
});

export const VotingConfigBodySchema = z.object({
  votingPeriod: z.number().int(),
  executionDelay: z.number().int(),
  quorumThresholdBps: z.number().int(),
  requireRegistration: z.boolean(),
});

export const CreateStrategyBodySchema = z.object({
  name: z.string(),
  description: z.string().default(''),
  type: z.enum(['performance', 'risk_adjusted', 'diversification', 'ml_driven']),
  maxCandidates: z.number().int(),
  minScore: z.number().int(),
  autoExecute: z.boolean().default(false),
  executionInterval: z.number().int().default(0),
});

export const ExecuteStrategyBodySchema = z.object({
  dryRun: z.boolean().default(false),
});

export const NodeMetricsBodySchema = z.object({
  nodeAddress: z.string(),
  uptimePercentage: z.number().int(),
  performanceScore: z.number().int(),
  blocksProduced: z.number().int(),
  consensusParticipation: z.number().int(),
});

export const AnalyzeNodeBodySchema = z.object({
  analysisPeriod: z.number().int().min(0).default(0),
});

export const RecommendationQuerySchema = z.object({
  type: z.enum(['performance', 'risk_adjusted', 'diversification', 'ml_driven']).default('performance'),
  maxCandidates: z.coerce.number().int(),
  minScore: z.coerce.number().int().default(0),
});

export const EventsQuerySchema = z.object({
  since: z.coerce.number().int().min(0).default(0),
  limit: z.coerce.number().int().min(0).optional(),
});

export const DelegateBodySchema = z.object({
  delegate: z.string(),
});

export const PauseBodySchema = z.object({
  paused: z.boolean(),
});
