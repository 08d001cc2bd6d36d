import type {
  NodeBehaviorAnalysis,
  NodeMetrics,
  NodeRecommendation,
  RiskConfig,
  RiskLevel,
  TrendDirection,
} from '../shared/types.js';
import { AuthorizationError, NotFoundError, ValidationError } from '../shared/errors.js';
import type { KeyValueStore, TransactionalStore } from './kv-store.js';
import type { WitnessVerifier } from './identity.js';
import type { TimeSource } from './clock.js';
import { systemClock } from './clock.js';
import { TransactionalEngine } from './engine-base.js';
import { assertNotPaused } from './pause.js';
import { KEYS } from './keys.js';
import { decodeRecord, encodeRecord, NodeAnalysisRecord, NodeMetricsRecord, StringList } from './codec.js';

export const HISTORY_LENGTH = 10;
export const BASELINE_CONSISTENCY = 85;
export const LOW_PERFORMANCE_ALERT = 70;

export const DEFAULT_RISK_CONFIG: RiskConfig = {
  maxRiskThreshold: 80,
  riskTolerance: 80,
  lowRiskScore: 40,
  highRiskScore: 100,
};

export interface NodeMetricsInput {
  nodeAddress: string;
  uptimePercentage: number;
  performanceScore: number;
  blocksProduced: number;
  consensusParticipation: number;
}

// ── Scoring ──

export function riskLevelOf(metrics: Pick<NodeMetrics, 'uptimePercentage' | 'performanceScore'>): RiskLevel {
  return metrics.uptimePercentage < 90 || metrics.performanceScore < 70 ? 'high' : 'low';
}

export function riskScoreOf(
  metrics: Pick<NodeMetrics, 'uptimePercentage' | 'performanceScore'>,
  risk: RiskConfig = DEFAULT_RISK_CONFIG,
): number {
  return riskLevelOf(metrics) === 'high' ? risk.highRiskScore : risk.lowRiskScore;
}

/**
 * 100 minus the spread of the recorded performance samples.
 * Fewer than two samples give the baseline.
 */
export function consistencyScore(history: number[]): number {
  if (history.length < 2) return BASELINE_CONSISTENCY;
  const spread = Math.max(...history) - Math.min(...history);
  return Math.max(0, 100 - spread);
}

export function recommendationFor(score: number): NodeRecommendation {
  if (score >= 90) return 'excellent';
  if (score >= 80) return 'good';
  if (score >= 70) return 'fair';
  return 'poor';
}

export function analyzeMetrics(
  metrics: NodeMetrics,
  analysisPeriod: number,
  now: number,
  risk: RiskConfig = DEFAULT_RISK_CONFIG,
): NodeBehaviorAnalysis {
  const reliabilityScore = Math.floor((metrics.uptimePercentage + metrics.performanceScore) / 2);
  const consistency = consistencyScore(metrics.performanceHistory);
  const participationScore = metrics.consensusParticipation;
  return {
    nodeAddress: metrics.nodeAddress,
    analysisPeriod,
    reliabilityScore,
    consistencyScore: consistency,
    participationScore,
    riskLevel: riskLevelOf(metrics),
    riskScore: riskScoreOf(metrics, risk),
    overallScore: Math.floor((metrics.uptimePercentage + metrics.performanceScore) / 2),
    recommendation: recommendationFor(Math.floor((reliabilityScore + consistency + participationScore) / 3)),
    analyzedAt: now,
  };
}

function trendBetween(previous: number | undefined, current: number): TrendDirection {
  if (previous === undefined || previous === current) return 0;
  return current > previous ? 1 : -1;
}

// ── Storage ──

/** Node metrics, analyses and the index of reported nodes. */
export class NodeDirectory {
  constructor(private store: KeyValueStore) {}

  addresses(): string[] {
    const raw = this.store.get(KEYS.nodeIndex);
    return raw === null ? [] : decodeRecord(StringList, KEYS.nodeIndex, raw);
  }

  getMetrics(address: string): NodeMetrics | null {
    const key = KEYS.nodeMetrics(address);
    const raw = this.store.get(key);
    return raw === null ? null : decodeRecord(NodeMetricsRecord, key, raw);
  }

  list(): NodeMetrics[] {
    const nodes: NodeMetrics[] = [];
    for (const address of this.addresses()) {
      const metrics = this.getMetrics(address);
      if (metrics) nodes.push(metrics);
    }
    return nodes;
  }

  saveMetrics(metrics: NodeMetrics): void {
    this.store.put(KEYS.nodeMetrics(metrics.nodeAddress), encodeRecord(metrics));
    const index = this.addresses();
    if (!index.includes(metrics.nodeAddress)) {
      this.store.put(KEYS.nodeIndex, encodeRecord([...index, metrics.nodeAddress]));
    }
  }

  getAnalysis(address: string): NodeBehaviorAnalysis | null {
    const key = KEYS.nodeAnalysis(address);
    const raw = this.store.get(key);
    return raw === null ? null : decodeRecord(NodeAnalysisRecord, key, raw);
  }

  saveAnalysis(analysis: NodeBehaviorAnalysis): void {
    this.store.put(KEYS.nodeAnalysis(analysis.nodeAddress), encodeRecord(analysis));
  }
}

// ── Engine ──

export interface NodeAnalyzerOptions {
  store: TransactionalStore;
  verifier: WitnessVerifier;
  clock?: TimeSource;
  risk?: RiskConfig;
}

/**
 * Records consensus-node metrics reported by a witness and derives
 * behavior scores from them.
 */
export class NodeAnalyzer extends TransactionalEngine {
  private verifier: WitnessVerifier;
  private clock: TimeSource;
  readonly risk: RiskConfig;

  constructor(opts: NodeAnalyzerOptions) {
    super(opts.store);
    this.verifier = opts.verifier;
    this.clock = opts.clock ?? systemClock;
    this.risk = opts.risk ?? DEFAULT_RISK_CONFIG;
  }

  updateNodeMetrics(caller: string, input: NodeMetricsInput): NodeMetrics {
    if (!this.verifier.authorize(caller)) {
      throw new AuthorizationError(`Caller ${caller} is not authorized to report node metrics`, { caller });
    }
    validateMetricsInput(input);

    return this.commit((tx, emit) => {
      assertNotPaused(tx);
      const directory = new NodeDirectory(tx);
      const previous = directory.getMetrics(input.nodeAddress);
      const metrics: NodeMetrics = {
        nodeAddress: input.nodeAddress,
        uptimePercentage: input.uptimePercentage,
        performanceScore: input.performanceScore,
        blocksProduced: input.blocksProduced,
        consensusParticipation: input.consensusParticipation,
        lastUpdated: this.clock.now(),
        trendDirection: trendBetween(previous?.performanceScore, input.performanceScore),
        performanceHistory: [...(previous?.performanceHistory ?? []), input.performanceScore].slice(-HISTORY_LENGTH),
        reportedBy: caller,
      };
      directory.saveMetrics(metrics);
      emit({ type: 'node:metrics_updated', metrics });

      if (metrics.performanceScore < LOW_PERFORMANCE_ALERT) {
        emit({
          type: 'risk:alert',
          subject: metrics.nodeAddress,
          message: 'Low performance detected',
          riskScore: metrics.performanceScore,
        });
        console.warn(`[ANALYZER] Low performance on ${metrics.nodeAddress}: ${metrics.performanceScore}`);
      }
      return metrics;
    });
  }

  analyzeNode(address: string, analysisPeriod = 0): NodeBehaviorAnalysis {
    if (!Number.isInteger(analysisPeriod) || analysisPeriod < 0) {
      throw new ValidationError('analysisPeriod must be a non-negative integer', { analysisPeriod });
    }
    return this.commit((tx, emit) => {
      assertNotPaused(tx);
      const directory = new NodeDirectory(tx);
      const metrics = directory.getMetrics(address);
      if (!metrics) {
        throw new NotFoundError(`No metrics recorded for node ${address}`, { nodeAddress: address });
      }
      const analysis = analyzeMetrics(metrics, analysisPeriod, this.clock.now(), this.risk);
      directory.saveAnalysis(analysis);
      emit({ type: 'node:analyzed', analysis });
      return analysis;
    });
  }

  getNodeMetrics(address: string): NodeMetrics | null {
    return new NodeDirectory(this.store).getMetrics(address);
  }

  getNodeAnalysis(address: string): NodeBehaviorAnalysis | null {
    return new NodeDirectory(this.store).getAnalysis(address);
  }

  listNodes(): NodeMetrics[] {
    return new NodeDirectory(this.store).list();
  }
}

function validateMetricsInput(input: NodeMetricsInput): void {
  const problems: string[] = [];
  if (input.nodeAddress.trim().length === 0) {
    problems.push('nodeAddress is required');
  }
  const percentages = {
    uptimePercentage: input.uptimePercentage,
    performanceScore: input.performanceScore,
    consensusParticipation: input.consensusParticipation,
  };
  for (const [field, value] of Object.entries(percentages)) {
    if (!Number.isInteger(value) || value < 0 || value > 100) {
      problems.push(`${field} must be an integer between 0 and 100`);
    }
  }
  if (!Number.isInteger(input.blocksProduced) || input.blocksProduced < 0) {
    problems.push('blocksProduced must be a non-negative integer');
  }
  if (problems.length > 0) {
    throw new ValidationError('Invalid node metrics', { problems });
  }
}
