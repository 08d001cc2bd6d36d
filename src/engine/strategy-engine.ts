import { nanoid } from 'nanoid';
import type {
  RiskConfig,
  StrategyExecution,
  StrategyRunResult,
  StrategyType,
  VotingStrategy,
} from '../shared/types.js';
import { AuthorizationError, NotFoundError, StateConflictError, ValidationError } from '../shared/errors.js';
import type { KeyValueStore, TransactionalStore } from './kv-store.js';
import type { WitnessVerifier } from './identity.js';
import type { TimeSource } from './clock.js';
import { systemClock } from './clock.js';
import type { Emit } from './engine-base.js';
import { TransactionalEngine } from './engine-base.js';
import { KEYS } from './keys.js';
import { decodeRecord, encodeRecord, StrategyExecutionRecord, StrategyRecord } from './codec.js';
import { DEFAULT_RISK_CONFIG, NodeDirectory, riskScoreOf } from './node-analyzer.js';
import { assertNotPaused } from './pause.js';
import { createCandidateSelector, isFallbackSelector, type CandidateNode } from './strategies/index.js';

export const MAX_CANDIDATES = 21;

export interface CreateStrategyInput {
  name: string;
  description?: string;
  type: StrategyType;
  maxCandidates: number;
  minScore: number;
  autoExecute?: boolean;
  /** Seconds between scheduled runs. Required when autoExecute is set. */
  executionInterval?: number;
}

export interface Recommendation {
  candidates: string[];
  riskScore: number;
}

export interface StrategyEngineOptions {
  store: TransactionalStore;
  verifier: WitnessVerifier;
  clock?: TimeSource;
  risk?: RiskConfig;
  generateId?: () => string;
}

/** Mean per-node risk of the selected candidates, rounded down. 0 when none. */
export function aggregateRisk(candidates: string[], nodes: CandidateNode[]): number {
  if (candidates.length === 0) return 0;
  const byAddress = new Map(nodes.map((n) => [n.address, n.riskScore]));
  const total = candidates.reduce((sum, address) => sum + (byAddress.get(address) ?? 0), 0);
  return Math.floor(total / candidates.length);
}

/**
 * Candidate-selection strategies over the reported consensus nodes.
 * Runs whose aggregate risk is above the threshold are refused with a
 * result value, never an exception.
 */
export class StrategyEngine extends TransactionalEngine {
  private verifier: WitnessVerifier;
  private clock: TimeSource;
  private risk: RiskConfig;
  private generateId: () => string;

  constructor(opts: StrategyEngineOptions) {
    super(opts.store);
    this.verifier = opts.verifier;
    this.clock = opts.clock ?? systemClock;
    this.risk = opts.risk ?? DEFAULT_RISK_CONFIG;
    this.generateId = opts.generateId ?? (() => nanoid());
  }

  createStrategy(caller: string, input: CreateStrategyInput): VotingStrategy {
    const autoExecute = input.autoExecute ?? false;
    const executionInterval = input.executionInterval ?? 0;
    validateStrategyInput(input, autoExecute, executionInterval);

    return this.commit((tx, emit) => {
      assertNotPaused(tx);
      const now = this.clock.now();
      const strategy: VotingStrategy = {
        id: this.generateId(),
        name: input.name,
        description: input.description ?? '',
        creator: caller,
        type: input.type,
        maxCandidates: input.maxCandidates,
        minScore: input.minScore,
        autoExecute,
        executionInterval,
        createdAt: now,
        lastExecution: null,
        nextExecution: autoExecute ? now + executionInterval : null,
        isActive: true,
        executionCount: 0,
      };
      saveStrategy(tx, strategy);
      emit({ type: 'strategy:created', strategy });
      console.log(`[STRATEGY] Strategy ${strategy.id} (${strategy.type}) created by ${caller}`);
      return strategy;
    });
  }

  executeStrategy(caller: string, strategyId: string, opts: { dryRun?: boolean } = {}): StrategyRunResult {
    return this.commit((tx, emit) => {
      const strategy = requireStrategy(tx, strategyId);
      this.requireOwnerOrWitness(caller, strategy, 'execute');
      if (!strategy.isActive) {
        throw new StateConflictError(`Strategy ${strategyId} is inactive`, { strategyId });
      }
      // Dry runs write nothing and stay available while paused
      if (!opts.dryRun) assertNotPaused(tx);
      return this.run(tx, emit, strategy, caller, opts.dryRun ?? false);
    });
  }

  /** Runs an auto-executing strategy whose next execution time has come. */
  triggerScheduledExecution(caller: string, strategyId: string): StrategyRunResult {
    return this.commit<StrategyRunResult>((tx, emit) => {
      const strategy = requireStrategy(tx, strategyId);
      if (!strategy.isActive || !strategy.autoExecute || strategy.nextExecution === null) {
        return { success: false, reason: 'not_scheduled', candidates: [], riskScore: 0 };
      }
      if (this.clock.now() < strategy.nextExecution) {
        return { success: false, reason: 'not_due', candidates: [], riskScore: 0 };
      }
      assertNotPaused(tx);
      emit({ type: 'strategy:triggered', strategyId, creator: strategy.creator, triggeredBy: caller });
      return this.run(tx, emit, strategy, caller, false);
    });
  }

  deactivateStrategy(caller: string, strategyId: string): VotingStrategy {
    return this.commit((tx, emit) => {
      assertNotPaused(tx);
      const strategy = requireStrategy(tx, strategyId);
      this.requireOwnerOrWitness(caller, strategy, 'deactivate');
      if (!strategy.isActive) {
        throw new StateConflictError(`Strategy ${strategyId} is already inactive`, { strategyId });
      }
      const updated: VotingStrategy = { ...strategy, isActive: false, nextExecution: null };
      saveStrategy(tx, updated);
      emit({ type: 'strategy:deactivated', strategyId, deactivatedBy: caller });
      console.log(`[STRATEGY] Strategy ${strategyId} deactivated by ${caller}`);
      return updated;
    });
  }

  getStrategy(strategyId: string): VotingStrategy | null {
    return readStrategy(this.store, strategyId);
  }

  listExecutions(strategyId: string): StrategyExecution[] {
    const strategy = requireStrategy(this.store, strategyId);
    const executions: StrategyExecution[] = [];
    for (let sequence = 1; sequence <= strategy.executionCount; sequence++) {
      const key = KEYS.strategyExecution(strategyId, sequence);
      const raw = this.store.get(key);
      if (raw !== null) executions.push(decodeRecord(StrategyExecutionRecord, key, raw));
    }
    return executions;
  }

  /** Read-only selector run against the current node set. */
  recommend(type: StrategyType, maxCandidates: number, minScore: number): Recommendation {
    validateCriteria(maxCandidates, minScore);
    const nodes = this.candidateNodes(this.store);
    const candidates = createCandidateSelector(type).select(nodes, {
      maxCandidates,
      minScore,
      riskTolerance: this.risk.riskTolerance,
    });
    return { candidates, riskScore: aggregateRisk(candidates, nodes) };
  }

  private run(
    tx: KeyValueStore,
    emit: Emit,
    strategy: VotingStrategy,
    caller: string,
    dryRun: boolean,
  ): StrategyRunResult {
    if (isFallbackSelector(strategy.type)) {
      console.warn(`[STRATEGY] ${strategy.type} selection is not available, ranking ${strategy.id} by performance`);
    }
    const nodes = this.candidateNodes(tx);
    const candidates = createCandidateSelector(strategy.type).select(nodes, {
      maxCandidates: strategy.maxCandidates,
      minScore: strategy.minScore,
      riskTolerance: this.risk.riskTolerance,
    });
    const riskScore = aggregateRisk(candidates, nodes);

    if (riskScore > this.risk.maxRiskThreshold) {
      emit({
        type: 'risk:alert',
        subject: strategy.id,
        message: `Strategy risk ${riskScore} exceeds threshold ${this.risk.maxRiskThreshold}`,
        riskScore,
      });
      console.warn(`[STRATEGY] Strategy ${strategy.id} refused: risk ${riskScore}`);
      return { success: false, reason: 'risk_threshold_exceeded', candidates, riskScore };
    }

    if (dryRun) {
      emit({ type: 'strategy:recommendation', strategyId: strategy.id, candidates, riskScore });
      return { success: true, dryRun: true, candidates, riskScore, execution: null };
    }

    const now = this.clock.now();
    const execution: StrategyExecution = {
      strategyId: strategy.id,
      sequence: strategy.executionCount + 1,
      executedAt: now,
      executor: caller,
      candidates,
      riskScore,
      success: true,
    };
    tx.put(KEYS.strategyExecution(strategy.id, execution.sequence), encodeRecord(execution));
    saveStrategy(tx, {
      ...strategy,
      executionCount: execution.sequence,
      lastExecution: now,
      nextExecution: strategy.autoExecute ? now + strategy.executionInterval : null,
    });
    emit({ type: 'strategy:executed', execution });
    console.log(`[STRATEGY] Strategy ${strategy.id} run #${execution.sequence}: ${candidates.length} candidates, risk ${riskScore}`);
    return { success: true, dryRun: false, candidates, riskScore, execution };
  }

  private candidateNodes(store: KeyValueStore): CandidateNode[] {
    return new NodeDirectory(store).list().map((m) => ({
      address: m.nodeAddress,
      performanceScore: m.performanceScore,
      uptimePercentage: m.uptimePercentage,
      riskScore: riskScoreOf(m, this.risk),
    }));
  }

  private requireOwnerOrWitness(caller: string, strategy: VotingStrategy, action: string): void {
    if (caller !== strategy.creator && !this.verifier.authorize(caller)) {
      throw new AuthorizationError(`Caller ${caller} may not ${action} strategy ${strategy.id}`, {
        caller,
        strategyId: strategy.id,
      });
    }
  }
}

function readStrategy(store: KeyValueStore, strategyId: string): VotingStrategy | null {
  const key = KEYS.strategy(strategyId);
  const raw = store.get(key);
  return raw === null ? null : decodeRecord(StrategyRecord, key, raw);
}

function requireStrategy(store: KeyValueStore, strategyId: string): VotingStrategy {
  const strategy = readStrategy(store, strategyId);
  if (!strategy) {
    throw new NotFoundError(`Strategy not found: ${strategyId}`, { strategyId });
  }
  return strategy;
}

function saveStrategy(store: KeyValueStore, strategy: VotingStrategy): void {
  store.put(KEYS.strategy(strategy.id), encodeRecord(strategy));
}

function validateCriteria(maxCandidates: number, minScore: number): void {
  if (!Number.isInteger(maxCandidates) || maxCandidates < 1 || maxCandidates > MAX_CANDIDATES) {
    throw new ValidationError(`maxCandidates must be between 1 and ${MAX_CANDIDATES}`, { maxCandidates });
  }
  if (!Number.isInteger(minScore) || minScore < 0 || minScore > 100) {
    throw new ValidationError('minScore must be between 0 and 100', { minScore });
  }
}

function validateStrategyInput(input: CreateStrategyInput, autoExecute: boolean, executionInterval: number): void {
  if (input.name.trim().length === 0) {
    throw new ValidationError('Strategy name is required');
  }
  validateCriteria(input.maxCandidates, input.minScore);
  if (!Number.isInteger(executionInterval) || executionInterval < 0) {
    throw new ValidationError('executionInterval must be a non-negative integer', { executionInterval });
  }
  if (autoExecute && executionInterval === 0) {
    throw new ValidationError('Auto-executing strategies need an executionInterval', { executionInterval });
  }
}
