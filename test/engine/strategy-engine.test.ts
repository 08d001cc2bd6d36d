import { describe, it, expect, beforeEach } from 'vitest';
import { StrategyEngine, aggregateRisk, type CreateStrategyInput } from '@/engine/strategy-engine.js';
import { NodeAnalyzer } from '@/engine/node-analyzer.js';
import { GovernanceEngine } from '@/engine/governance-engine.js';
import { MemoryKeyValueStore } from '@/engine/kv-store.js';
import { AllowListVerifier } from '@/engine/identity.js';
import { ManualClock } from '@/engine/clock.js';
import type { GovernanceEvent } from '@/shared/events.js';
import {
  AuthorizationError,
  NotFoundError,
  StateConflictError,
  ValidationError,
} from '@/shared/errors.js';

let clock: ManualClock;
let analyzer: NodeAnalyzer;
let governance: GovernanceEngine;
let engine: StrategyEngine;
let events: GovernanceEvent[];
let nextId: number;

beforeEach(() => {
  const store = new MemoryKeyValueStore();
  const verifier = new AllowListVerifier(['admin']);
  clock = new ManualClock(1_000);
  nextId = 0;
  analyzer = new NodeAnalyzer({ store, verifier, clock });
  governance = new GovernanceEngine({ store, verifier, clock });
  engine = new StrategyEngine({
    store,
    verifier,
    clock,
    generateId: () => `strategy-${++nextId}`,
  });
  events = [];
  engine.onEvent((e) => events.push(e));
});

function report(nodeAddress: string, performanceScore: number, uptimePercentage: number): void {
  analyzer.updateNodeMetrics('admin', {
    nodeAddress,
    uptimePercentage,
    performanceScore,
    blocksProduced: 100,
    consensusParticipation: 95,
  });
}

function strategyInput(overrides: Partial<CreateStrategyInput> = {}): CreateStrategyInput {
  return { name: 'Top performers', type: 'performance', maxCandidates: 2, minScore: 80, ...overrides };
}

function reportHealthyNodes(): void {
  report('node-1', 95, 99);
  report('node-2', 90, 99);
  report('node-3', 85, 99);
}

// ── aggregateRisk ──

describe('aggregateRisk', () => {
  it('averages per-node risk and rounds down', () => {
    const nodes = [
      { address: 'a', performanceScore: 90, uptimePercentage: 90, riskScore: 100 },
      { address: 'b', performanceScore: 90, uptimePercentage: 90, riskScore: 40 },
      { address: 'c', performanceScore: 90, uptimePercentage: 90, riskScore: 41 },
    ];
    expect(aggregateRisk(['a', 'b'], nodes)).toBe(70);
    expect(aggregateRisk(['a', 'b', 'c'], nodes)).toBe(60);
  });

  it('is zero for an empty candidate set', () => {
    expect(aggregateRisk([], [])).toBe(0);
  });
});

// ── createStrategy ──

describe('createStrategy', () => {
  it('stores a new active strategy', () => {
    const strategy = engine.createStrategy('alice', strategyInput());
    expect(strategy).toEqual({
      id: 'strategy-1',
      name: 'Top performers',
      description: '',
      creator: 'alice',
      type: 'performance',
      maxCandidates: 2,
      minScore: 80,
      autoExecute: false,
      executionInterval: 0,
      createdAt: 1_000,
      lastExecution: null,
      nextExecution: null,
      isActive: true,
      executionCount: 0,
    });
    expect(engine.getStrategy('strategy-1')).toEqual(strategy);
    expect(events).toEqual([{ type: 'strategy:created', strategy }]);
  });

  it('schedules auto-executing strategies', () => {
    const strategy = engine.createStrategy('alice', strategyInput({ autoExecute: true, executionInterval: 3_600 }));
    expect(strategy.nextExecution).toBe(4_600);
  });

  it('validates its parameters', () => {
    expect(() => engine.createStrategy('alice', strategyInput({ name: ' ' }))).toThrow(ValidationError);
    expect(() => engine.createStrategy('alice', strategyInput({ maxCandidates: 0 }))).toThrow(ValidationError);
    expect(() => engine.createStrategy('alice', strategyInput({ maxCandidates: 22 }))).toThrow(ValidationError);
    expect(() => engine.createStrategy('alice', strategyInput({ minScore: 101 }))).toThrow(ValidationError);
    expect(() => engine.createStrategy('alice', strategyInput({ executionInterval: -1 }))).toThrow(ValidationError);
    expect(() => engine.createStrategy('alice', strategyInput({ autoExecute: true }))).toThrow(ValidationError);
    expect(events).toEqual([]);
  });
});

// ── executeStrategy ──

describe('executeStrategy', () => {
  it('refuses a run whose aggregate risk exceeds the threshold without mutating state', () => {
    // Three high-risk nodes (uptime below 90) and one low-risk node: (3 × 100 + 40) / 4 = 85
    report('node-1', 95, 85);
    report('node-2', 94, 85);
    report('node-3', 93, 85);
    report('node-4', 92, 99);
    const strategy = engine.createStrategy('alice', strategyInput({ maxCandidates: 4, minScore: 0 }));
    events.length = 0;

    const result = engine.executeStrategy('alice', strategy.id);

    expect(result).toEqual({
      success: false,
      reason: 'risk_threshold_exceeded',
      candidates: ['node-1', 'node-2', 'node-3', 'node-4'],
      riskScore: 85,
    });
    expect(events).toEqual([{
      type: 'risk:alert',
      subject: strategy.id,
      message: 'Strategy risk 85 exceeds threshold 80',
      riskScore: 85,
    }]);
    expect(engine.getStrategy(strategy.id)).toEqual(strategy);
    expect(engine.listExecutions(strategy.id)).toEqual([]);
  });

  it('records an execution for an acceptable run', () => {
    reportHealthyNodes();
    const strategy = engine.createStrategy('alice', strategyInput());
    clock.set(2_000);
    events.length = 0;

    const result = engine.executeStrategy('alice', strategy.id);

    const execution = {
      strategyId: strategy.id,
      sequence: 1,
      executedAt: 2_000,
      executor: 'alice',
      candidates: ['node-1', 'node-2'],
      riskScore: 40,
      success: true,
    };
    expect(result).toEqual({ success: true, dryRun: false, candidates: ['node-1', 'node-2'], riskScore: 40, execution });
    expect(events).toEqual([{ type: 'strategy:executed', execution }]);
    expect(engine.listExecutions(strategy.id)).toEqual([execution]);

    const updated = engine.getStrategy(strategy.id);
    expect(updated?.executionCount).toBe(1);
    expect(updated?.lastExecution).toBe(2_000);
    expect(updated?.nextExecution).toBeNull();
  });

  it('leaves state untouched on a dry run', () => {
    reportHealthyNodes();
    const strategy = engine.createStrategy('alice', strategyInput());
    events.length = 0;

    const result = engine.executeStrategy('alice', strategy.id, { dryRun: true });

    expect(result).toEqual({ success: true, dryRun: true, candidates: ['node-1', 'node-2'], riskScore: 40, execution: null });
    expect(events).toEqual([
      { type: 'strategy:recommendation', strategyId: strategy.id, candidates: ['node-1', 'node-2'], riskScore: 40 },
    ]);
    expect(engine.getStrategy(strategy.id)?.executionCount).toBe(0);
  });

  it('succeeds with no candidates and zero risk', () => {
    const strategy = engine.createStrategy('alice', strategyInput());
    const result = engine.executeStrategy('alice', strategy.id);
    expect(result.success).toBe(true);
    expect(result.candidates).toEqual([]);
    expect(result.riskScore).toBe(0);
  });

  it('runs ml_driven strategies with the performance selector', () => {
    reportHealthyNodes();
    const strategy = engine.createStrategy('alice', strategyInput({ type: 'ml_driven', maxCandidates: 1 }));
    expect(engine.executeStrategy('alice', strategy.id).candidates).toEqual(['node-1']);
  });

  it('allows the creator or a witness, nobody else', () => {
    const strategy = engine.createStrategy('alice', strategyInput());
    expect(() => engine.executeStrategy('bob', strategy.id)).toThrow(AuthorizationError);
    expect(engine.executeStrategy('admin', strategy.id).success).toBe(true);
    expect(engine.getStrategy(strategy.id)?.executionCount).toBe(1);
  });

  it('throws NotFoundError for an unknown strategy', () => {
    expect(() => engine.executeStrategy('alice', 'missing')).toThrow(NotFoundError);
    expect(() => engine.listExecutions('missing')).toThrow(NotFoundError);
  });

  it('numbers executions in order', () => {
    reportHealthyNodes();
    const strategy = engine.createStrategy('alice', strategyInput());
    engine.executeStrategy('alice', strategy.id);
    clock.advance(10);
    engine.executeStrategy('admin', strategy.id);
    expect(engine.listExecutions(strategy.id).map((e) => [e.sequence, e.executor, e.executedAt])).toEqual([
      [1, 'alice', 1_000],
      [2, 'admin', 1_010],
    ]);
  });
});

// ── Scheduling ──

describe('triggerScheduledExecution', () => {
  it('reports strategies without a schedule', () => {
    const strategy = engine.createStrategy('alice', strategyInput());
    expect(engine.triggerScheduledExecution('scheduler', strategy.id)).toEqual({
      success: false,
      reason: 'not_scheduled',
      candidates: [],
      riskScore: 0,
    });
  });

  it('waits for the next execution time, then runs and reschedules', () => {
    reportHealthyNodes();
    const strategy = engine.createStrategy('alice', strategyInput({ autoExecute: true, executionInterval: 3_600 }));

    clock.set(4_599);
    expect(engine.triggerScheduledExecution('scheduler', strategy.id)).toEqual({
      success: false,
      reason: 'not_due',
      candidates: [],
      riskScore: 0,
    });

    clock.set(4_600);
    const result = engine.triggerScheduledExecution('scheduler', strategy.id);
    expect(result.success).toBe(true);
    const updated = engine.getStrategy(strategy.id);
    expect(updated?.lastExecution).toBe(4_600);
    expect(updated?.nextExecution).toBe(8_200);
    expect(engine.listExecutions(strategy.id)[0].executor).toBe('scheduler');
  });

  it('emits strategy:triggered ahead of the run it starts', () => {
    reportHealthyNodes();
    const strategy = engine.createStrategy('alice', strategyInput({ autoExecute: true, executionInterval: 60 }));
    clock.set(1_060);
    events.length = 0;

    engine.triggerScheduledExecution('scheduler', strategy.id);

    expect(events.map((e) => e.type)).toEqual(['strategy:triggered', 'strategy:executed']);
    expect(events[0]).toEqual({
      type: 'strategy:triggered',
      strategyId: strategy.id,
      creator: 'alice',
      triggeredBy: 'scheduler',
    });
  });

  it('emits nothing when the strategy is not due', () => {
    const strategy = engine.createStrategy('alice', strategyInput({ autoExecute: true, executionInterval: 60 }));
    events.length = 0;
    engine.triggerScheduledExecution('scheduler', strategy.id);
    expect(events).toEqual([]);
  });
});

// ── Pause switch ──

describe('while governance is paused', () => {
  it('blocks writes but still serves dry runs and recommendations', () => {
    reportHealthyNodes();
    const strategy = engine.createStrategy('alice', strategyInput({ autoExecute: true, executionInterval: 60 }));
    governance.setPaused('admin', true);
    clock.set(1_060);

    expect(() => engine.createStrategy('alice', strategyInput())).toThrow(StateConflictError);
    expect(() => engine.executeStrategy('alice', strategy.id)).toThrow(StateConflictError);
    expect(() => engine.triggerScheduledExecution('scheduler', strategy.id)).toThrow(StateConflictError);
    expect(() => engine.deactivateStrategy('alice', strategy.id)).toThrow(StateConflictError);
    expect(engine.executeStrategy('alice', strategy.id, { dryRun: true }).success).toBe(true);
    expect(engine.recommend('performance', 1, 0).candidates).toEqual(['node-1']);
    expect(engine.getStrategy(strategy.id)?.executionCount).toBe(0);

    governance.setPaused('admin', false);
    expect(engine.triggerScheduledExecution('scheduler', strategy.id).success).toBe(true);
  });
});

// ── deactivateStrategy ──

describe('deactivateStrategy', () => {
  it('stops further runs', () => {
    const strategy = engine.createStrategy('alice', strategyInput({ autoExecute: true, executionInterval: 60 }));
    expect(() => engine.deactivateStrategy('bob', strategy.id)).toThrow(AuthorizationError);

    const deactivated = engine.deactivateStrategy('alice', strategy.id);
    expect(deactivated.isActive).toBe(false);
    expect(deactivated.nextExecution).toBeNull();
    expect(events.at(-1)).toEqual({ type: 'strategy:deactivated', strategyId: strategy.id, deactivatedBy: 'alice' });

    expect(() => engine.executeStrategy('alice', strategy.id)).toThrow(StateConflictError);
    expect(() => engine.deactivateStrategy('admin', strategy.id)).toThrow(StateConflictError);
    clock.advance(120);
    expect(engine.triggerScheduledExecution('scheduler', strategy.id).success).toBe(false);
  });
});

// ── recommend ──

describe('recommend', () => {
  it('runs a selector without recording anything', () => {
    reportHealthyNodes();
    report('node-4', 99, 80);
    expect(engine.recommend('performance', 2, 0)).toEqual({ candidates: ['node-4', 'node-1'], riskScore: 70 });
    expect(engine.recommend('risk_adjusted', 2, 0)).toEqual({ candidates: ['node-1', 'node-2'], riskScore: 40 });
    expect(events).toEqual([]);
  });

  it('validates the criteria', () => {
    expect(() => engine.recommend('performance', 0, 0)).toThrow(ValidationError);
    expect(() => engine.recommend('performance', 3, -1)).toThrow(ValidationError);
  });
});
