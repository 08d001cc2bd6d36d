import { describe, it, expect } from 'vitest';
import { acceptsVotes, assertTransition, isTerminal, validTransitions } from '@/engine/proposal-lifecycle.js';
import { StateConflictError } from '@/shared/errors.js';
import type { ProposalStatus } from '@/shared/types.js';

const terminal: ProposalStatus[] = ['executed', 'failed', 'cancelled', 'execution_failed'];

describe('proposal lifecycle', () => {
  it('lets an active proposal reach quorum, finalize or be cancelled', () => {
    expect(validTransitions('active')).toEqual(['quorum_reached', 'executed', 'failed', 'execution_failed', 'cancelled']);
  });

  it('does not let a proposal at quorum be cancelled or fall back', () => {
    expect(validTransitions('quorum_reached')).toEqual(['executed', 'failed', 'execution_failed']);
    expect(() => assertTransition('p1', 'quorum_reached', 'active')).toThrow(StateConflictError);
    expect(() => assertTransition('p1', 'quorum_reached', 'cancelled')).toThrow(StateConflictError);
  });

  it('treats finalized states as terminal', () => {
    for (const status of terminal) {
      expect(isTerminal(status)).toBe(true);
      expect(acceptsVotes(status)).toBe(false);
      expect(() => assertTransition('p1', status, 'executed')).toThrow(StateConflictError);
    }
    expect(isTerminal('active')).toBe(false);
    expect(isTerminal('quorum_reached')).toBe(false);
  });

  it('accepts votes while active or at quorum', () => {
    expect(acceptsVotes('active')).toBe(true);
    expect(acceptsVotes('quorum_reached')).toBe(true);
  });

  it('reports the attempted transition on conflict', () => {
    try {
      assertTransition('p1', 'executed', 'failed');
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(StateConflictError);
      if (err instanceof StateConflictError) {
        expect(err.details).toEqual({ proposalId: 'p1', from: 'executed', to: 'failed' });
        expect(err.code).toBe('state_conflict');
      }
    }
  });
});
