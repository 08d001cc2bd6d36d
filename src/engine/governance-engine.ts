import type { Proposal, ProposalStatus, Vote, VoterInfo, VotingConfig } from '../shared/types.js';
import {
  AuthorizationError,
  NotFoundError,
  StateConflictError,
  ValidationError,
} from '../shared/errors.js';
import type { TransactionalStore } from './kv-store.js';
import type { WitnessVerifier } from './identity.js';
import type { TimeSource } from './clock.js';
import { systemClock } from './clock.js';
import type { IdGenerator } from './id-generator.js';
import { sha256IdGenerator } from './id-generator.js';
import type { ProposalExecutor } from './executor.js';
import { LogProposalExecutor } from './executor.js';
import { TransactionalEngine } from './engine-base.js';
import { ProposalStore } from './proposal-store.js';
import { VoterRegistry } from './voter-registry.js';
import { DelegationRegistry } from './delegation.js';
import { assertNotPaused, isPaused, writePaused } from './pause.js';
import { DEFAULT_VOTING_CONFIG, readVotingConfig, validateVotingConfig, writeVotingConfig } from './voting-config.js';
import { acceptsVotes, assertTransition, isTerminal } from './proposal-lifecycle.js';
import { applyVote, passes, quorumMet, requiredQuorum, totalCast } from './quorum.js';

export interface GovernanceEngineOptions {
  store: TransactionalStore;
  verifier: WitnessVerifier;
  clock?: TimeSource;
  ids?: IdGenerator;
  executor?: ProposalExecutor;
  /** Used until a configuration has been written with updateVotingConfig. */
  votingDefaults?: VotingConfig;
}

export interface CreateProposalInput {
  title: string;
  description: string;
  target?: string;
  payload?: string;
  /** Mixed into the proposal id alongside the caller and title. */
  entropy?: string;
}

/**
 * Proposal lifecycle, voter registry and voting configuration.
 *
 * Every write runs as a single commit against the store; a thrown
 * GovernanceError leaves nothing behind and emits nothing.
 */
export class GovernanceEngine extends TransactionalEngine {
  private verifier: WitnessVerifier;
  private clock: TimeSource;
  private ids: IdGenerator;
  private executor: ProposalExecutor;
  private votingDefaults: VotingConfig;

  constructor(opts: GovernanceEngineOptions) {
    super(opts.store);
    this.verifier = opts.verifier;
    this.clock = opts.clock ?? systemClock;
    this.ids = opts.ids ?? sha256IdGenerator;
    this.executor = opts.executor ?? new LogProposalExecutor();
    this.votingDefaults = opts.votingDefaults ?? DEFAULT_VOTING_CONFIG;
  }

  // ── Proposals ──

  createProposal(caller: string, input: CreateProposalInput): Proposal {
    if (input.title.trim().length === 0) {
      throw new ValidationError('Proposal title is required');
    }
    if (input.description.trim().length === 0) {
      throw new ValidationError('Proposal description is required');
    }

    return this.commit((tx, emit) => {
      assertNotPaused(tx);
      const config = readVotingConfig(tx, this.votingDefaults);
      const registry = new VoterRegistry(tx);
      if (config.requireRegistration && !registry.isRegistered(caller)) {
        throw new ValidationError(`Proposer is not a registered voter: ${caller}`, { caller });
      }

      const proposals = new ProposalStore(tx);
      const counter = proposals.incrementCount();
      const now = this.clock.now();
      const id = this.ids.next(now, counter, `${caller}:${input.title}:${input.entropy ?? ''}`);
      if (proposals.exists(id)) {
        throw new StateConflictError(`Proposal id collision: ${id}`, { proposalId: id });
      }

      const votingEnd = now + config.votingPeriod;
      const proposal: Proposal = {
        id,
        title: input.title,
        description: input.description,
        proposer: caller,
        target: input.target ?? '',
        payload: input.payload ?? '',
        createdAt: now,
        votingStart: now,
        votingEnd,
        executionTime: votingEnd + config.executionDelay,
        status: 'active',
        yesWeight: 0n,
        noWeight: 0n,
        totalVotingPowerSnapshot: registry.totalVotingPower(),
      };
      proposals.save(proposal);
      emit({ type: 'proposal:created', proposal });
      console.log(`[GOVERNANCE] Proposal ${id} created by ${caller}: "${input.title}"`);
      return proposal;
    });
  }

  castVote(caller: string, proposalId: string, support: boolean, reason = ''): Vote {
    return this.commit((tx, emit) => {
      assertNotPaused(tx);
      const proposals = new ProposalStore(tx);
      const proposal = proposals.get(proposalId);
      if (!proposal) {
        throw new NotFoundError(`Proposal not found: ${proposalId}`, { proposalId });
      }
      if (!acceptsVotes(proposal.status)) {
        throw new StateConflictError(`Proposal is not open for voting (${proposal.status})`, {
          proposalId,
          status: proposal.status,
        });
      }

      const now = this.clock.now();
      if (now < proposal.votingStart || now > proposal.votingEnd) {
        throw new StateConflictError('Voting window is closed', {
          proposalId,
          now,
          votingStart: proposal.votingStart,
          votingEnd: proposal.votingEnd,
        });
      }
      if (proposals.hasVoted(proposalId, caller)) {
        throw new StateConflictError(`Already voted on proposal ${proposalId}`, { proposalId, voter: caller });
      }

      const config = readVotingConfig(tx, this.votingDefaults);
      const registry = new VoterRegistry(tx);
      if (config.requireRegistration && !registry.isRegistered(caller)) {
        throw new ValidationError(`Voter is not registered: ${caller}`, { voter: caller });
      }
      if (new DelegationRegistry(tx).hasDelegated(caller)) {
        throw new ValidationError(`Voting power of ${caller} is delegated`, { voter: caller });
      }
      const weight = registry.votingPower(caller);
      if (weight <= 0n) {
        throw new ValidationError(`Voter has no voting power: ${caller}`, { voter: caller });
      }
      if (totalCast(proposal) + weight > proposal.totalVotingPowerSnapshot) {
        throw new StateConflictError('Vote would exceed the voting power snapshot', {
          proposalId,
          weight: weight.toString(),
          snapshot: proposal.totalVotingPowerSnapshot.toString(),
        });
      }

      let updated = applyVote(proposal, support, weight);
      const reachedQuorum = proposal.status === 'active' && quorumMet(updated, config.quorumThresholdBps);
      if (reachedQuorum) {
        assertTransition(proposalId, proposal.status, 'quorum_reached');
        updated = { ...updated, status: 'quorum_reached' };
      }

      const vote: Vote = { proposalId, voter: caller, support, weight, reason, castAt: now };
      proposals.saveVote(vote);
      proposals.save(updated);
      registry.recordVoteCast(caller);

      emit({ type: 'vote:cast', vote });
      if (reachedQuorum) {
        emit({
          type: 'proposal:quorum_reached',
          proposalId,
          totalWeight: totalCast(updated),
          requiredQuorum: requiredQuorum(updated.totalVotingPowerSnapshot, config.quorumThresholdBps),
        });
        console.log(`[GOVERNANCE] Proposal ${proposalId} reached quorum`);
      }
      return vote;
    });
  }

  /** Finalizes a proposal. Returns true only when it passed and executed. */
  executeProposal(caller: string, proposalId: string): boolean {
    return this.commit((tx, emit) => {
      assertNotPaused(tx);
      const proposals = new ProposalStore(tx);
      const proposal = proposals.get(proposalId);
      if (!proposal) {
        throw new NotFoundError(`Proposal not found: ${proposalId}`, { proposalId });
      }
      if (isTerminal(proposal.status)) {
        throw new StateConflictError(`Proposal already finalized (${proposal.status})`, {
          proposalId,
          status: proposal.status,
        });
      }
      const now = this.clock.now();
      if (now < proposal.executionTime) {
        throw new StateConflictError('Execution time not reached', {
          proposalId,
          now,
          executionTime: proposal.executionTime,
        });
      }

      const config = readVotingConfig(tx, this.votingDefaults);
      const passed = passes(proposal, config.quorumThresholdBps);
      let status: ProposalStatus = passed ? 'executed' : 'failed';

      if (passed && proposal.payload.length > 0) {
        try {
          this.executor.execute(proposal);
        } catch (err) {
          console.error(`[GOVERNANCE] Execution of proposal ${proposalId} failed: ${(err as Error).message}`);
          status = 'execution_failed';
        }
      }

      assertTransition(proposalId, proposal.status, status);
      proposals.save({ ...proposal, status });
      emit({ type: 'proposal:executed', proposalId, passed, status });
      console.log(`[GOVERNANCE] Proposal ${proposalId} finalized by ${caller}: ${status}`);
      return status === 'executed';
    });
  }

  cancelProposal(caller: string, proposalId: string): Proposal {
    this.requireWitness(caller, 'cancel proposals');
    return this.commit((tx, emit) => {
      assertNotPaused(tx);
      const proposals = new ProposalStore(tx);
      const proposal = proposals.get(proposalId);
      if (!proposal) {
        throw new NotFoundError(`Proposal not found: ${proposalId}`, { proposalId });
      }
      if (proposal.status !== 'active') {
        throw new StateConflictError(`Only active proposals can be cancelled (${proposal.status})`, {
          proposalId,
          status: proposal.status,
        });
      }
      assertTransition(proposalId, proposal.status, 'cancelled');
      const cancelled: Proposal = { ...proposal, status: 'cancelled' };
      proposals.save(cancelled);
      emit({ type: 'proposal:cancelled', proposalId, cancelledBy: caller });
      console.log(`[GOVERNANCE] Proposal ${proposalId} cancelled by ${caller}`);
      return cancelled;
    });
  }

  getProposal(proposalId: string): Proposal | null {
    return new ProposalStore(this.store).get(proposalId);
  }

  /** The persisted encoding of a proposal. */
  getProposalRecord(proposalId: string): string | null {
    return new ProposalStore(this.store).getRecord(proposalId);
  }

  getVote(proposalId: string, voter: string): Vote | null {
    return new ProposalStore(this.store).getVote(proposalId, voter);
  }

  getProposalCount(): number {
    return new ProposalStore(this.store).count();
  }

  // ── Voter registry ──

  registerVoter(caller: string, address: string, votingPower: bigint): VoterInfo {
    this.requireWitness(caller, 'register voters');
    if (address.trim().length === 0) {
      throw new ValidationError('Voter address is required');
    }
    if (votingPower <= 0n) {
      throw new ValidationError('Voting power must be positive', { votingPower: votingPower.toString() });
    }

    return this.commit((tx, emit) => {
      assertNotPaused(tx);
      const voter = new VoterRegistry(tx).register(address, votingPower, this.clock.now());
      emit({ type: 'voter:registered', voter });
      console.log(`[GOVERNANCE] Voter ${address} registered with power ${votingPower}`);
      return voter;
    });
  }

  deactivateVoter(caller: string, address: string): VoterInfo {
    this.requireWitness(caller, 'deactivate voters');
    return this.commit((tx, emit) => {
      assertNotPaused(tx);
      const voter = new VoterRegistry(tx).deactivate(address);
      emit({ type: 'voter:deactivated', address });
      console.log(`[GOVERNANCE] Voter ${address} deactivated by ${caller}`);
      return voter;
    });
  }

  getVoter(address: string): VoterInfo | null {
    return new VoterRegistry(this.store).get(address);
  }

  isRegisteredVoter(address: string): boolean {
    return new VoterRegistry(this.store).isRegistered(address);
  }

  getVotingPower(address: string): bigint {
    return new VoterRegistry(this.store).votingPower(address);
  }

  getTotalVotingPower(): bigint {
    return new VoterRegistry(this.store).totalVotingPower();
  }

  // ── Delegation ──

  delegateVote(caller: string, delegate: string): void {
    if (delegate.trim().length === 0) {
      throw new ValidationError('Delegate address is required');
    }
    if (delegate === caller) {
      throw new ValidationError('Cannot delegate to self', { delegator: caller });
    }

    this.commit((tx, emit) => {
      assertNotPaused(tx);
      const registry = new VoterRegistry(tx);
      if (!registry.isRegistered(caller)) {
        throw new ValidationError(`Delegator is not an active voter: ${caller}`, { delegator: caller });
      }
      if (!registry.isRegistered(delegate)) {
        throw new ValidationError(`Delegate must be an active voter: ${delegate}`, { delegate });
      }
      const delegations = new DelegationRegistry(tx);
      if (delegations.wouldCycle(caller, delegate)) {
        throw new StateConflictError('Circular delegation detected', { delegator: caller, delegate });
      }
      delegations.set(caller, delegate);
      emit({ type: 'vote:delegated', delegator: caller, delegate });
      console.log(`[GOVERNANCE] ${caller} delegated voting power to ${delegate}`);
    });
  }

  revokeDelegation(caller: string): void {
    this.commit((tx, emit) => {
      assertNotPaused(tx);
      if (!new VoterRegistry(tx).isRegistered(caller)) {
        throw new ValidationError(`Delegator is not an active voter: ${caller}`, { delegator: caller });
      }
      const delegations = new DelegationRegistry(tx);
      const delegate = delegations.getDelegate(caller);
      if (delegate === null) {
        throw new StateConflictError(`No delegation to revoke for ${caller}`, { delegator: caller });
      }
      delegations.remove(caller);
      emit({ type: 'delegation:revoked', delegator: caller, delegate });
      console.log(`[GOVERNANCE] ${caller} revoked delegation to ${delegate}`);
    });
  }

  getDelegate(address: string): string | null {
    return new DelegationRegistry(this.store).getDelegate(address);
  }

  /** Power the address would vote with now: 0 when inactive or delegated. */
  getEffectiveVotingPower(address: string): bigint {
    if (new DelegationRegistry(this.store).hasDelegated(address)) return 0n;
    return new VoterRegistry(this.store).votingPower(address);
  }

  // ── Pause switch ──

  setPaused(caller: string, paused: boolean): boolean {
    this.requireWitness(caller, 'pause governance');
    return this.commit((tx, emit) => {
      writePaused(tx, paused);
      emit({ type: 'governance:paused', paused, changedBy: caller });
      console.log(`[GOVERNANCE] Governance ${paused ? 'paused' : 'resumed'} by ${caller}`);
      return paused;
    });
  }

  isPaused(): boolean {
    return isPaused(this.store);
  }

  // ── Configuration ──

  updateVotingConfig(caller: string, config: VotingConfig): VotingConfig {
    this.requireWitness(caller, 'update the voting config');
    validateVotingConfig(config);
    return this.commit((tx, emit) => {
      assertNotPaused(tx);
      writeVotingConfig(tx, config);
      const stored = readVotingConfig(tx, this.votingDefaults);
      emit({ type: 'config:updated', config: stored, updatedBy: caller });
      console.log(`[GOVERNANCE] Voting config updated by ${caller}`);
      return stored;
    });
  }

  getVotingConfig(): VotingConfig {
    return readVotingConfig(this.store, this.votingDefaults);
  }

  private requireWitness(caller: string, action: string): void {
    if (!this.verifier.authorize(caller)) {
      throw new AuthorizationError(`Caller ${caller} is not authorized to ${action}`, { caller });
    }
  }
}
