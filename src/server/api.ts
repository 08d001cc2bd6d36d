import { Router, type Request, type Response } from 'express';
import { ZodError } from 'zod';
import type { GovernanceEngine } from '../engine/governance-engine.js';
import type { NodeAnalyzer } from '../engine/node-analyzer.js';
import type { StrategyEngine } from '../engine/strategy-engine.js';
import type { EventLog } from '../engine/event-log.js';
import { AuthorizationError, GovernanceError, httpStatusFor } from '../shared/errors.js';
import {
  AnalyzeNodeBodySchema,
  CastVoteBodySchema,
  CreateProposalBodySchema,
  CreateStrategyBodySchema,
  DelegateBodySchema,
  EventsQuerySchema,
  ExecuteStrategyBodySchema,
  NodeMetricsBodySchema,
  PauseBodySchema,
  RecommendationQuerySchema,
  RegisterVoterBodySchema,
  VotingConfigBodySchema,
} from '../shared/schemas.js';
import type { AuthMiddleware } from './auth.js';

export interface ApiServices {
  governance: GovernanceEngine;
  nodes: NodeAnalyzer;
  strategies: StrategyEngine;
  eventLog: EventLog;
}

function requireCaller(req: Request): string {
  if (!req.caller) {
    throw new AuthorizationError('Authentication required');
  }
  return req.caller;
}

function sendError(res: Response, err: unknown): void {
  if (err instanceof ZodError) {
    res.status(400).json({
      error: 'Invalid request body',
      code: 'validation_failed',
      details: err.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
    });
    return;
  }
  if (err instanceof GovernanceError) {
    res.status(httpStatusFor(err)).json({ error: err.message, code: err.code, details: err.details });
    return;
  }
  console.error('[API] Unhandled error:', err);
  res.status(500).json({ error: 'Internal server error' });
}

// Runs a synchronous handler, mapping thrown errors to responses
function handle(res: Response, fn: () => void): void {
  try {
    fn();
  } catch (err) {
    sendError(res, err);
  }
}

/**
 * REST API for proposals, voters, configuration, strategies and nodes.
 * Reads are public; writes go through `auth.protect`.
 */
export function createApiRouter(services: ApiServices, auth: AuthMiddleware): Router {
  const { governance, nodes, strategies, eventLog } = services;
  const router = Router();

  // ── Voting config ──

  router.get('/config', (_req: Request, res: Response) => {
    res.json(governance.getVotingConfig());
  });

  router.put('/config', auth.protect, (req: Request, res: Response) => {
    handle(res, () => {
      const body = VotingConfigBodySchema.parse(req.body);
      res.json(governance.updateVotingConfig(requireCaller(req), body));
    });
  });

  // ── Pause switch ──

  router.get('/pause', (_req: Request, res: Response) => {
    res.json({ paused: governance.isPaused() });
  });

  router.put('/pause', auth.protect, (req: Request, res: Response) => {
    handle(res, () => {
      const body = PauseBodySchema.parse(req.body);
      res.json({ paused: governance.setPaused(requireCaller(req), body.paused) });
    });
  });

  // ── Proposals ──

  router.get('/proposals/count', (_req: Request, res: Response) => {
    res.json({ count: governance.getProposalCount() });
  });

  router.post('/proposals', auth.protect, (req: Request, res: Response) => {
    handle(res, () => {
      const body = CreateProposalBodySchema.parse(req.body);
      res.status(201).json(governance.createProposal(requireCaller(req), body));
    });
  });

  router.get('/proposals/:id', (req: Request, res: Response) => {
    const proposal = governance.getProposal(String(req.params.id));
    if (!proposal) {
      res.status(404).json({ error: 'Proposal not found', code: 'not_found' });
      return;
    }
    res.json(proposal);
  });

  router.post('/proposals/:id/votes', auth.protect, (req: Request, res: Response) => {
    handle(res, () => {
      const body = CastVoteBodySchema.parse(req.body);
      const vote = governance.castVote(requireCaller(req), String(req.params.id), body.support, body.reason);
      res.status(201).json(vote);
    });
  });

  router.get('/proposals/:id/votes/:voter', (req: Request, res: Response) => {
    const vote = governance.getVote(String(req.params.id), String(req.params.voter));
    if (!vote) {
      res.status(404).json({ error: 'Vote not found', code: 'not_found' });
      return;
    }
    res.json(vote);
  });

  router.post('/proposals/:id/execute', auth.protect, (req: Request, res: Response) => {
    handle(res, () => {
      const proposalId = String(req.params.id);
      const executed = governance.executeProposal(requireCaller(req), proposalId);
      res.json({ executed, proposal: governance.getProposal(proposalId) });
    });
  });

  router.post('/proposals/:id/cancel', auth.protect, (req: Request, res: Response) => {
    handle(res, () => {
      res.json(governance.cancelProposal(requireCaller(req), String(req.params.id)));
    });
  });

  // ── Voters ──

  router.get('/voting-power', (_req: Request, res: Response) => {
    res.json({ total: governance.getTotalVotingPower() });
  });

  router.post('/voters', auth.protect, (req: Request, res: Response) => {
    handle(res, () => {
      const body = RegisterVoterBodySchema.parse(req.body);
      res.status(201).json(governance.registerVoter(requireCaller(req), body.address, body.votingPower));
    });
  });

  router.get('/voters/:address', (req: Request, res: Response) => {
    const voter = governance.getVoter(String(req.params.address));
    if (!voter) {
      res.status(404).json({ error: 'Voter not found', code: 'not_found' });
      return;
    }
    res.json(voter);
  });

  router.delete('/voters/:address', auth.protect, (req: Request, res: Response) => {
    handle(res, () => {
      res.json(governance.deactivateVoter(requireCaller(req), String(req.params.address)));
    });
  });

  router.get('/voters/:address/effective-power', (req: Request, res: Response) => {
    const address = String(req.params.address);
    res.json({
      address,
      delegate: governance.getDelegate(address),
      effectivePower: governance.getEffectiveVotingPower(address),
    });
  });

  // ── Delegation (acts for the authenticated caller) ──

  router.put('/delegation', auth.protect, (req: Request, res: Response) => {
    handle(res, () => {
      const caller = requireCaller(req);
      const body = DelegateBodySchema.parse(req.body);
      governance.delegateVote(caller, body.delegate);
      res.json({ delegator: caller, delegate: body.delegate });
    });
  });

  router.delete('/delegation', auth.protect, (req: Request, res: Response) => {
    handle(res, () => {
      const caller = requireCaller(req);
      governance.revokeDelegation(caller);
      res.json({ delegator: caller, delegate: null });
    });
  });

  // ── Strategies ──

  router.post('/strategies', auth.protect, (req: Request, res: Response) => {
    handle(res, () => {
      const body = CreateStrategyBodySchema.parse(req.body);
      res.status(201).json(strategies.createStrategy(requireCaller(req), body));
    });
  });

  router.get('/strategies/:id', (req: Request, res: Response) => {
    const strategy = strategies.getStrategy(String(req.params.id));
    if (!strategy) {
      res.status(404).json({ error: 'Strategy not found', code: 'not_found' });
      return;
    }
    res.json(strategy);
  });

  router.get('/strategies/:id/executions', (req: Request, res: Response) => {
    handle(res, () => {
      res.json(strategies.listExecutions(String(req.params.id)));
    });
  });

  router.post('/strategies/:id/execute', auth.protect, (req: Request, res: Response) => {
    handle(res, () => {
      const body = ExecuteStrategyBodySchema.parse(req.body ?? {});
      res.json(strategies.executeStrategy(requireCaller(req), String(req.params.id), body));
    });
  });

  router.post('/strategies/:id/trigger', auth.protect, (req: Request, res: Response) => {
    handle(res, () => {
      res.json(strategies.triggerScheduledExecution(requireCaller(req), String(req.params.id)));
    });
  });

  router.post('/strategies/:id/deactivate', auth.protect, (req: Request, res: Response) => {
    handle(res, () => {
      res.json(strategies.deactivateStrategy(requireCaller(req), String(req.params.id)));
    });
  });

  router.get('/recommendations', (req: Request, res: Response) => {
    handle(res, () => {
      const query = RecommendationQuerySchema.parse(req.query);
      res.json(strategies.recommend(query.type, query.maxCandidates, query.minScore));
    });
  });

  // ── Nodes ──

  router.get('/nodes', (_req: Request, res: Response) => {
    res.json(nodes.listNodes());
  });

  router.post('/nodes/metrics', auth.protect, (req: Request, res: Response) => {
    handle(res, () => {
      const body = NodeMetricsBodySchema.parse(req.body);
      res.json(nodes.updateNodeMetrics(requireCaller(req), body));
    });
  });

  router.get('/nodes/:address', (req: Request, res: Response) => {
    const metrics = nodes.getNodeMetrics(String(req.params.address));
    if (!metrics) {
      res.status(404).json({ error: 'Node not found', code: 'not_found' });
      return;
    }
    res.json(metrics);
  });

  router.post('/nodes/:address/analyze', auth.protect, (req: Request, res: Response) => {
    handle(res, () => {
      const body = AnalyzeNodeBodySchema.parse(req.body ?? {});
      res.json(nodes.analyzeNode(String(req.params.address), body.analysisPeriod));
    });
  });

  router.get('/nodes/:address/analysis', (req: Request, res: Response) => {
    const analysis = nodes.getNodeAnalysis(String(req.params.address));
    if (!analysis) {
      res.status(404).json({ error: 'Analysis not found', code: 'not_found' });
      return;
    }
    res.json(analysis);
  });

  // ── Event log ──

  router.get('/events', (req: Request, res: Response) => {
    handle(res, () => {
      const query = EventsQuerySchema.parse(req.query);
      res.json({
        latestSequence: eventLog.latestSequence(),
        events: eventLog.since(query.since, query.limit),
      });
    });
  });

  return router;
}
