import { createServer, type Server as HttpServer } from 'node:http';
import { resolve } from 'node:path';
import { existsSync, mkdirSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import express, { type Express } from 'express';

import { loadConfigFile, parseConfig } from '../engine/config-loader.js';
import { bigintReplacer } from '../engine/codec.js';
import { AllowListVerifier } from '../engine/identity.js';
import { createExecutor } from '../engine/executor.js';
import { EventLog } from '../engine/event-log.js';
import { GovernanceEngine } from '../engine/governance-engine.js';
import { NodeAnalyzer } from '../engine/node-analyzer.js';
import { StrategyEngine } from '../engine/strategy-engine.js';
import { systemClock, type TimeSource } from '../engine/clock.js';
import type { ValidatedGovernanceConfig } from '../shared/schemas.js';
import { createDb, SqliteKeyValueStore } from './db.js';
import { createApiRouter } from './api.js';
import { setupWebSocket } from './ws.js';
import { createAuth } from './auth.js';

const PORT = parseInt(process.env.PORT ?? '3000', 10);
const HOST = process.env.HOST ?? '0.0.0.0';
const DB_PATH = process.env.DB_PATH ?? './data/governance.db';
const CONFIG_PATH = process.env.CONFIG_PATH;

// ── createApp factory ──

export interface CreateAppOptions {
  dbPath: string;
  config: ValidatedGovernanceConfig;
  clock?: TimeSource;
  /** Number of events retained for replay. */
  eventLogCapacity?: number;
}

export interface GovernanceApp {
  app: Express;
  httpServer: HttpServer;
  governance: GovernanceEngine;
  nodes: NodeAnalyzer;
  strategies: StrategyEngine;
  eventLog: EventLog;
  store: SqliteKeyValueStore;
  close: () => Promise<void>;
}

export function createApp(opts: CreateAppOptions): GovernanceApp {
  const { db, sqlite } = createDb(opts.dbPath);
  const store = new SqliteKeyValueStore(db, sqlite);
  const settings = opts.config.governance;
  const clock = opts.clock ?? systemClock;
  const verifier = new AllowListVerifier(settings.admins);

  const governance = new GovernanceEngine({
    store,
    verifier,
    clock,
    executor: createExecutor(settings.executor),
    votingDefaults: settings.votingDefaults,
  });
  const nodes = new NodeAnalyzer({ store, verifier, clock, risk: settings.risk });
  const strategies = new StrategyEngine({ store, verifier, clock, risk: settings.risk });

  // Committed events from every engine land in one ordered log
  const eventLog = new EventLog(opts.eventLogCapacity, clock);
  for (const engine of [governance, nodes, strategies]) {
    engine.onEvent((event) => eventLog.append(event));
  }

  // ── Express ──
  const app = express();
  app.set('json replacer', bigintReplacer);
  app.use(express.json({ limit: '1mb' }));

  const auth = createAuth(settings.callers);

  // Resolves req.caller for every request; never rejects
  app.use(auth.authenticate);

  // Health endpoint is public
  app.get('/api/health', (_req, res) => {
    res.json({ status: 'ok', name: settings.name, uptime: process.uptime() });
  });

  app.use('/api', createApiRouter({ governance, nodes, strategies, eventLog }, auth));

  // ── HTTP + WebSocket ──
  const httpServer = createServer(app);
  const ws = setupWebSocket(httpServer, eventLog);

  const close = async (): Promise<void> => {
    await ws.close();
    await new Promise<void>((resolvePromise, reject) => {
      httpServer.close((err) => {
        sqlite.close();
        if (err) reject(err);
        else resolvePromise();
      });
    });
  };

  return { app, httpServer, governance, nodes, strategies, eventLog, store, close };
}

// ── main ──

const DEFAULT_CONFIG_YAML = `
version: "1"
governance:
  name: "Development Governance"
  description: "Default development configuration"
  admins: [dev-admin]
  callers:
    - identity: dev-admin
      token: dev-admin-token
`;

function main() {
  console.log('[SERVER] Starting governance server...');

  const dbDir = resolve(DB_PATH, '..');
  if (!existsSync(dbDir)) {
    mkdirSync(dbDir, { recursive: true });
  }

  let config: ValidatedGovernanceConfig;
  if (CONFIG_PATH) {
    config = loadConfigFile(CONFIG_PATH);
    console.log(`[SERVER] Loaded config from ${CONFIG_PATH}: "${config.governance.name}"`);
  } else {
    config = parseConfig(DEFAULT_CONFIG_YAML);
    console.log('[SERVER] Using default development config');
  }

  const server = createApp({ dbPath: DB_PATH, config });
  console.log(`[SERVER] Admins: ${config.governance.admins.join(', ') || '(none)'}`);

  server.httpServer.listen(PORT, HOST, () => {
    console.log(`[SERVER] Listening on http://${HOST}:${PORT}`);
    console.log(`[SERVER] REST API: http://${HOST}:${PORT}/api`);
    console.log(`[SERVER] WebSocket: ws://${HOST}:${PORT}/ws`);
  });
}

// Only run main() when this file is the entry point (not when imported by tests)
const isEntryPoint =
  process.argv[1] === fileURLToPath(import.meta.url) ||
  process.argv[1]?.endsWith('/dist/server/index.js');

if (isEntryPoint) {
  try {
    main();
  } catch (err) {
    console.error('[SERVER] Fatal error:', err);
    process.exit(1);
  }
}
