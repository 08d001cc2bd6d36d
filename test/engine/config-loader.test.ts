import { describe, it, expect, afterEach } from 'vitest';
import { fileURLToPath } from 'node:url';
import { parseConfig, loadConfigFile, ConfigLoadError } from '@/engine/config-loader.js';

const validYaml = `
version: "1"
governance:
  name: "Test Governance"
  description: "A test deployment"
  admins: [root]
  callers:
    - identity: root
      token: root-token
    - identity: alice
      token: alice-token
  voting_defaults:
    voting_period: 7200
    execution_delay: 60
    quorum_threshold_bps: 6000
    require_registration: false
  risk:
    max_risk_threshold: 70
    low_risk_score: 20
  executor:
    type: log
`;

afterEach(() => {
  delete process.env.TEST_ROOT_TOKEN;
  delete process.env.GOVERNANCE_ADMIN_TOKEN;
  delete process.env.ALICE_TOKEN;
  delete process.env.BOB_TOKEN;
});

describe('parseConfig', () => {
  it('parses valid YAML config', () => {
    const config = parseConfig(validYaml);
    expect(config.version).toBe('1');
    expect(config.governance.name).toBe('Test Governance');
    expect(config.governance.admins).toEqual(['root']);
    expect(config.governance.callers).toHaveLength(2);
    expect(config.governance.votingDefaults).toEqual({
      votingPeriod: 7200,
      executionDelay: 60,
      quorumThresholdBps: 6000,
      requireRegistration: false,
    });
    expect(config.governance.risk).toEqual({
      maxRiskThreshold: 70,
      riskTolerance: 80,
      lowRiskScore: 20,
      highRiskScore: 100,
    });
  });

  it('applies defaults', () => {
    const config = parseConfig(`
version: "1"
governance:
  name: "Minimal"
`);
    expect(config.governance.description).toBe('');
    expect(config.governance.admins).toEqual([]);
    expect(config.governance.callers).toEqual([]);
    expect(config.governance.executor.type).toBe('log');
    expect(config.governance.votingDefaults).toEqual({
      votingPeriod: 604800,
      executionDelay: 86400,
      quorumThresholdBps: 5000,
      requireRegistration: true,
    });
    expect(config.governance.risk.maxRiskThreshold).toBe(80);
  });

  it('rejects invalid YAML', () => {
    expect(() => parseConfig('governance: [unclosed')).toThrow(ConfigLoadError);
  });

  it('rejects a voting period below one hour', () => {
    try {
      parseConfig(`
version: "1"
governance:
  name: "Short"
  voting_defaults:
    voting_period: 60
`);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigLoadError);
      if (err instanceof ConfigLoadError) {
        expect(err.message).toBe('Config validation failed');
        expect(err.details.some((d) => d.startsWith('governance.voting_defaults.voting_period'))).toBe(true);
      }
    }
  });

  it('rejects a threshold outside 1-10000 bps', () => {
    expect(() => parseConfig(`
version: "1"
governance:
  name: "Bad"
  voting_defaults:
    quorum_threshold_bps: 10001
`)).toThrow(ConfigLoadError);
  });

  it('rejects low risk scores above high risk scores', () => {
    expect(() => parseConfig(`
version: "1"
governance:
  name: "Bad"
  risk:
    low_risk_score: 90
    high_risk_score: 50
`)).toThrow(ConfigLoadError);
  });

  it('rejects duplicate caller tokens and admins without a token', () => {
    try {
      parseConfig(`
version: "1"
governance:
  name: "Dupes"
  admins: [root, ghost]
  callers:
    - identity: root
      token: shared
    - identity: alice
      token: shared
`);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigLoadError);
      if (err instanceof ConfigLoadError) {
        expect(err.message).toBe('Invalid caller references in config');
        expect(err.details).toEqual([
          'Caller "alice" reuses a token already assigned to another caller',
          'Admin "ghost" has no caller token',
        ]);
      }
    }
  });

  it('resolves environment variables in caller tokens', () => {
    process.env.TEST_ROOT_TOKEN = 'test-secret';
    const config = parseConfig(`
version: "1"
governance:
  name: "Env"
  admins: [root]
  callers:
    - identity: root
      token: "\${TEST_ROOT_TOKEN}"
`);
    expect(config.governance.callers[0].token).toBe('test-secret');
  });

  it('fails when a referenced token variable is unset', () => {
    try {
      parseConfig(`
version: "1"
governance:
  name: "Env"
  callers:
    - identity: root
      token: "\${TEST_ROOT_TOKEN}"
`);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigLoadError);
      if (err instanceof ConfigLoadError) {
        expect(err.message).toBe('Config validation failed');
        expect(err.details).toEqual(['governance.callers.0.token: String must contain at least 1 character(s)']);
      }
    }
  });
});

describe('loadConfigFile', () => {
  it('loads the bundled config', () => {
    process.env.GOVERNANCE_ADMIN_TOKEN = 'admin-placeholder';
    process.env.ALICE_TOKEN = 'alice-placeholder';
    process.env.BOB_TOKEN = 'bob-placeholder';
    const path = fileURLToPath(new URL('../../config/governance.yaml', import.meta.url));
    const config = loadConfigFile(path);
    expect(config.governance.name).toBe('Validator Governance');
    expect(config.governance.admins).toEqual(['governance-admin']);
    expect(config.governance.callers.map((c) => c.identity)).toEqual(['governance-admin', 'alice', 'bob']);
  });

  it('throws ConfigLoadError for a missing file', () => {
    expect(() => loadConfigFile('/nonexistent/governance.yaml')).toThrow(ConfigLoadError);
  });
});
