import * as yaml from 'js-yaml';
import { readFileSync } from 'node:fs';
import { GovernanceConfigSchema, validateCallerReferences, type ValidatedGovernanceConfig } from '../shared/schemas.js';

export class ConfigLoadError extends Error {
  constructor(
    message: string,
    public details: string[] = [],
  ) {
    super(message);
    this.name = 'ConfigLoadError';
  }
}

/**
 * Parse a governance YAML document into the settings `createApp` runs on.
 *
 * Caller tokens are usually written as `${ENV_VAR}` references and resolved
 * here, before validation, so an unset variable surfaces as an empty token
 * rejected by the schema. After the schema pass, when callers are declared,
 * every admin must map to one of them, and no identity or token may appear
 * twice; the server's bearer auth relies on that one-to-one mapping.
 */
export function parseConfig(yamlContent: string): ValidatedGovernanceConfig {
  let raw: unknown;
  try {
    raw = yaml.load(yamlContent);
  } catch (err) {
    throw new ConfigLoadError(`Invalid YAML: ${(err as Error).message}`);
  }

  const result = GovernanceConfigSchema.safeParse(resolveEnvVars(raw));
  if (!result.success) {
    const details = result.error.issues.map(
      (i) => `${i.path.join('.')}: ${i.message}`,
    );
    throw new ConfigLoadError('Config validation failed', details);
  }

  const refErrors = validateCallerReferences(result.data);
  if (refErrors.length > 0) {
    throw new ConfigLoadError('Invalid caller references in config', refErrors);
  }

  return result.data;
}

/** Reads `CONFIG_PATH` (or any file) and hands it to parseConfig. */
export function loadConfigFile(filePath: string): ValidatedGovernanceConfig {
  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch (err) {
    throw new ConfigLoadError(`Cannot read config file: ${(err as Error).message}`);
  }
  return parseConfig(content);
}

// Replaces ${NAME} in every string, at any depth; unset names become ''
function resolveEnvVars(value: unknown): unknown {
  if (typeof value === 'string') {
    return value.replace(/\$\{([^}]+)\}/g, (_match, varName: string) => process.env[varName] ?? '');
  }
  if (Array.isArray(value)) {
    return value.map(resolveEnvVars);
  }
  if (value !== null && typeof value === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, val] of Object.entries(value)) {
      result[key] = resolveEnvVars(val);
    }
    return result;
  }
  return value;
}
