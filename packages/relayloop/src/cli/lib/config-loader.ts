/**
 * Resolve the effective config: relayloop.yml in the working directory,
 * then CLI flags on top.
 */

import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { parse as yamlParse } from 'yaml';
import type { ZodError } from 'zod';

import { BackendName, RelayConfigSchema, parseDuration, type RelayConfig } from '../../lib/config.js';
import { CONFIG_FILENAME } from '../../lib/paths.js';
import { ValidationError, errorMessage } from './errors.js';

/** Config-affecting CLI flags, as commander hands them over. */
export interface ConfigOverrides {
  agentPath?: string;
  backend?: string;
  agent?: string;
  trustTools?: string;
  trustAllTools?: boolean;
  timeout?: string;
  maxRetries?: string;
  maxAgentInvocations?: string;
  interveneOnFinalRetry?: boolean;
}

export async function loadConfig(workdir: string, overrides: ConfigOverrides = {}): Promise<RelayConfig> {
  const configPath = join(workdir, CONFIG_FILENAME);
  const raw = await readConfigFile(configPath);

  const parsed = RelayConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw new ValidationError(
      `Invalid config at ${configPath}: ${formatIssues(parsed.error)}`,
      'E_CONFIG_INVALID',
    );
  }

  return applyOverrides(parsed.data, overrides);
}

async function readConfigFile(configPath: string): Promise<unknown> {
  let content: string;
  try {
    content = await readFile(configPath, 'utf-8');
  } catch (err: unknown) {
    // Only a missing file means zero-config
    if (err && typeof err === 'object' && 'code' in err && err.code === 'ENOENT') {
      return {};
    }
    throw new ValidationError(`Cannot read ${configPath}: ${errorMessage(err)}`, 'E_CONFIG_INVALID');
  }

  try {
    return yamlParse(content);
  } catch (err: unknown) {
    throw new ValidationError(
      `Invalid config at ${configPath}: ${errorMessage(err)}`,
      'E_CONFIG_INVALID',
    );
  }
}

/** Apply CLI flags to a validated config. */
export function applyOverrides(config: RelayConfig, o: ConfigOverrides): RelayConfig {
  if (o.trustTools !== undefined && o.trustAllTools) {
    throw new ValidationError(
      '--trust-tools and --trust-all-tools are mutually exclusive',
      'E_CONFIG_INVALID',
    );
  }

  const agent = { ...config.agent };

  if (o.agentPath !== undefined) agent.path = o.agentPath;
  if (o.agent !== undefined) agent.profile = o.agent;
  if (o.backend !== undefined) {
    const backend = BackendName.safeParse(o.backend);
    if (!backend.success) {
      throw new ValidationError(
        `Invalid backend: ${o.backend} (expected: ${BackendName.options.join(', ')})`,
        'E_CONFIG_INVALID',
      );
    }
    agent.backend = backend.data;
  }
  if (o.trustTools !== undefined) {
    agent.trust_tools = o.trustTools;
    agent.trust_all_tools = false;
  }
  if (o.trustAllTools) agent.trust_all_tools = true;
  if (o.timeout !== undefined) agent.timeout = parseTimeout(o.timeout);
  if (o.maxRetries !== undefined) agent.max_retries = parsePositiveInt(o.maxRetries, '--max-retries');
  if (o.interveneOnFinalRetry) agent.intervene_on_final_retry = true;

  const maxAgentInvocations =
    o.maxAgentInvocations !== undefined
      ? parsePositiveInt(o.maxAgentInvocations, '--max-agent-invocations')
      : config.max_agent_invocations;

  return { ...config, agent, max_agent_invocations: maxAgentInvocations };
}

function parseTimeout(value: string): number {
  let ms: number;
  try {
    ms = parseDuration(value);
  } catch (err: unknown) {
    throw new ValidationError(`Invalid --timeout value: ${errorMessage(err)}`, 'E_CONFIG_INVALID');
  }
  if (ms <= 0) {
    throw new ValidationError(`Invalid --timeout value: ${value}`, 'E_CONFIG_INVALID');
  }
  return ms;
}

function parsePositiveInt(value: string, flag: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new ValidationError(`Invalid ${flag} value: ${value}`, 'E_CONFIG_INVALID');
  }
  return n;
}

function formatIssues(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
