/**
 * Agent backend construction and eager executable validation.
 */

import { access, constants, stat } from 'node:fs/promises';

import type { AgentBackend } from '../../../../lib/types.js';
import type { RelayConfig } from '../../../../lib/config.js';
import { ValidationError } from '../../errors.js';
import { ChatBackend } from './chat.js';
import { SubprocessBackend } from './subprocess.js';

/** Ensure `path` names an existing, executable regular file. */
export async function assertExecutable(path: string): Promise<void> {
  try {
    const info = await stat(path);
    if (!info.isFile()) {
      throw new ValidationError(`Agent CLI is not a file: ${path}`);
    }
  } catch (error) {
    if (error instanceof ValidationError) throw error;
    throw new ValidationError(`Agent CLI not found: ${path}`);
  }

  try {
    await access(path, constants.X_OK);
  } catch {
    throw new ValidationError(`Agent CLI is not executable: ${path}`);
  }
}

/**
 * Create the agent backend named by the config.
 * Validates everything it can before the first invocation.
 */
export async function createAgentBackend(config: RelayConfig): Promise<AgentBackend> {
  const agent = config.agent;

  if (agent.backend === 'subprocess') {
    if (!agent.command?.trim()) {
      throw new ValidationError('Subprocess backend requires agent.command in config');
    }
    return new SubprocessBackend(agent.command);
  }

  if (!agent.path) {
    throw new ValidationError('Agent CLI path is required. Use --agent-path <path>');
  }
  await assertExecutable(agent.path);

  return new ChatBackend({
    path: agent.path,
    trustTools: agent.trust_tools,
    trustAllTools: agent.trust_all_tools,
    profile: agent.profile,
  });
}
