/**
 * Options and checks shared by the `plan` and `execute` commands.
 */

import { stat } from 'node:fs/promises';
import { resolve } from 'node:path';
import type { Command } from 'commander';

import { isValidSessionName } from '../../lib/paths.js';
import type { ConfigOverrides } from './config-loader.js';
import { ValidationError } from './errors.js';
import type { RunResult } from './loop/engine.js';
import { formatSummary } from './loop/summary.js';
import type { OutputManager } from './output.js';

export interface RunOptions extends ConfigOverrides {
  name: string;
  workdir?: string;
}

/** Register the flags every relay run accepts. */
export function addRunOptions(command: Command): Command {
  return command
    .requiredOption('--name <name>', 'Session name (letters, digits, underscores)')
    .option('--workdir <dir>', 'Directory holding the session artifacts (default: cwd)')
    .option('--agent-path <path>', 'Path to the agent CLI executable')
    .option('--backend <name>', 'Agent backend: chat, subprocess')
    .option('--agent <profile>', 'Agent profile passed to the agent CLI')
    .option('--max-agent-invocations <n>', 'Invocation budget (default: 10)')
    .option('--max-retries <n>', 'Attempts per invocation (default: 3)')
    .option('--timeout <duration>', 'Timeout per invocation, e.g. 600, 10m (default: 600s)')
    .option('--trust-tools <list>', 'Comma-separated tools the agent may use without asking')
    .option('--trust-all-tools', 'Let the agent use every tool without asking')
    .option('--intervene-on-final-retry', 'Run the last retry attempt interactively');
}

export function requireSessionName(name: string): string {
  if (!isValidSessionName(name)) {
    throw new ValidationError(
      `Invalid session name: "${name}". Use letters, digits and underscores only.`,
    );
  }
  return name;
}

/** Absolute working directory; must exist. */
export async function resolveWorkdir(workdir: string | undefined): Promise<string> {
  const dir = resolve(workdir ?? process.cwd());
  let isDir = false;
  try {
    isDir = (await stat(dir)).isDirectory();
  } catch {
    throw new ValidationError(`Working directory not found: ${dir}`);
  }
  if (!isDir) {
    throw new ValidationError(`Working directory is not a directory: ${dir}`);
  }
  return dir;
}

/** Print the run result: the summary block for humans, the whole result with --json. */
export function renderRunResult(output: OutputManager, result: RunResult): void {
  output.data(result, () => {
    console.log(formatSummary(result.summary));
    if (!result.summaryWritten) return;
    console.log(output.getColors().dim(`Summary written to ${result.summaryPath}`));
  });
}
