/**
 * `relayloop plan` - Planner ⇄ reviewer loop over a problem statement.
 */

import { Command } from 'commander';
import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';

import { BaseCommand } from '../lib/base-command.js';
import { loadConfig } from '../lib/config-loader.js';
import { ValidationError, errorMessage } from '../lib/errors.js';
import { createAgentBackend } from '../lib/loop/backends/detect.js';
import { createLoopContext } from '../lib/loop/engine.js';
import { runPlanning } from '../lib/loop/planning.js';
import {
  addRunOptions,
  renderRunResult,
  requireSessionName,
  resolveWorkdir,
  type RunOptions,
} from '../lib/run-options.js';

interface PlanOptions extends RunOptions {
  problem?: string;
  problemFile?: string;
}

/** Problem statement from --problem or --problem-file; exactly one, non-empty. */
export async function readProblemStatement(opts: {
  problem?: string;
  problemFile?: string;
}): Promise<string> {
  if (opts.problem !== undefined && opts.problemFile !== undefined) {
    throw new ValidationError('--problem and --problem-file are mutually exclusive');
  }

  let statement: string;
  if (opts.problemFile !== undefined) {
    const path = resolve(opts.problemFile);
    try {
      statement = await readFile(path, 'utf-8');
    } catch (err: unknown) {
      throw new ValidationError(`Cannot read problem statement file ${path}: ${errorMessage(err)}`);
    }
  } else if (opts.problem !== undefined) {
    statement = opts.problem;
  } else {
    throw new ValidationError('A problem statement is required. Use --problem or --problem-file');
  }

  if (!statement.trim()) {
    throw new ValidationError('Problem statement cannot be empty');
  }
  return statement;
}

class PlanHandler extends BaseCommand {
  async run(options: PlanOptions): Promise<void> {
    await this.execute(async () => {
      const session = requireSessionName(options.name);
      const workdir = await resolveWorkdir(options.workdir);
      const problemStatement = await readProblemStatement(options);
      const config = await loadConfig(workdir, options);
      const backend = await createAgentBackend(config);

      const ctx = createLoopContext({ workflow: 'plan', workdir, session, config, backend });
      const result = await runPlanning(ctx, { problemStatement });

      renderRunResult(this.output, result);
      return result.exitCode;
    });
  }
}

export const planCommand = addRunOptions(
  new Command('plan').description('Draft and review an implementation plan until it is approved'),
)
  .option('--problem <text>', 'Problem statement')
  .option('--problem-file <path>', 'File containing the problem statement')
  .action(async (options: PlanOptions, command: Command) => {
    const handler = new PlanHandler(command);
    await handler.run(options);
  });
