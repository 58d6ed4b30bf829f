/**
 * `relayloop execute` - Worker ⇄ reviewer loop over each step of an approved plan.
 */

import { Command } from 'commander';

import { BaseCommand } from '../lib/base-command.js';
import { loadConfig } from '../lib/config-loader.js';
import { createAgentBackend } from '../lib/loop/backends/detect.js';
import { createLoopContext } from '../lib/loop/engine.js';
import { loadPlanSteps, runExecution } from '../lib/loop/execution.js';
import {
  addRunOptions,
  renderRunResult,
  requireSessionName,
  resolveWorkdir,
  type RunOptions,
} from '../lib/run-options.js';

class ExecuteHandler extends BaseCommand {
  async run(options: RunOptions): Promise<void> {
    await this.execute(async () => {
      const session = requireSessionName(options.name);
      const workdir = await resolveWorkdir(options.workdir);
      // Fail on a missing or empty plan before touching the agent
      await loadPlanSteps(workdir, session);
      const config = await loadConfig(workdir, options);
      const backend = await createAgentBackend(config);

      const ctx = createLoopContext({ workflow: 'execute', workdir, session, config, backend });
      const result = await runExecution(ctx);

      renderRunResult(this.output, result);
      return result.exitCode;
    });
  }
}

export const executeCommand = addRunOptions(
  new Command('execute').description('Implement an approved plan step by step with review'),
).action(async (options: RunOptions, command: Command) => {
  const handler = new ExecuteHandler(command);
  await handler.run(options);
});
