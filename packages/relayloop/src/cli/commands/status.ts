/**
 * `relayloop status` - Show where a session stands without invoking anything.
 */

import { Command } from 'commander';

import { BaseCommand } from '../lib/base-command.js';
import { collectStatus } from '../lib/loop/status.js';
import { requireSessionName, resolveWorkdir } from '../lib/run-options.js';

interface StatusOptions {
  name: string;
  workdir?: string;
}

class StatusHandler extends BaseCommand {
  async run(options: StatusOptions): Promise<void> {
    await this.execute(async () => {
      const session = requireSessionName(options.name);
      const workdir = await resolveWorkdir(options.workdir);
      const status = await collectStatus(workdir, session);

      this.output.data(status, () => {
        const colors = this.output.getColors();
        console.log(colors.bold(`Session: ${status.session}`));
        console.log(`  Workdir:  ${status.workdir}`);
        console.log(`  Plan:     ${colors.id(status.plan.state)}`);
        if (status.plan.summary?.outcome) {
          console.log(`  Last plan run: ${status.plan.summary.outcome}`);
        }

        if (!status.execution) return;
        const { steps, stepsCompleted, summary } = status.execution;
        console.log('');
        console.log(colors.bold(`  Steps (${stepsCompleted}/${steps.length} approved):`));
        for (const step of steps) {
          const stateColor =
            step.state === 'approved'
              ? colors.success
              : step.state === 'blocked'
                ? colors.error
                : step.state === 'initial'
                  ? colors.dim
                  : colors.warn;
          console.log(`    Step ${step.stepNum}  ${stateColor(step.state)}`);
        }
        if (summary?.outcome) {
          console.log(`  Last execution run: ${summary.outcome}`);
        }
      });
      return 0;
    });
  }
}

export const statusCommand = new Command('status')
  .description('Show the detected state of a session')
  .requiredOption('--name <name>', 'Session name')
  .option('--workdir <dir>', 'Directory holding the session artifacts (default: cwd)')
  .action(async (options: StatusOptions, command: Command) => {
    const handler = new StatusHandler(command);
    await handler.run(options);
  });
