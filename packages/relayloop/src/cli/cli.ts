/**
 * CLI program definition.
 */

import { Command } from 'commander';

import { executeCommand } from './commands/execute.js';
import { planCommand } from './commands/plan.js';
import { statusCommand } from './commands/status.js';
import { errorMessage } from './lib/errors.js';
import { VERSION } from '../index.js';

export function createProgram(): Command {
  return new Command('relayloop')
    .description('Relay a coding agent through producer ⇄ reviewer cycles')
    .version(VERSION)
    .option('--json', 'Output results as JSON')
    .option('--no-color', 'Disable colored output')
    .addCommand(planCommand)
    .addCommand(executeCommand)
    .addCommand(statusCommand);
}

/** Parse argv and run. Unexpected errors exit 2. */
export async function runCli(argv: string[] = process.argv): Promise<void> {
  try {
    await createProgram().parseAsync(argv);
  } catch (err: unknown) {
    console.error(`Error [E_INTERNAL]: ${errorMessage(err)}`);
    process.exitCode = 2;
  }
}
