/**
 * Base class for command handlers.
 *
 * Owns the OutputManager (built from the global --json / --no-color flags)
 * and turns LoopErrors into an error line plus the matching exit code.
 */

import type { Command } from 'commander';

import { LoopError } from './errors.js';
import { OutputManager } from './output.js';

type GlobalOptions = {
  json?: boolean;
  color?: boolean;
};

export abstract class BaseCommand {
  protected readonly output: OutputManager;

  constructor(command: Command) {
    const opts = command.optsWithGlobals<GlobalOptions>();
    this.output = new OutputManager({ json: opts.json ?? false, color: opts.color });
  }

  /**
   * Run a handler body and set the process exit code from its result.
   * LoopErrors are reported; anything else propagates to the CLI entry.
   */
  protected async execute(body: () => Promise<number>): Promise<void> {
    try {
      process.exitCode = await body();
    } catch (err: unknown) {
      if (!(err instanceof LoopError)) throw err;
      this.output.error(err.code, err.message);
      process.exitCode = err.exitCode;
    }
  }
}
