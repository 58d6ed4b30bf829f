/**
 * Subprocess backend: a configurable shell command for custom agents.
 *
 * The command receives the prompt as its final argument.
 */

import type { AgentBackend, AgentResult, InvokeOptions } from '../../../../lib/types.js';
import { spawnProcess, toAgentResult } from './backend.js';

export class SubprocessBackend implements AgentBackend {
  name = 'subprocess';

  constructor(private readonly command: string) {}

  /** Split the command into executable and args, prompt last. */
  buildCommand(prompt: string): { executable: string; args: string[] } {
    const [executable = '', ...baseArgs] = this.command.trim().split(/\s+/);
    return { executable, args: [...baseArgs, prompt] };
  }

  async invoke(opts: InvokeOptions): Promise<AgentResult> {
    const { executable, args } = this.buildCommand(opts.prompt);

    const result = await spawnProcess(executable, args, {
      cwd: opts.workdir,
      timeout: opts.timeout,
      interactive: opts.interactive,
      env: { RELAYLOOP_ROLE: opts.role },
    });

    return toAgentResult(result);
  }
}
