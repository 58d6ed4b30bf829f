/**
 * Chat-style agent CLI backend.
 *
 * Spawns `<path> chat [--no-interactive] (--trust-all-tools | --trust-tools <list>) [--agent <profile>] "<prompt>"`
 */

import type { AgentBackend, AgentResult, InvokeOptions } from '../../../../lib/types.js';
import { spawnProcess, toAgentResult } from './backend.js';

export interface ChatBackendOptions {
  path: string;
  trustTools: string;
  trustAllTools: boolean;
  profile?: string | null;
}

export class ChatBackend implements AgentBackend {
  name = 'chat';

  constructor(private readonly opts: ChatBackendOptions) {}

  /** Build the argument vector for one invocation. */
  buildArgs(prompt: string, interactive: boolean): string[] {
    const args = ['chat'];
    if (!interactive) {
      args.push('--no-interactive');
    }

    if (this.opts.trustAllTools) {
      args.push('--trust-all-tools');
    } else if (this.opts.trustTools) {
      args.push('--trust-tools', this.opts.trustTools);
    }

    if (this.opts.profile) {
      args.push('--agent', this.opts.profile);
    }

    args.push(prompt);
    return args;
  }

  async invoke(opts: InvokeOptions): Promise<AgentResult> {
    const result = await spawnProcess(this.opts.path, this.buildArgs(opts.prompt, opts.interactive), {
      cwd: opts.workdir,
      timeout: opts.timeout,
      interactive: opts.interactive,
    });

    return toAgentResult(result);
  }
}
