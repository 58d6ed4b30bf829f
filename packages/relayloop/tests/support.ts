/**
 * Shared test support: a scripted agent backend whose side effects write
 * artifacts, and a loop context wired for tests (no signals, no sleeping,
 * silent reporter).
 */

import { mkdtemp, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { parseRelayConfig, type RelayConfigInput } from '../src/lib/config.js';
import type { AgentBackend, AgentResult, InvokeOptions, WorkflowKindType } from '../src/lib/types.js';
import { createConsoleReporter } from '../src/cli/lib/loop/console-reporter.js';
import { createLoopContext, type LoopContext } from '../src/cli/lib/loop/engine.js';

type Status = AgentResult['status'];

export class ScriptedBackend implements AgentBackend {
  name = 'scripted';
  calls: InvokeOptions[] = [];

  /** `script` runs once per invocation and returns the result status. */
  constructor(private readonly script: (opts: InvokeOptions, call: number) => Promise<Status>) {}

  async invoke(opts: InvokeOptions): Promise<AgentResult> {
    this.calls.push(opts);
    const status = await this.script(opts, this.calls.length);
    return {
      status,
      exitCode: status === 'success' ? 0 : status === 'timeout' ? 143 : 1,
      duration: 5,
    };
  }

  roles(): string[] {
    return this.calls.map((c) => c.role);
  }
}

export async function makeTempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'relayloop-test-'));
}

export function testContext(opts: {
  workflow: WorkflowKindType;
  workdir: string;
  backend: AgentBackend;
  session?: string;
  config?: RelayConfigInput;
  sleep?: (ms: number) => Promise<void>;
  lines?: string[];
}): LoopContext {
  const lines = opts.lines;
  return createLoopContext({
    workflow: opts.workflow,
    workdir: opts.workdir,
    session: opts.session ?? 'demo',
    config: parseRelayConfig(opts.config ?? {}),
    backend: opts.backend,
    reporter: createConsoleReporter(opts.workflow, (line) => {
      lines?.push(line);
    }),
    sleep: opts.sleep ?? (async () => {}),
    handleSignals: false,
  });
}

/** Plan text with `count` sequential step blocks. */
export function planText(count: number): string {
  const blocks: string[] = [];
  for (let n = 1; n <= count; n++) {
    blocks.push(`---STEP_BLOCK---
### Step ${n}: Part ${n}

**Description**: Implement part ${n} of the greeting module
**Success Criteria**: unit tests for part ${n} pass
**Dependencies**: None
---END_STEP_BLOCK---`);
  }
  return `# Plan\n\n${blocks.join('\n\n')}\n`;
}

export async function writePlan(workdir: string, session: string, count: number): Promise<void> {
  await writeFile(join(workdir, `PLAN_DRAFT_${session}.md`), planText(count), 'utf-8');
}

/** Step number named in a worker or reviewer prompt. */
export function promptStep(prompt: string): number {
  const match = /Step (\d+) of plan/.exec(prompt);
  return match?.[1] ? parseInt(match[1], 10) : 0;
}
