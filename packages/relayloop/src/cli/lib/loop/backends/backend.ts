/**
 * Agent process spawning shared by all backends.
 *
 * Output is never captured: the agent's stdout and stderr go straight to
 * the operator's terminal. Exit code 0 is the only success signal.
 */

import { spawn, type ChildProcess, type StdioOptions } from 'node:child_process';

import type { AgentResult } from '../../../../lib/types.js';

const KILL_GRACE_MS = 10_000;

// =============================================================================
// Active Process Registry (for signal handler cleanup)
// =============================================================================

const activeProcesses = new Map<number, ChildProcess>();

/** Kill all active agent processes. Used by signal handler. */
export function killAllActiveProcesses(): void {
  for (const [, proc] of activeProcesses) {
    killProcessGroup(proc, 0);
  }
}

export interface ProcessResult {
  exitCode: number;
  duration: number;
  timedOut: boolean;
}

export interface SpawnProcessOptions {
  cwd: string;
  timeout: number;
  /** Inherit stdin and stay in the foreground process group. */
  interactive?: boolean;
  env?: Record<string, string>;
  killGraceMs?: number;
  /** Defaults to inheriting the parent's stdout/stderr. */
  stdio?: StdioOptions;
}

/**
 * Spawn a process and wait for it to exit or time out.
 *
 * Non-interactive processes run in their own process group so a timeout
 * takes down the whole tree (SIGTERM → grace → SIGKILL). Never rejects.
 */
export function spawnProcess(
  command: string,
  args: string[],
  opts: SpawnProcessOptions,
): Promise<ProcessResult> {
  return new Promise((resolve) => {
    const startTime = Date.now();
    const interactive = opts.interactive ?? false;
    let timedOut = false;
    let settled = false;

    const proc: ChildProcess = spawn(command, args, {
      cwd: opts.cwd,
      detached: !interactive,
      env: { ...process.env, ...opts.env },
      stdio: opts.stdio ?? [interactive ? 'inherit' : 'ignore', 'inherit', 'inherit'],
    });

    // Track for signal handler cleanup
    if (proc.pid) activeProcesses.set(proc.pid, proc);

    const timeoutId = setTimeout(() => {
      timedOut = true;
      killProcessGroup(proc, opts.killGraceMs ?? KILL_GRACE_MS);
    }, opts.timeout);

    const finish = (result: Omit<ProcessResult, 'duration'>) => {
      if (settled) return;
      settled = true;
      clearTimeout(timeoutId);
      if (proc.pid) activeProcesses.delete(proc.pid);
      resolve({ ...result, duration: Date.now() - startTime });
    };

    proc.on('close', (code) => {
      finish({ exitCode: code ?? 1, timedOut });
    });

    proc.on('error', () => {
      finish({ exitCode: 1, timedOut: false });
    });
  });
}

/**
 * Kill a process group: SIGTERM → grace period → SIGKILL.
 * Falls back to the single process when it has no group of its own.
 */
export function killProcessGroup(proc: ChildProcess, graceMs: number): void {
  const pid = proc.pid;
  if (!pid) return;

  const signal = (sig: NodeJS.Signals): boolean => {
    try {
      process.kill(-pid, sig);
      return true;
    } catch {
      // Not a group leader (interactive run): signal the child itself
      return proc.kill(sig);
    }
  };

  if (!signal('SIGTERM')) return;

  const graceTimer = setTimeout(() => {
    signal('SIGKILL');
  }, graceMs);
  graceTimer.unref();
  proc.once('close', () => clearTimeout(graceTimer));
}

/**
 * Convert a ProcessResult into an AgentResult.
 */
export function toAgentResult(result: ProcessResult): AgentResult {
  return {
    status: result.timedOut ? 'timeout' : result.exitCode === 0 ? 'success' : 'failure',
    exitCode: result.exitCode,
    duration: result.duration,
  };
}
