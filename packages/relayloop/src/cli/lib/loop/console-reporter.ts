/**
 * Real-time console reporter for relay loop milestones.
 *
 * Prints to stderr so stdout stays clean for the summary and JSON output.
 */

import pc from 'picocolors';

import type { OutcomeType, RoleType } from '../../../lib/types.js';

export type ReporterSink = (line: string) => void;

function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  const secs = Math.floor(ms / 1000);
  if (secs < 60) return `${secs}s`;
  const mins = Math.floor(secs / 60);
  const remSecs = secs % 60;
  return `${mins}m${remSecs}s`;
}

export function createConsoleReporter(label: string, sink: ReporterSink = (line) => console.error(line)) {
  const prefix = pc.dim(`[${label}]`);
  const log = (msg: string) => {
    sink(`${prefix} ${pc.dim(new Date().toLocaleTimeString())} ${msg}`);
  };

  return {
    runStarted(session: string, workdir: string): void {
      log(`${pc.bold('Run started')} ${pc.dim(session)}`);
      log(`  Workdir: ${workdir}`);
    },

    stepStarted(stepNum: number, total: number): void {
      log(`${pc.blue('→')} Step ${pc.bold(`${stepNum}/${total}`)}`);
    },

    stateDetected(state: string, iteration: number, forced: boolean): void {
      const how = forced ? pc.dim(' [forced]') : '';
      log(`  State: ${pc.bold(state)} ${pc.dim(`(iteration ${iteration})`)}${how}`);
    },

    agentStarted(role: RoleType, attempt: number, interactive: boolean): void {
      const mode = interactive ? pc.yellow(' interactive') : '';
      log(`  ${pc.dim('▶')} ${role} ${pc.dim(`attempt ${attempt}`)}${mode}`);
    },

    agentFinished(role: RoleType, status: string, durationMs: number): void {
      const icon = status === 'success' ? pc.green('✓') : pc.red('✗');
      log(`  ${icon} ${role} ${status} ${pc.dim(formatDuration(durationMs))}`);
    },

    retrying(role: RoleType, attempt: number, maxAttempts: number, message: string): void {
      log(`  ${pc.yellow('↻')} ${role} attempt ${attempt}/${maxAttempts} failed: ${message}. Retrying in 2s`);
    },

    retriesExhausted(role: RoleType, maxAttempts: number, message: string): void {
      log(`  ${pc.red('✗')} ${role} failed after ${maxAttempts} attempts: ${message}`);
    },

    fallbackWritten(role: RoleType, path: string): void {
      log(`  ${pc.yellow('⚠')} ${role} timed out — wrote fallback ${pc.dim(path)}`);
    },

    unmarkedReview(path: string): void {
      log(`  ${pc.yellow('⚠')} Review has no status marker: ${pc.dim(path)}`);
    },

    stepApproved(stepNum: number): void {
      log(`  ${pc.green('✓')} Step ${stepNum} approved`);
    },

    runFinished(outcome: OutcomeType, message: string): void {
      if (outcome === 'success') {
        log(`${pc.green(pc.bold('✓ Run completed'))} — ${message}`);
      } else if (outcome === 'blocked') {
        log(`${pc.yellow(pc.bold('⚠ Run blocked'))} — ${message}`);
      } else {
        log(`${pc.red(pc.bold('✗ Run failed'))} — ${message}`);
      }
    },

    warn(message: string): void {
      log(`${pc.yellow('⚠')} ${message}`);
    },

    runInterrupted(): void {
      log(`${pc.yellow('⚠')} Run interrupted — agent processes killed`);
    },
  };
}

export type ConsoleReporter = ReturnType<typeof createConsoleReporter>;
