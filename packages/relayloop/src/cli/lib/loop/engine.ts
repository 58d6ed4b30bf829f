/**
 * Generic relay engine shared by the plan and execute workflows.
 *
 * A workflow body alternates state detection with role turns. The engine
 * supplies the pieces every body needs:
 * - runTurn: one role invocation under the retry policy, with an optional
 *   timeout fallback artifact
 * - runWorkflow: maps the body's result or error to an outcome and exit code,
 *   then writes the summary and closes the event log
 */

import type { RelayConfig } from '../../../lib/config.js';
import {
  OUTCOME_EXIT_MAP,
  type AgentBackend,
  type LoopErrorCodeType,
  type OutcomeType,
  type RoleType,
  type RunSummary,
  type WorkflowKindType,
} from '../../../lib/types.js';
import { executionEventsPath, executionSummaryPath, planArtifacts } from '../../../lib/paths.js';
import { BlockedError, InvocationError, LoopError, StateFileError, errorMessage } from '../errors.js';
import { writeArtifact } from './artifacts.js';
import { killAllActiveProcesses } from './backends/backend.js';
import { createConsoleReporter, type ConsoleReporter } from './console-reporter.js';
import { EventLogger } from './events.js';
import { retry } from './retry.js';
import { SummaryRecorder } from './summary.js';

// =============================================================================
// Context
// =============================================================================

/** Everything a workflow body needs, passed explicitly through the loop. */
export interface LoopContext {
  workflow: WorkflowKindType;
  workdir: string;
  session: string;
  config: RelayConfig;
  backend: AgentBackend;
  summary: SummaryRecorder;
  events: EventLogger;
  reporter: ConsoleReporter;
  /** Retry sleep; tests replace it to avoid real delays. */
  sleep?: (ms: number) => Promise<void>;
  /** Install SIGINT/SIGTERM handlers for the duration of the run. */
  handleSignals?: boolean;
}

export interface LoopContextOptions {
  workflow: WorkflowKindType;
  workdir: string;
  session: string;
  config: RelayConfig;
  backend: AgentBackend;
  reporter?: ConsoleReporter;
  sleep?: (ms: number) => Promise<void>;
  handleSignals?: boolean;
}

export function createLoopContext(opts: LoopContextOptions): LoopContext {
  const planPaths = planArtifacts(opts.workdir, opts.session);
  const summaryPath =
    opts.workflow === 'plan' ? planPaths.summary : executionSummaryPath(opts.workdir, opts.session);
  const eventsPath =
    opts.workflow === 'plan' ? planPaths.events : executionEventsPath(opts.workdir, opts.session);

  return {
    workflow: opts.workflow,
    workdir: opts.workdir,
    session: opts.session,
    config: opts.config,
    backend: opts.backend,
    summary: new SummaryRecorder(summaryPath, opts.workflow),
    events: new EventLogger(eventsPath),
    reporter: opts.reporter ?? createConsoleReporter(opts.workflow),
    sleep: opts.sleep,
    handleSignals: opts.handleSignals ?? true,
  };
}

// =============================================================================
// Turns
// =============================================================================

export interface Turn {
  role: RoleType;
  prompt: string;
  step?: number;
  maxAttempts: number;
  /** Runs before every attempt, after the invocation is counted. */
  onAttempt?: (attempt: number) => void;
  /**
   * Artifact to write when the agent times out. When set, a timeout ends
   * the turn at once instead of being retried.
   */
  fallback?: { path: string; content: string };
}

export type TurnResult = { kind: 'success'; attempts: number } | { kind: 'fallback'; path: string };

/**
 * Invoke one role under the retry policy.
 * Throws InvocationError when every attempt failed.
 */
export async function runTurn(ctx: LoopContext, turn: Turn): Promise<TurnResult> {
  const { agent } = ctx.config;

  const result = await retry(
    async ({ attempt, isFinalAttempt }) => {
      const interactive = isFinalAttempt && agent.intervene_on_final_retry;
      ctx.events.emit({ event: 'agent_invoked', role: turn.role, attempt, step: turn.step, interactive });
      ctx.reporter.agentStarted(turn.role, attempt, interactive);

      const res = await ctx.backend.invoke({
        role: turn.role,
        prompt: turn.prompt,
        workdir: ctx.workdir,
        timeout: agent.timeout,
        interactive,
      });

      ctx.events.emit({
        event: 'agent_finished',
        role: turn.role,
        attempt,
        status: res.status,
        exit_code: res.exitCode,
        duration_ms: res.duration,
      });
      ctx.reporter.agentFinished(turn.role, res.status, res.duration);

      if (res.status === 'success') return 'success' as const;
      if (res.status === 'timeout') {
        if (turn.fallback) return 'timeout' as const;
        throw new InvocationError(
          `${turn.role} timed out after ${Math.round(agent.timeout / 1000)} seconds`,
          'Timeout',
        );
      }
      throw new InvocationError(`${turn.role} failed with exit code ${res.exitCode}`, 'ProcessError');
    },
    {
      maxAttempts: turn.maxAttempts,
      onAttempt: (attempt) => {
        ctx.summary.recordInvocation(turn.role);
        turn.onAttempt?.(attempt);
      },
      onFailure: (attempt, message, willRetry) => {
        if (willRetry) {
          ctx.reporter.retrying(turn.role, attempt, turn.maxAttempts, message);
        } else {
          ctx.reporter.retriesExhausted(turn.role, turn.maxAttempts, message);
        }
      },
      sleep: ctx.sleep,
    },
  );

  if (!result.ok) {
    throw new InvocationError(
      `${turn.role} failed after ${result.attempts} attempts: ${result.error}`,
      'ProcessError',
    );
  }

  if (result.value === 'timeout' && turn.fallback) {
    await writeArtifact(turn.fallback.path, turn.fallback.content);
    ctx.events.emit({ event: 'fallback_written', role: turn.role, path: turn.fallback.path });
    ctx.reporter.fallbackWritten(turn.role, turn.fallback.path);
    return { kind: 'fallback', path: turn.fallback.path };
  }

  return { kind: 'success', attempts: result.attempts };
}

// =============================================================================
// Workflow Runner
// =============================================================================

export interface WorkflowOutcome {
  outcome: OutcomeType;
  message: string;
}

export interface RunResult {
  workflow: WorkflowKindType;
  session: string;
  outcome: OutcomeType;
  exitCode: number;
  message: string;
  summary: RunSummary;
  summaryPath: string;
  summaryWritten: boolean;
  error?: { code: LoopErrorCodeType; message: string };
}

/**
 * Run a workflow body to a terminal outcome.
 *
 * Never throws for LoopErrors raised by the body: they become a failure
 * (or blocked) outcome with the error's exit code. The summary write is
 * best effort so it cannot mask the original error.
 */
export async function runWorkflow(
  ctx: LoopContext,
  body: () => Promise<WorkflowOutcome>,
): Promise<RunResult> {
  try {
    await ctx.events.open();
  } catch (error) {
    throw new StateFileError(`Failed to open event log: ${errorMessage(error)}`);
  }
  ctx.events.emit({ event: 'run_started', workflow: ctx.workflow, session: ctx.session });
  ctx.reporter.runStarted(ctx.session, ctx.workdir);

  const cleanupSignals = ctx.handleSignals ? setupSignalHandlers(ctx) : () => {};

  let outcome: OutcomeType;
  let message: string;
  let exitCode: number;
  let failure: LoopError | undefined;

  try {
    ({ outcome, message } = await body());
    exitCode = OUTCOME_EXIT_MAP[outcome];
  } catch (error) {
    failure =
      error instanceof LoopError
        ? error
        : new LoopError(`Unexpected error: ${errorMessage(error)}`, 'E_INTERNAL');
    outcome = failure instanceof BlockedError ? 'blocked' : 'failure';
    message = failure.message;
    exitCode = failure.exitCode;
    ctx.events.emit({ event: 'run_error', code: failure.code, message: failure.message });
  } finally {
    cleanupSignals();
  }

  ctx.summary.finish(outcome);
  const summaryWritten = await writeSummarySafe(ctx);

  ctx.events.emit({ event: 'run_finished', outcome, exit_code: exitCode });
  ctx.reporter.runFinished(outcome, message);
  try {
    await ctx.events.close();
  } catch (error) {
    ctx.reporter.warn(`Failed to write event log: ${errorMessage(error)}`);
  }

  return {
    workflow: ctx.workflow,
    session: ctx.session,
    outcome,
    exitCode,
    message,
    summary: ctx.summary.getSummary(),
    summaryPath: ctx.summary.path,
    summaryWritten,
    error: failure ? { code: failure.code, message: failure.message } : undefined,
  };
}

async function writeSummarySafe(ctx: LoopContext): Promise<boolean> {
  try {
    await ctx.summary.write();
    return true;
  } catch (error) {
    ctx.reporter.warn(`Failed to write summary ${ctx.summary.path}: ${errorMessage(error)}`);
    return false;
  }
}

function setupSignalHandlers(ctx: LoopContext): () => void {
  const handler = async () => {
    ctx.reporter.runInterrupted();
    killAllActiveProcesses();

    ctx.summary.finish('failure');
    await writeSummarySafe(ctx);
    ctx.events.emit({ event: 'run_finished', outcome: 'failure', exit_code: 130 });
    try {
      await ctx.events.close();
    } catch (error) {
      ctx.reporter.warn(`Failed to write event log: ${errorMessage(error)}`);
    }
    process.exit(130);
  };

  const syncHandler = () => {
    void handler();
  };

  process.on('SIGTERM', syncHandler);
  process.on('SIGINT', syncHandler);

  return () => {
    process.removeListener('SIGTERM', syncHandler);
    process.removeListener('SIGINT', syncHandler);
  };
}
