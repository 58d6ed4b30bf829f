/**
 * Planning workflow: planner ⇄ reviewer until PLAN_FINAL appears.
 */

import { basename } from 'node:path';

import { planArtifacts, type PlanArtifacts } from '../../../lib/paths.js';
import type { PlanStateType } from '../../../lib/types.js';
import { BlockedError, InvocationError } from '../errors.js';
import { readArtifact } from './artifacts.js';
import { runTurn, runWorkflow, type LoopContext, type RunResult, type WorkflowOutcome } from './engine.js';
import { buildPlanReviewerPrompt, buildPlannerPrompt } from './prompts.js';
import { capturePlanSnapshot, detectPlanState } from './state-detector.js';

export interface PlanningOptions {
  problemStatement: string;
}

export function runPlanning(ctx: LoopContext, opts: PlanningOptions): Promise<RunResult> {
  return runWorkflow(ctx, () => planLoop(ctx, opts));
}

async function planLoop(ctx: LoopContext, opts: PlanningOptions): Promise<WorkflowOutcome> {
  const paths = planArtifacts(ctx.workdir, ctx.session);
  const budget = ctx.config.max_agent_invocations;
  const { max_retries: maxRetries } = ctx.config.agent;

  // Set after a planner turn: the new draft goes to the reviewer even when
  // the previous round's review is still on disk.
  let afterPlanner = false;
  let iteration = 0;

  while (ctx.summary.totalInvocations() < budget) {
    iteration++;
    const detected = detectPlanState(await capturePlanSnapshot(paths));
    const forced = afterPlanner && detected !== 'done' && detected !== 'stuck' && detected !== 'draft_ready';
    const state: PlanStateType = forced ? 'draft_ready' : detected;
    afterPlanner = false;

    ctx.summary.recordState(state);
    ctx.events.emit({ event: 'state_detected', state, iteration, forced });
    ctx.reporter.stateDetected(state, iteration, forced);

    const terminal = terminalOutcome(ctx.session, state, paths);
    if (terminal) return terminal;

    // Every attempt counts against the budget
    const maxAttempts = Math.min(maxRetries, budget - ctx.summary.totalInvocations());
    const capped = maxAttempts < maxRetries;

    try {
      afterPlanner = await runPlanTurn(ctx, opts, state, maxAttempts);
    } catch (error) {
      // Retries were cut short by the budget, not used up
      if (capped && error instanceof InvocationError) {
        ctx.reporter.warn(`Invocation budget spent during retries: ${error.message}`);
        break;
      }
      throw error;
    }
  }

  // An approval written by the last budgeted invocation still counts
  const state = detectPlanState(await capturePlanSnapshot(paths));
  ctx.summary.recordState(state);
  const terminal = terminalOutcome(ctx.session, state, paths);
  if (terminal) return terminal;

  return {
    outcome: 'max_iterations',
    message: `Plan not approved after ${budget} agent invocations`,
  };
}

/** Run the planner or reviewer for the detected state. Resolves true after a planner turn. */
async function runPlanTurn(
  ctx: LoopContext,
  opts: PlanningOptions,
  state: PlanStateType,
  maxAttempts: number,
): Promise<boolean> {
  const paths = planArtifacts(ctx.workdir, ctx.session);

  if (state === 'draft_ready') {
    await runTurn(ctx, {
      role: 'reviewer',
      prompt: buildPlanReviewerPrompt({
        session: ctx.session,
        problemStatement: opts.problemStatement,
        paths,
      }),
      maxAttempts,
    });
    return false;
  }

  const reviewFeedback = state === 'review_ready' ? await readArtifact(paths.review) : undefined;
  await runTurn(ctx, {
    role: 'planner',
    prompt: buildPlannerPrompt({
      session: ctx.session,
      problemStatement: opts.problemStatement,
      paths,
      reviewFeedback,
    }),
    maxAttempts,
    onAttempt: (attempt) => {
      if (reviewFeedback !== undefined && attempt === 1) ctx.summary.recordRevisionCycle();
    },
  });
  return true;
}

function terminalOutcome(session: string, state: PlanStateType, paths: PlanArtifacts): WorkflowOutcome | null {
  if (state === 'done') {
    return {
      outcome: 'success',
      message: `Plan approved: ${basename(paths.draft)}. Next: relayloop execute --name ${session}`,
    };
  }
  if (state === 'stuck') {
    const stuck = basename(paths.stuck);
    throw new BlockedError(
      `Planner needs more information: see ${stuck}. ` +
        `Answer its questions in the problem statement, delete ${stuck}, then rerun relayloop plan`,
    );
  }
  return null;
}
