/**
 * Execution workflow: worker ⇄ reviewer for each step of an approved plan.
 *
 * Steps run one at a time in ascending order. Each step has its own
 * iteration budget; exhausting it ends the whole run.
 */

import { basename } from 'node:path';

import { planArtifacts, stepArtifacts, type StepArtifacts } from '../../../lib/paths.js';
import type { Step, StepStateType } from '../../../lib/types.js';
import { BlockedError, StateFileError, ValidationError } from '../errors.js';
import { artifactExists, readArtifact } from './artifacts.js';
import { runTurn, runWorkflow, type LoopContext, type RunResult, type WorkflowOutcome } from './engine.js';
import { parsePlanFile } from './plan-parser.js';
import {
  buildReviewerTimeoutArtifact,
  buildStepReviewerPrompt,
  buildWorkerPrompt,
  buildWorkerTimeoutArtifact,
  stripReviewMarker,
} from './prompts.js';
import { captureStepSnapshot, detectStepState } from './state-detector.js';

const NO_WORK_SUMMARY = '(The worker did not write a work summary.)';

export function runExecution(ctx: LoopContext): Promise<RunResult> {
  return runWorkflow(ctx, () => executeLoop(ctx));
}

/** Load the steps of the session's approved plan. */
export async function loadPlanSteps(workdir: string, session: string): Promise<Step[]> {
  const planPath = planArtifacts(workdir, session).draft;
  if (!(await artifactExists(planPath))) {
    throw new ValidationError(`Plan file not found: ${planPath}`);
  }
  const steps = await parsePlanFile(planPath);
  if (steps.length === 0) {
    throw new StateFileError(`No steps found in ${planPath}`, 'E_PLAN_INVALID');
  }
  return steps;
}

async function executeLoop(ctx: LoopContext): Promise<WorkflowOutcome> {
  const steps = await loadPlanSteps(ctx.workdir, ctx.session);
  ctx.summary.setTotalSteps(steps.length);

  for (const step of steps) {
    ctx.reporter.stepStarted(step.stepNum, steps.length);
    const approved = await runStep(ctx, step);
    if (!approved) {
      return {
        outcome: 'max_iterations',
        message: `Step ${step.stepNum} not approved after ${ctx.config.max_agent_invocations} iterations`,
      };
    }
  }

  return { outcome: 'success', message: `All ${steps.length} steps completed` };
}

/** Drive one step to approval. Resolves false when its budget runs out. */
async function runStep(ctx: LoopContext, step: Step): Promise<boolean> {
  const paths = stepArtifacts(ctx.workdir, ctx.session, step.stepNum);
  const { agent, execution } = ctx.config;
  let afterWorker = false;

  for (let iteration = 1; iteration <= ctx.config.max_agent_invocations; iteration++) {
    const detected = detectStepState(await captureStepSnapshot(paths));
    // Fresh work always goes to the reviewer; only approval or a stuck file wins
    const forced = afterWorker && detected !== 'approved' && detected !== 'blocked' && detected !== 'work_done';
    const state: StepStateType = forced ? 'work_done' : detected;
    afterWorker = false;

    ctx.summary.recordState(state);
    ctx.events.emit({ event: 'state_detected', state, step: step.stepNum, iteration, forced });
    ctx.reporter.stateDetected(state, iteration, forced);

    if (state === 'approved') {
      completeStep(ctx, step);
      return true;
    }
    if (state === 'blocked') {
      throw blockedStep(step, paths);
    }

    if (state === 'work_done') {
      const workContent = (await artifactExists(paths.work))
        ? await readArtifact(paths.work)
        : NO_WORK_SUMMARY;
      await runTurn(ctx, {
        role: 'reviewer',
        step: step.stepNum,
        prompt: buildStepReviewerPrompt({ session: ctx.session, step, paths, workContent }),
        maxAttempts: agent.max_retries,
        fallback: { path: paths.review, content: buildReviewerTimeoutArtifact(paths, agent.timeout) },
      });
      continue;
    }

    if (state === 'review_done' && execution.unmarked_review === 'wait') {
      ctx.reporter.unmarkedReview(paths.review);
      continue;
    }

    let reviewFeedback: string | undefined;
    if (state !== 'initial') {
      reviewFeedback = stripReviewMarker(await readArtifact(paths.review));
      ctx.summary.recordRevisionCycle();
    }
    await runTurn(ctx, {
      role: 'worker',
      step: step.stepNum,
      prompt: buildWorkerPrompt({ session: ctx.session, step, paths, reviewFeedback }),
      maxAttempts: agent.max_retries,
      fallback: { path: paths.work, content: buildWorkerTimeoutArtifact(step, agent.timeout) },
    });
    afterWorker = true;
  }

  // Budget spent; an approval from the last reviewer turn still counts
  const state = detectStepState(await captureStepSnapshot(paths));
  ctx.summary.recordState(state);
  if (state === 'approved') {
    completeStep(ctx, step);
    return true;
  }
  if (state === 'blocked') {
    throw blockedStep(step, paths);
  }
  return false;
}

function completeStep(ctx: LoopContext, step: Step): void {
  ctx.summary.recordStepCompleted();
  ctx.events.emit({ event: 'step_approved', step: step.stepNum });
  ctx.reporter.stepApproved(step.stepNum);
}

function blockedStep(step: Step, paths: StepArtifacts): BlockedError {
  const stuck = basename(paths.stuck);
  return new BlockedError(
    `Step ${step.stepNum} needs more information: see ${stuck}. ` +
      `Answer its questions, delete ${stuck}, then rerun relayloop execute`,
  );
}
