/**
 * Read-only session status: detected states and the last written summaries.
 * Invokes nothing and writes nothing.
 */

import type { ZodType } from 'zod';

import {
  executionSummaryPath,
  planArtifacts,
  stepArtifacts,
} from '../../../lib/paths.js';
import {
  ExecutionSummarySchema,
  PlanSummarySchema,
  type ExecutionSummary,
  type PlanStateType,
  type PlanSummary,
  type StepStateType,
} from '../../../lib/types.js';
import { StateFileError, errorMessage } from '../errors.js';
import { artifactExists, readArtifact } from './artifacts.js';
import { parsePlanFile } from './plan-parser.js';
import { capturePlanSnapshot, captureStepSnapshot, detectPlanState, detectStepState } from './state-detector.js';

export interface StepStatus {
  stepNum: number;
  state: StepStateType;
}

export interface SessionStatus {
  session: string;
  workdir: string;
  plan: {
    state: PlanStateType;
    summary: PlanSummary | null;
  };
  /** Null until the session has a plan with steps. */
  execution: {
    steps: StepStatus[];
    stepsCompleted: number;
    summary: ExecutionSummary | null;
  } | null;
}

export async function collectStatus(workdir: string, session: string): Promise<SessionStatus> {
  const paths = planArtifacts(workdir, session);
  const planState = detectPlanState(await capturePlanSnapshot(paths));
  const planSummary = await readSummary(paths.summary, PlanSummarySchema);

  let execution: SessionStatus['execution'] = null;
  if (await artifactExists(paths.draft)) {
    const steps = await parsePlanFile(paths.draft);
    if (steps.length > 0) {
      const stepStatuses: StepStatus[] = [];
      for (const step of steps) {
        const state = detectStepState(
          await captureStepSnapshot(stepArtifacts(workdir, session, step.stepNum)),
        );
        stepStatuses.push({ stepNum: step.stepNum, state });
      }
      execution = {
        steps: stepStatuses,
        stepsCompleted: stepStatuses.filter((s) => s.state === 'approved').length,
        summary: await readSummary(executionSummaryPath(workdir, session), ExecutionSummarySchema),
      };
    }
  }

  return {
    session,
    workdir,
    plan: { state: planState, summary: planSummary },
    execution,
  };
}

async function readSummary<T>(path: string, schema: ZodType<T>): Promise<T | null> {
  if (!(await artifactExists(path))) return null;
  const content = await readArtifact(path);
  try {
    return schema.parse(JSON.parse(content));
  } catch (error) {
    throw new StateFileError(`Invalid summary file ${path}: ${errorMessage(error)}`);
  }
}
