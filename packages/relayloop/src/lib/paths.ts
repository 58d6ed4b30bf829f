/**
 * Artifact naming for relay sessions.
 *
 * Every file a session owns lives directly in the working directory and
 * carries the session name, so several sessions can share one directory.
 */

import { join } from 'node:path';

export const CONFIG_FILENAME = 'relayloop.yml';

export const APPROVED_MARKER = 'APPROVED';
export const REWORK_MARKER = 'NEEDS REWORK';

const SESSION_NAME_RE = /^[A-Za-z0-9_]+$/;

/** Session names are alphanumeric plus underscore. */
export function isValidSessionName(name: string): boolean {
  return SESSION_NAME_RE.test(name);
}

// =============================================================================
// Planning
// =============================================================================

export interface PlanArtifacts {
  draft: string;
  review: string;
  stuck: string;
  final: string;
  summary: string;
  events: string;
}

export function planArtifacts(workdir: string, session: string): PlanArtifacts {
  return {
    draft: join(workdir, `PLAN_DRAFT_${session}.md`),
    review: join(workdir, `PLAN_REVIEW_${session}.md`),
    stuck: join(workdir, `PLAN_STUCK_${session}.md`),
    final: join(workdir, `PLAN_FINAL_${session}.md`),
    summary: join(workdir, `PLAN_SUMMARY_${session}.json`),
    events: join(workdir, `PLAN_EVENTS_${session}.jsonl`),
  };
}

// =============================================================================
// Execution
// =============================================================================

export interface StepArtifacts {
  work: string;
  review: string;
  stuck: string;
}

export function stepArtifacts(workdir: string, session: string, stepNum: number): StepArtifacts {
  return {
    work: join(workdir, `WORK_${session}_step_${stepNum}.md`),
    review: join(workdir, `REVIEW_${session}_step_${stepNum}.md`),
    stuck: join(workdir, `STUCK_${session}_step_${stepNum}.md`),
  };
}

export function executionSummaryPath(workdir: string, session: string): string {
  return join(workdir, `EXECUTION_SUMMARY_${session}.json`);
}

export function executionEventsPath(workdir: string, session: string): string {
  return join(workdir, `EXECUTION_EVENTS_${session}.jsonl`);
}
