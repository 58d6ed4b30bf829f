/**
 * State detection from artifact snapshots.
 *
 * A snapshot is captured in one pass, then mapped to a state by a pure
 * function with a fixed priority order (more final states win). Creation
 * order of the files never matters.
 */

import type { PlanStateType, StepStateType } from '../../../lib/types.js';
import {
  APPROVED_MARKER,
  REWORK_MARKER,
  type PlanArtifacts,
  type StepArtifacts,
} from '../../../lib/paths.js';
import { artifactExists, readFirstLine } from './artifacts.js';

// =============================================================================
// Planning
// =============================================================================

export interface PlanSnapshot {
  final: boolean;
  stuck: boolean;
  review: boolean;
  draft: boolean;
}

export async function capturePlanSnapshot(paths: PlanArtifacts): Promise<PlanSnapshot> {
  const [final, stuck, review, draft] = await Promise.all([
    artifactExists(paths.final),
    artifactExists(paths.stuck),
    artifactExists(paths.review),
    artifactExists(paths.draft),
  ]);
  return { final, stuck, review, draft };
}

export function detectPlanState(snapshot: PlanSnapshot): PlanStateType {
  if (snapshot.final) return 'done';
  if (snapshot.stuck) return 'stuck';
  if (snapshot.review) return 'review_ready';
  if (snapshot.draft) return 'draft_ready';
  return 'initial';
}

// =============================================================================
// Execution
// =============================================================================

export interface StepSnapshot {
  /** First line of the review artifact, null when absent. */
  reviewFirstLine: string | null;
  stuck: boolean;
  work: boolean;
}

export async function captureStepSnapshot(paths: StepArtifacts): Promise<StepSnapshot> {
  const [reviewFirstLine, stuck, work] = await Promise.all([
    readFirstLine(paths.review),
    artifactExists(paths.stuck),
    artifactExists(paths.work),
  ]);
  return { reviewFirstLine, stuck, work };
}

export function detectStepState(snapshot: StepSnapshot): StepStateType {
  const firstLine = snapshot.reviewFirstLine;
  if (firstLine?.includes(APPROVED_MARKER)) return 'approved';
  if (snapshot.stuck) return 'blocked';
  if (firstLine !== null) {
    return firstLine.includes(REWORK_MARKER) ? 'needs_rework' : 'review_done';
  }
  if (snapshot.work) return 'work_done';
  return 'initial';
}
