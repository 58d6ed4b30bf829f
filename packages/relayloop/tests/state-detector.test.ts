import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { rm, writeFile } from 'node:fs/promises';

import {
  capturePlanSnapshot,
  captureStepSnapshot,
  detectPlanState,
  detectStepState,
} from '../src/cli/lib/loop/state-detector.js';
import { planArtifacts, stepArtifacts } from '../src/lib/paths.js';
import { makeTempDir } from './support.js';

const EMPTY_PLAN = { final: false, stuck: false, review: false, draft: false };
const EMPTY_STEP = { reviewFirstLine: null, stuck: false, work: false };

describe('detectPlanState', () => {
  it('is initial with no artifacts', () => {
    expect(detectPlanState(EMPTY_PLAN)).toBe('initial');
  });

  it('prefers the most final artifact', () => {
    expect(detectPlanState({ final: true, stuck: true, review: true, draft: true })).toBe('done');
    expect(detectPlanState({ ...EMPTY_PLAN, stuck: true, review: true, draft: true })).toBe('stuck');
    expect(detectPlanState({ ...EMPTY_PLAN, review: true, draft: true })).toBe('review_ready');
    expect(detectPlanState({ ...EMPTY_PLAN, draft: true })).toBe('draft_ready');
  });
});

describe('detectStepState', () => {
  it('reads APPROVED anywhere in the first review line', () => {
    expect(detectStepState({ ...EMPTY_STEP, reviewFirstLine: 'APPROVED — looks good', work: true })).toBe(
      'approved',
    );
  });

  it('reads NEEDS REWORK as needs_rework', () => {
    expect(detectStepState({ ...EMPTY_STEP, reviewFirstLine: 'NEEDS REWORK: fix X', work: true })).toBe(
      'needs_rework',
    );
  });

  it('treats a review without a marker as review_done', () => {
    expect(detectStepState({ ...EMPTY_STEP, reviewFirstLine: 'Looks okay', work: true })).toBe('review_done');
  });

  it('falls back to work_done and initial', () => {
    expect(detectStepState({ ...EMPTY_STEP, work: true })).toBe('work_done');
    expect(detectStepState(EMPTY_STEP)).toBe('initial');
  });

  it('ranks blocked below approved and above rework', () => {
    expect(detectStepState({ reviewFirstLine: 'APPROVED', stuck: true, work: true })).toBe('approved');
    expect(detectStepState({ reviewFirstLine: 'NEEDS REWORK', stuck: true, work: true })).toBe('blocked');
    expect(detectStepState({ ...EMPTY_STEP, stuck: true })).toBe('blocked');
  });
});

describe('snapshots', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('captures plan artifact existence', async () => {
    const paths = planArtifacts(dir, 'demo');
    await writeFile(paths.draft, 'draft');
    await writeFile(paths.review, 'review');

    const snapshot = await capturePlanSnapshot(paths);
    expect(snapshot).toEqual({ final: false, stuck: false, review: true, draft: true });
    expect(detectPlanState(snapshot)).toBe('review_ready');
  });

  it('captures only the first review line', async () => {
    const paths = stepArtifacts(dir, 'demo', 1);
    await writeFile(paths.work, 'done');
    await writeFile(paths.review, 'NEEDS REWORK\r\nAPPROVED later lines do not count\n');

    const snapshot = await captureStepSnapshot(paths);
    expect(snapshot).toEqual({ reviewFirstLine: 'NEEDS REWORK', stuck: false, work: true });
    expect(detectStepState(snapshot)).toBe('needs_rework');
  });

  it('ignores artifacts of other sessions and steps', async () => {
    await writeFile(stepArtifacts(dir, 'demo', 2).review, 'APPROVED');
    await writeFile(stepArtifacts(dir, 'other', 1).review, 'APPROVED');

    const snapshot = await captureStepSnapshot(stepArtifacts(dir, 'demo', 1));
    expect(detectStepState(snapshot)).toBe('initial');
  });
});
