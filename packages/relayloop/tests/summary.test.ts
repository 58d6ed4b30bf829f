import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { readFile, rm } from 'node:fs/promises';
import { join } from 'node:path';

import { SummaryRecorder, formatElapsed, formatSummary } from '../src/cli/lib/loop/summary.js';
import { EventLogger } from '../src/cli/lib/loop/events.js';
import { LoopEventSchema } from '../src/lib/types.js';
import { makeTempDir } from './support.js';

const START = new Date('2026-01-01T10:00:00.000Z');
const END = new Date('2026-01-01T11:02:03.000Z');

describe('SummaryRecorder', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function executionRecorder(): SummaryRecorder {
    const now = vi.fn<() => Date>().mockReturnValueOnce(START).mockReturnValueOnce(END);
    return new SummaryRecorder(join(dir, 'EXECUTION_SUMMARY_demo.json'), 'execute', now);
  }

  it('accumulates counters and writes them once as JSON', async () => {
    const recorder = executionRecorder();
    recorder.recordInvocation('worker');
    recorder.recordInvocation('worker');
    recorder.recordInvocation('reviewer');
    recorder.recordRevisionCycle();
    recorder.setTotalSteps(2);
    recorder.recordStepCompleted();
    recorder.recordState('approved');
    recorder.finish('success');

    const expected = {
      start_time: '2026-01-01T10:00:00.000Z',
      end_time: '2026-01-01T11:02:03.000Z',
      reviewer_invocations: 1,
      revision_cycles: 1,
      outcome: 'success',
      workflow: 'execute',
      worker_invocations: 2,
      steps_completed: 1,
      total_steps: 2,
      final_state: 'approved',
    };
    expect(recorder.getSummary()).toEqual(expected);
    expect(recorder.totalInvocations()).toBe(3);

    await recorder.write();
    const written = await readFile(recorder.path, 'utf-8');
    expect(JSON.parse(written)).toEqual(expected);
    expect(written.endsWith('}\n')).toBe(true);
  });

  it('rejects roles outside the workflow', () => {
    const recorder = executionRecorder();
    expect(() => recorder.recordInvocation('planner')).toThrow(
      'Role planner does not take part in the execute workflow',
    );
  });

  it('rejects states of the other workflow', () => {
    const recorder = new SummaryRecorder(join(dir, 'PLAN_SUMMARY_demo.json'), 'plan');
    expect(() => recorder.recordState('approved')).toThrow();
    recorder.recordState('draft_ready');
    expect(recorder.getSummary().final_state).toBe('draft_ready');
  });

  it('formats a console block with the elapsed time', () => {
    const recorder = executionRecorder();
    recorder.setTotalSteps(3);
    recorder.recordStepCompleted();
    recorder.finish('max_iterations');

    const lines = formatSummary(recorder.getSummary()).split('\n');
    expect(lines[0]).toBe('=== Execution Summary ===');
    expect(lines).toContain('Duration: 1:02:03');
    expect(lines).toContain('Worker Invocations: 0');
    expect(lines).toContain('Steps Completed: 1/3');
    expect(lines).toContain('Final State: N/A');
    expect(lines).toContain('Outcome: max_iterations');
    expect(lines.at(-1)).toBe('='.repeat(25));
  });
});

describe('formatElapsed', () => {
  it('renders hours, minutes and seconds', () => {
    expect(formatElapsed('2026-01-01T00:00:00.000Z', '2026-01-01T00:00:59.900Z')).toBe('0:00:59');
    expect(formatElapsed('2026-01-01T00:00:00.000Z', '2026-01-01T12:34:56.000Z')).toBe('12:34:56');
  });

  it('renders N/A without an end time', () => {
    expect(formatElapsed('2026-01-01T00:00:00.000Z', null)).toBe('N/A');
  });
});

describe('EventLogger', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('appends versioned JSONL records in emit order', async () => {
    const path = join(dir, 'PLAN_EVENTS_demo.jsonl');
    const logger = new EventLogger(path);
    await logger.open();
    logger.emit({ event: 'run_started', workflow: 'plan', session: 'demo' });
    logger.emit({ event: 'run_finished', outcome: 'success', exit_code: 0 });
    await logger.close();

    const records = (await readFile(path, 'utf-8'))
      .trim()
      .split('\n')
      .map((line) => LoopEventSchema.parse(JSON.parse(line)));
    expect(records.map((r) => r.event)).toEqual(['run_started', 'run_finished']);
    expect(records.every((r) => r.v === 1)).toBe(true);
  });

  it('keeps earlier records across runs', async () => {
    const path = join(dir, 'PLAN_EVENTS_demo.jsonl');
    for (const session of ['demo', 'demo']) {
      const logger = new EventLogger(path);
      await logger.open();
      logger.emit({ event: 'run_started', workflow: 'plan', session });
      await logger.close();
    }
    const lines = (await readFile(path, 'utf-8')).trim().split('\n');
    expect(lines).toHaveLength(2);
  });
});
