/**
 * Run summary accumulated across a relay run.
 *
 * Created at run start, mutated as the loop goes, written exactly once
 * at the terminal exit as PLAN_SUMMARY_<name>.json or
 * EXECUTION_SUMMARY_<name>.json.
 */

import { writeFile } from 'atomically';

import {
  PlanState,
  StepState,
  type OutcomeType,
  type PlanStateType,
  type RoleType,
  type RunSummary,
  type StepStateType,
  type WorkflowKindType,
} from '../../../lib/types.js';

export class SummaryRecorder {
  private summary: RunSummary;

  constructor(
    private readonly summaryPath: string,
    workflow: WorkflowKindType,
    private readonly now: () => Date = () => new Date(),
  ) {
    const base = {
      start_time: this.now().toISOString(),
      end_time: null,
      reviewer_invocations: 0,
      revision_cycles: 0,
      outcome: null,
    };
    this.summary =
      workflow === 'plan'
        ? { ...base, workflow, planner_invocations: 0, final_state: null }
        : {
            ...base,
            workflow,
            worker_invocations: 0,
            steps_completed: 0,
            total_steps: 0,
            final_state: null,
          };
  }

  get path(): string {
    return this.summaryPath;
  }

  recordInvocation(role: RoleType): void {
    const s = this.summary;
    if (role === 'reviewer') {
      s.reviewer_invocations++;
    } else if (role === 'planner' && s.workflow === 'plan') {
      s.planner_invocations++;
    } else if (role === 'worker' && s.workflow === 'execute') {
      s.worker_invocations++;
    } else {
      throw new Error(`Role ${role} does not take part in the ${s.workflow} workflow`);
    }
  }

  /** Planner plus reviewer (or worker plus reviewer) invocations so far. */
  totalInvocations(): number {
    const s = this.summary;
    const producer = s.workflow === 'plan' ? s.planner_invocations : s.worker_invocations;
    return producer + s.reviewer_invocations;
  }

  recordRevisionCycle(): void {
    this.summary.revision_cycles++;
  }

  recordState(state: PlanStateType | StepStateType): void {
    const s = this.summary;
    if (s.workflow === 'plan') {
      s.final_state = PlanState.parse(state);
    } else {
      s.final_state = StepState.parse(state);
    }
  }

  setTotalSteps(total: number): void {
    if (this.summary.workflow === 'execute') this.summary.total_steps = total;
  }

  recordStepCompleted(): void {
    if (this.summary.workflow === 'execute') this.summary.steps_completed++;
  }

  finish(outcome: OutcomeType): void {
    this.summary.outcome = outcome;
    this.summary.end_time = this.now().toISOString();
  }

  getSummary(): RunSummary {
    return structuredClone(this.summary);
  }

  /** Write the summary JSON. Failures propagate to the caller. */
  async write(): Promise<void> {
    await writeFile(this.summaryPath, JSON.stringify(this.summary, null, 2) + '\n', 'utf-8');
  }
}

/** Human-readable summary block for the console. */
export function formatSummary(summary: RunSummary): string {
  const title = summary.workflow === 'plan' ? 'Planning Summary' : 'Execution Summary';
  const lines = [
    `=== ${title} ===`,
    `Start Time: ${summary.start_time}`,
    `End Time: ${summary.end_time ?? 'N/A'}`,
    `Duration: ${formatElapsed(summary.start_time, summary.end_time)}`,
  ];
  if (summary.workflow === 'plan') {
    lines.push(`Planner Invocations: ${summary.planner_invocations}`);
  } else {
    lines.push(`Worker Invocations: ${summary.worker_invocations}`);
  }
  lines.push(
    `Reviewer Invocations: ${summary.reviewer_invocations}`,
    `Revision Cycles: ${summary.revision_cycles}`,
  );
  if (summary.workflow === 'execute') {
    lines.push(`Steps Completed: ${summary.steps_completed}/${summary.total_steps}`);
  }
  lines.push(
    `Final State: ${summary.final_state ?? 'N/A'}`,
    `Outcome: ${summary.outcome ?? 'N/A'}`,
    '='.repeat(title.length + 8),
  );
  return lines.join('\n');
}

/** Elapsed time as H:MM:SS. */
export function formatElapsed(start: string, end: string | null): string {
  if (!end) return 'N/A';
  const ms = new Date(end).getTime() - new Date(start).getTime();
  if (!Number.isFinite(ms) || ms < 0) return 'N/A';
  const totalSecs = Math.floor(ms / 1000);
  const hours = Math.floor(totalSecs / 3600);
  const mins = Math.floor((totalSecs % 3600) / 60);
  const secs = totalSecs % 60;
  return `${hours}:${String(mins).padStart(2, '0')}:${String(secs).padStart(2, '0')}`;
}
