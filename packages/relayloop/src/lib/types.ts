/**
 * Zod schemas and TypeScript types for the relay loop.
 *
 * Pure types with no CLI or Node dependencies.
 */

import { z } from 'zod';

// =============================================================================
// Workflows, Roles, States
// =============================================================================

export const WorkflowKind = z.enum(['plan', 'execute']);
export type WorkflowKindType = z.infer<typeof WorkflowKind>;

export const Role = z.enum(['planner', 'reviewer', 'worker']);
export type RoleType = z.infer<typeof Role>;

export const PlanState = z.enum(['initial', 'draft_ready', 'review_ready', 'stuck', 'done']);
export type PlanStateType = z.infer<typeof PlanState>;

export const StepState = z.enum([
  'initial',
  'work_done',
  'review_done',
  'needs_rework',
  'blocked',
  'approved',
]);
export type StepStateType = z.infer<typeof StepState>;

// =============================================================================
// Error Codes
// =============================================================================

export const LoopErrorCode = z.enum([
  'E_VALIDATION',
  'E_CONFIG_INVALID',
  'E_STATE_FILE',
  'E_PLAN_INVALID',
  'E_AGENT_FAILED',
  'E_AGENT_TIMEOUT',
  'E_BLOCKED',
  'E_MAX_ITERATIONS',
  'E_INTERNAL',
]);
export type LoopErrorCodeType = z.infer<typeof LoopErrorCode>;

/** Maps error codes to CLI exit codes */
export const ERROR_CODE_EXIT_MAP: Record<LoopErrorCodeType, number> = {
  E_VALIDATION: 2,
  E_CONFIG_INVALID: 2,
  E_STATE_FILE: 2,
  E_PLAN_INVALID: 2,
  E_AGENT_FAILED: 2,
  E_AGENT_TIMEOUT: 2,
  E_BLOCKED: 3,
  E_MAX_ITERATIONS: 1,
  E_INTERNAL: 2,
};

// =============================================================================
// Outcomes
// =============================================================================

export const Outcome = z.enum(['success', 'failure', 'blocked', 'max_iterations']);
export type OutcomeType = z.infer<typeof Outcome>;

export const OUTCOME_EXIT_MAP: Record<OutcomeType, number> = {
  success: 0,
  max_iterations: 1,
  failure: 2,
  blocked: 3,
};

// =============================================================================
// Agent Result
// =============================================================================

export const AgentResultSchema = z.object({
  status: z.enum(['success', 'failure', 'timeout']),
  exitCode: z.number().int(),
  duration: z.number(),
});
export type AgentResult = z.infer<typeof AgentResultSchema>;

export interface InvokeOptions {
  role: RoleType;
  prompt: string;
  workdir: string;
  timeout: number;
  /** Drop the non-interactive flag so a human can take over. */
  interactive: boolean;
}

export interface AgentBackend {
  name: string;
  invoke(opts: InvokeOptions): Promise<AgentResult>;
}

// =============================================================================
// Plan Steps
// =============================================================================

export const StepSchema = z.object({
  stepNum: z.number().int().positive(),
  description: z.string(),
  successCriteria: z.string(),
});
export type Step = z.infer<typeof StepSchema>;

// =============================================================================
// Summaries
// =============================================================================

const SummaryBase = z.object({
  start_time: z.string(),
  end_time: z.string().nullable(),
  reviewer_invocations: z.number().int().min(0),
  revision_cycles: z.number().int().min(0),
  outcome: Outcome.nullable(),
});

export const PlanSummarySchema = SummaryBase.extend({
  workflow: z.literal('plan'),
  planner_invocations: z.number().int().min(0),
  final_state: PlanState.nullable(),
});
export type PlanSummary = z.infer<typeof PlanSummarySchema>;

export const ExecutionSummarySchema = SummaryBase.extend({
  workflow: z.literal('execute'),
  worker_invocations: z.number().int().min(0),
  steps_completed: z.number().int().min(0),
  total_steps: z.number().int().min(0),
  final_state: StepState.nullable(),
});
export type ExecutionSummary = z.infer<typeof ExecutionSummarySchema>;

export const RunSummarySchema = z.discriminatedUnion('workflow', [
  PlanSummarySchema,
  ExecutionSummarySchema,
]);
export type RunSummary = z.infer<typeof RunSummarySchema>;

// =============================================================================
// Events (JSONL)
// =============================================================================

const EventBase = z.object({
  v: z.literal(1),
  ts: z.string(),
});

export const LoopEventSchema = z.discriminatedUnion('event', [
  EventBase.extend({
    event: z.literal('run_started'),
    workflow: WorkflowKind,
    session: z.string(),
  }),
  EventBase.extend({
    event: z.literal('state_detected'),
    state: z.string(),
    step: z.number().int().optional(),
    iteration: z.number().int(),
    forced: z.boolean(),
  }),
  EventBase.extend({
    event: z.literal('agent_invoked'),
    role: Role,
    attempt: z.number().int(),
    step: z.number().int().optional(),
    interactive: z.boolean(),
  }),
  EventBase.extend({
    event: z.literal('agent_finished'),
    role: Role,
    attempt: z.number().int(),
    status: z.enum(['success', 'failure', 'timeout']),
    exit_code: z.number().int(),
    duration_ms: z.number(),
  }),
  EventBase.extend({
    event: z.literal('fallback_written'),
    role: Role,
    path: z.string(),
  }),
  EventBase.extend({
    event: z.literal('step_approved'),
    step: z.number().int(),
  }),
  EventBase.extend({
    event: z.literal('run_finished'),
    outcome: Outcome,
    exit_code: z.number().int(),
  }),
  EventBase.extend({
    event: z.literal('run_error'),
    code: LoopErrorCode,
    message: z.string(),
  }),
]);
export type LoopEvent = z.infer<typeof LoopEventSchema>;

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

/** Event payload without the envelope fields the logger fills in. */
export type LoopEventInput = DistributiveOmit<LoopEvent, 'v' | 'ts'>;
