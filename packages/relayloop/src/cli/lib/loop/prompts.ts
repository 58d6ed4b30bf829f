/**
 * Prompt assembly for relay roles.
 *
 * Builds prompts for: planner, plan reviewer, step worker, step reviewer.
 * File names are given relative to the working directory the agent runs in.
 */

import { basename } from 'node:path';

import { APPROVED_MARKER, REWORK_MARKER } from '../../../lib/paths.js';
import type { PlanArtifacts, StepArtifacts } from '../../../lib/paths.js';
import type { Step } from '../../../lib/types.js';

const NO_PROBLEM = '(No problem statement provided)';

/**
 * Build prompt for the planner, fresh or revising against review feedback.
 */
export function buildPlannerPrompt(opts: {
  session: string;
  problemStatement: string;
  paths: PlanArtifacts;
  reviewFeedback?: string;
}): string {
  const draft = basename(opts.paths.draft);
  const stuck = basename(opts.paths.stuck);
  const feedback = opts.reviewFeedback
    ? `## Review Feedback

The reviewer rejected the current draft in \`${draft}\`. Revise it and address every point:

${opts.reviewFeedback}

`
    : '';

  return `${feedback}You are a planning agent. Break the problem below into an ordered plan of small, self-contained steps for plan "${opts.session}".

## Problem Statement

${opts.problemStatement.trim() || NO_PROBLEM}

## Rules

- Planning only: read the codebase, do NOT modify source files or run builds.
- If \`${draft}\` exists, start from it instead of from scratch.
- Each step must be specific (semantic code locations, no line numbers), fit in one focused session, state its boundaries, and leave the build and tests passing.

## Output Format

Write the plan to \`${draft}\`. Every step MUST be one block:

\`\`\`markdown
---STEP_BLOCK---
### Step N: Brief Title

**Description**: what to change and where
**Success Criteria**: commands and checks that prove the step is done
**Dependencies**: earlier steps this needs, or "None"
---END_STEP_BLOCK---
\`\`\`

Number steps 1, 2, 3, ... with no gaps or duplicates.

## Insufficient Information

If the problem statement is too vague to plan, do NOT write \`${draft}\`. Write your questions to \`${stuck}\` instead and stop.`;
}

/**
 * Build prompt for the plan reviewer.
 */
export function buildPlanReviewerPrompt(opts: {
  session: string;
  problemStatement: string;
  paths: PlanArtifacts;
}): string {
  const draft = basename(opts.paths.draft);

  return `You are a plan reviewer for plan "${opts.session}". Read \`${draft}\` and judge it against the problem below.

## Problem Statement

${opts.problemStatement.trim() || NO_PROBLEM}

## Checklist

- Every step is a ---STEP_BLOCK--- ... ---END_STEP_BLOCK--- block headed "### Step N: Title", numbered 1..N without gaps.
- Every step has Description, Success Criteria and Dependencies.
- Steps reference real files and symbols, have clear boundaries and keep the build green.

Do NOT modify the plan or any source file.

## Verdict

- Approved: write \`${basename(opts.paths.final)}\` starting with "${APPROVED_MARKER}", followed by why the plan is ready.
- Needs revision: write \`${basename(opts.paths.review)}\` with the specific issues and how to fix them.`;
}

/**
 * Build prompt for a worker implementing one step.
 */
export function buildWorkerPrompt(opts: {
  session: string;
  step: Step;
  paths: StepArtifacts;
  reviewFeedback?: string;
}): string {
  const { stepNum } = opts.step;
  const feedback = opts.reviewFeedback
    ? `## Rework Required

The reviewer found problems with your previous attempt. Address ALL of them:

${opts.reviewFeedback}

---

`
    : '';

  return `${feedback}You are implementing Step ${stepNum} of plan "${opts.session}". Work ONLY on this step.

## Step ${stepNum}

${opts.step.description}

## When Done

Write a summary to \`${basename(opts.paths.work)}\`:
- What was accomplished
- Files modified
- Tests run and their results
- Issues encountered

## What NOT to Do

- Do NOT start other steps
- Do NOT mark the step approved — a reviewer verifies it
- Do NOT make changes outside this step's scope

If the step cannot be done without more information, write your questions to \`${basename(opts.paths.stuck)}\` and stop.`;
}

/**
 * Build prompt for the reviewer verifying one step.
 */
export function buildStepReviewerPrompt(opts: {
  session: string;
  step: Step;
  paths: StepArtifacts;
  workContent: string;
}): string {
  const { stepNum } = opts.step;
  const criteria = opts.step.successCriteria
    ? `\n## Success Criteria\n\n${opts.step.successCriteria}\n`
    : '';

  return `You are reviewing Step ${stepNum} of plan "${opts.session}". Evaluate only; do NOT change code.

## Step ${stepNum}

${opts.step.description}
${criteria}
## Work Reported

${opts.workContent}

## Verdict

Write your assessment to \`${basename(opts.paths.review)}\`:
- Approved: first line "${APPROVED_MARKER}", then the verification you did.
- Rework: first line "${REWORK_MARKER}", then each issue and how to fix it.`;
}

// =============================================================================
// Fallback Artifacts
// =============================================================================

/** Work artifact written when the worker times out. */
export function buildWorkerTimeoutArtifact(step: Step, timeoutMs: number): string {
  return `Worker timed out after ${Math.round(timeoutMs / 1000)} seconds while working on this step.

This likely means the step is too complex or unclear. The step should be:
1. Broken down into smaller substeps, or
2. Clarified with more specific requirements

Original step description:
${step.description}
`;
}

/** Review artifact written when the reviewer times out. Starts with the rework marker. */
export function buildReviewerTimeoutArtifact(paths: StepArtifacts, timeoutMs: number): string {
  return `${REWORK_MARKER}

Reviewer timed out after ${Math.round(timeoutMs / 1000)} seconds while trying to verify your work.

**ACTION REQUIRED:**
1. Check \`${basename(paths.work)}\`: does it clearly describe what you did?
2. Verify the code works (run the tests, check it compiles)
3. Make sure every part of the step description is done
4. If the step is too complex, say so and describe a smaller split

**Common causes of reviewer timeout:**
- The work summary is vague or missing details
- Bugs that make the reviewer investigate deeply
- Failing or missing tests
`;
}

/**
 * Review feedback for the worker, with the status marker removed from
 * the first line.
 */
export function stripReviewMarker(content: string): string {
  const [first = '', ...rest] = content.split(/\r?\n/);
  const cleaned = first.includes(REWORK_MARKER)
    ? first.replace(REWORK_MARKER, '').replace(/^[\s:\-—]+/, '')
    : first;
  return [cleaned, ...rest].join('\n').trim();
}
