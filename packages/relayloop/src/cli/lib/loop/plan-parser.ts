/**
 * Step-block parser for plan files.
 *
 * A plan carries its steps in delimited blocks:
 *
 *   ---STEP_BLOCK---
 *   ### Step 1: Title
 *   ...body...
 *   **Success Criteria**: ...
 *   ---END_STEP_BLOCK---
 */

import { readFile } from 'node:fs/promises';

import type { Step } from '../../../lib/types.js';
import { StateFileError, errorMessage } from '../errors.js';

const STEP_BLOCK_RE =
  /---STEP_BLOCK---\s*###\s*(?:Step|Microquest)\s*(\d+):[^\n]*\n([\s\S]*?)---END_STEP_BLOCK---/gi;
const SUCCESS_CRITERIA_RE = /\*\*Success Criteria\*\*:\s*([\s\S]*?)(?=\*\*|$)/i;

/**
 * Extract steps from plan text, sorted by step number.
 * Returns an empty list when the text has no step blocks.
 */
export function parsePlan(content: string): Step[] {
  const steps: Step[] = [];
  const seen = new Set<number>();

  for (const match of content.matchAll(STEP_BLOCK_RE)) {
    const stepNum = Number(match[1]);
    const block = match[2] ?? '';

    if (seen.has(stepNum)) {
      throw new StateFileError(`Duplicate step number ${stepNum} found`, 'E_PLAN_INVALID');
    }
    seen.add(stepNum);

    const criteria = SUCCESS_CRITERIA_RE.exec(block);
    steps.push({
      stepNum,
      description: block.trim(),
      successCriteria: criteria?.[1]?.trim() ?? '',
    });
  }

  const missing: number[] = [];
  for (let n = 1; n <= steps.length; n++) {
    if (!seen.has(n)) missing.push(n);
  }
  if (missing.length > 0) {
    const label = missing.length === 1 ? 'step' : 'steps';
    throw new StateFileError(
      `Non-sequential step numbers: missing ${label} ${missing.join(', ')}`,
      'E_PLAN_INVALID',
    );
  }

  return steps.sort((a, b) => a.stepNum - b.stepNum);
}

/** Read and parse a plan file. */
export async function parsePlanFile(planPath: string): Promise<Step[]> {
  let content: string;
  try {
    content = await readFile(planPath, 'utf-8');
  } catch (error) {
    throw new StateFileError(`Failed to read plan file ${planPath}: ${errorMessage(error)}`);
  }
  return parsePlan(content);
}
