/**
 * relayloop - drive a coding-agent CLI through planner ⇄ reviewer and
 * worker ⇄ reviewer loops, with the filesystem as the only state.
 */

export const VERSION = '0.1.0';

// Types and schemas
export * from './lib/types.js';
export {
  RelayConfigSchema,
  parseRelayConfig,
  parseDuration,
  DEFAULT_TRUST_TOOLS,
  type RelayConfig,
  type RelayConfigInput,
} from './lib/config.js';
export {
  APPROVED_MARKER,
  REWORK_MARKER,
  CONFIG_FILENAME,
  isValidSessionName,
  planArtifacts,
  stepArtifacts,
  executionSummaryPath,
  executionEventsPath,
  type PlanArtifacts,
  type StepArtifacts,
} from './lib/paths.js';

// Errors
export {
  LoopError,
  StateFileError,
  InvocationError,
  BlockedError,
  ValidationError,
} from './cli/lib/errors.js';

// Engine
export { parsePlan, parsePlanFile } from './cli/lib/loop/plan-parser.js';
export {
  capturePlanSnapshot,
  captureStepSnapshot,
  detectPlanState,
  detectStepState,
  type PlanSnapshot,
  type StepSnapshot,
} from './cli/lib/loop/state-detector.js';
export { retry, RETRY_DELAY_MS, type RetryOptions, type RetryResult } from './cli/lib/loop/retry.js';
export {
  createLoopContext,
  runTurn,
  runWorkflow,
  type LoopContext,
  type LoopContextOptions,
  type RunResult,
} from './cli/lib/loop/engine.js';
export { runPlanning, type PlanningOptions } from './cli/lib/loop/planning.js';
export { runExecution, loadPlanSteps } from './cli/lib/loop/execution.js';
export { collectStatus, type SessionStatus } from './cli/lib/loop/status.js';
export { SummaryRecorder, formatSummary } from './cli/lib/loop/summary.js';
export { EventLogger } from './cli/lib/loop/events.js';
export { createConsoleReporter, type ConsoleReporter } from './cli/lib/loop/console-reporter.js';

// Backends
export { ChatBackend, type ChatBackendOptions } from './cli/lib/loop/backends/chat.js';
export { SubprocessBackend } from './cli/lib/loop/backends/subprocess.js';
export { createAgentBackend } from './cli/lib/loop/backends/detect.js';
export { loadConfig } from './cli/lib/config-loader.js';
