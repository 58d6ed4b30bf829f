/**
 * Error classes for relayloop.
 *
 * Every error the loop raises on purpose is a LoopError carrying a stable
 * code and the process exit code the CLI should use.
 */

import { ERROR_CODE_EXIT_MAP, type LoopErrorCodeType } from '../../lib/types.js';

export class LoopError extends Error {
  constructor(
    message: string,
    public readonly code: LoopErrorCodeType,
    public readonly exitCode: number = ERROR_CODE_EXIT_MAP[code],
  ) {
    super(message);
    this.name = 'LoopError';
  }

  /** Whether RetryPolicy may attempt the failed operation again. */
  get retryable(): boolean {
    return false;
  }
}

/** Artifact read/write failure. Always fatal. */
export class StateFileError extends LoopError {
  constructor(message: string, code: 'E_STATE_FILE' | 'E_PLAN_INVALID' = 'E_STATE_FILE') {
    super(message, code);
    this.name = 'StateFileError';
  }
}

/** Agent process exited non-zero or ran past its timeout. */
export class InvocationError extends LoopError {
  constructor(
    message: string,
    public readonly kind: 'ProcessError' | 'Timeout',
  ) {
    super(message, kind === 'Timeout' ? 'E_AGENT_TIMEOUT' : 'E_AGENT_FAILED');
    this.name = 'InvocationError';
  }

  override get retryable(): boolean {
    return true;
  }
}

/** More human input is needed before the loop can continue. */
export class BlockedError extends LoopError {
  constructor(message: string) {
    super(message, 'E_BLOCKED');
    this.name = 'BlockedError';
  }
}

/** Bad input caught before any invocation. */
export class ValidationError extends LoopError {
  constructor(message: string, code: 'E_VALIDATION' | 'E_CONFIG_INVALID' = 'E_VALIDATION') {
    super(message, code);
    this.name = 'ValidationError';
  }
}

/** Error message of any thrown value. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
