/**
 * Cooperative cancellation helpers.
 *
 * Call checkSignal before long-running work inside a check so a run-level
 * timeout or cancel is honoured between cluster requests:
 *
 * ```ts
 * checkSignal(signal);
 * const items = await target.client.list(Notebook, { signal });
 * ```
 */

import { ErrorCode } from '../../errors/error-codes';
import { LintError } from '../../errors/lint-error';

export class CheckTimeoutError extends LintError {
  constructor(context?: string) {
    super(ErrorCode.L303_CHECK_TIMEOUT, context);
    this.name = 'CheckTimeoutError';
  }
}

export class CheckCanceledError extends LintError {
  constructor(context?: string) {
    super(ErrorCode.L304_CHECK_CANCELED, context);
    this.name = 'CheckCanceledError';
  }
}

/**
 * True when the abort was caused by AbortSignal.timeout() (or an equivalent
 * reason named TimeoutError).
 */
export function isTimeoutAbort(signal: AbortSignal): boolean {
  const reason: unknown = signal.reason;
  return typeof reason === 'object' && reason !== null && 'name' in reason && reason.name === 'TimeoutError';
}

/**
 * The error a done signal stands for, or undefined while it is live.
 */
export function signalError(signal: AbortSignal | undefined): LintError | undefined {
  if (!signal || !signal.aborted) {
    return undefined;
  }
  return isTimeoutAbort(signal) ? new CheckTimeoutError() : new CheckCanceledError();
}

/**
 * Throw CheckTimeoutError / CheckCanceledError if the signal is done.
 */
export function checkSignal(signal: AbortSignal | undefined): void {
  const err = signalError(signal);
  if (err) {
    throw err;
  }
}
