/**
 * Lint Error - Base error class for the upgrade lint engine
 */

import { ErrorCode, getErrorMessage } from './error-codes';

/**
 * Base error class. The message is rendered as `[code] base message: context`.
 */
export class LintError extends Error {
  public readonly code: ErrorCode;
  public readonly context?: string;
  public readonly details?: Record<string, unknown>;

  constructor(code: ErrorCode, context?: string, details?: Record<string, unknown>) {
    const baseMessage = getErrorMessage(code);
    const fullMessage = context
      ? `[${code}] ${baseMessage}: ${context}`
      : `[${code}] ${baseMessage}`;

    super(fullMessage);
    this.name = 'LintError';
    this.code = code;
    this.context = context;
    this.details = details;

    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * Render any thrown value as a single-line message.
 */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}
