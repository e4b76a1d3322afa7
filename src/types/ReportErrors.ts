/**
 * Report Errors - typed errors for the lifecycle engine and its collaborators
 *
 * error_class tells callers how to react: ARGUMENT and PRECONDITION errors are
 * caller mistakes, STORE errors come from persistence. None are retryable: the
 * engine is deterministic and fails the same way on the same input.
 */

export type ReportErrorClass = 'PRECONDITION' | 'ARGUMENT' | 'STORE';

/**
 * Base report error
 */
export class ReportError extends Error {
  constructor(
    message: string,
    public readonly error_class: ReportErrorClass,
    public readonly error_code: string
  ) {
    super(message);
    this.name = this.constructor.name;
  }
}

/**
 * Precondition violation (e.g. second-to-last payment of a one-payment history)
 */
export class InvalidArgumentError extends ReportError {
  constructor(message: string, errorCode?: string) {
    super(message, 'PRECONDITION', errorCode || 'INVALID_ARGUMENT');
  }
}

/**
 * Invalid report arguments (CLI flags, handler input)
 */
export class ReportArgumentError extends ReportError {
  constructor(message: string, errorCode?: string) {
    super(message, 'ARGUMENT', errorCode || 'INVALID_REPORT_ARGUMENTS');
  }
}

/**
 * Persistence failure or malformed stored record
 */
export class StoreError extends ReportError {
  constructor(message: string, public readonly original_error?: unknown, errorCode?: string) {
    super(message, 'STORE', errorCode || 'STORE_FAILED');
  }
}
