export type SignalValidationCode =
  | 'UNRECOGNIZED_FORMAT'
  | 'INVALID_SYMBOL'
  | 'INVALID_NUMBER'
  | 'INVALID_QUANTITY'
  | 'INVALID_EXPIRATION'
  | 'EXPIRED'
  | 'INCONSISTENT_PRICES'
  | 'MISSING_OPTION_FIELDS'
  | 'SCHEMA_MISMATCH';

export class SignalValidationError extends Error {
  readonly code: SignalValidationCode;

  constructor(code: SignalValidationCode, message: string) {
    super(message);
    this.name = 'SignalValidationError';
    this.code = code;
  }
}

/**
 * Raised when bookkeeping reaches a state that correct code never produces,
 * such as committing the same signal twice. Never caught by the pipeline.
 */
export class InvariantViolationError extends Error {
  readonly context: Record<string, unknown>;

  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message);
    this.name = 'InvariantViolationError';
    this.context = context;
  }
}
