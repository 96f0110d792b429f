/**
 * infrar-transform Errors
 * File-level and run-level failures. Per-call-site problems are SkipRecords, not errors.
 */

export type ErrorCode =
  | 'FATAL_PARSE'
  | 'MISSING_RULE'
  | 'RULE_VALIDATION'
  | 'REWRITE_STATE';

export class TransformError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly originalError?: Error
  ) {
    super(message);
    this.name = 'TransformError';

    if (originalError?.stack) {
      this.stack = `${this.stack}\nCaused by: ${originalError.stack}`;
    }
  }
}

/**
 * Input cannot be tokenized or structured as Python. Aborts that file only.
 */
export class FatalParseError extends TransformError {
  constructor(
    message: string,
    public readonly line: number,
    public readonly column: number
  ) {
    super('FATAL_PARSE', `${message} (line ${line}, column ${column})`);
    this.name = 'FatalParseError';
  }
}

/**
 * A recognized function has no rule for the requested provider.
 * Fatal for the whole provider run.
 */
export class MissingRuleError extends TransformError {
  constructor(
    public readonly functionName: string,
    public readonly provider: string
  ) {
    super('MISSING_RULE', `No transform rule for ${functionName} on provider ${provider}`);
    this.name = 'MissingRuleError';
  }
}

/**
 * A rule source failed schema or coverage validation at load time.
 */
export class RuleValidationError extends TransformError {
  constructor(
    message: string,
    public readonly source?: string
  ) {
    super('RULE_VALIDATION', source ? `${source}: ${message}` : message);
    this.name = 'RuleValidationError';
  }
}

export class RewriteStateError extends TransformError {
  constructor(from: string, to: string) {
    super('REWRITE_STATE', `Illegal rewrite state transition: ${from} -> ${to}`);
    this.name = 'RewriteStateError';
  }
}

export function isTransformError(error: unknown): error is TransformError {
  return error instanceof TransformError;
}
