/** Error codes produced by record validation. */
export type ValidationErrorCode =
  | 'REQUIRED'
  | 'TYPE_MISMATCH'
  | 'PATTERN_MISMATCH'
  | 'OUT_OF_RANGE'
  | 'MALFORMED_RECORD';

/** A single validation error for a specific field. */
export interface ValidationError {
  /** Name of the field that failed validation (`'*'` for record-level problems). */
  readonly field: string;
  /** Human-readable error message. */
  readonly message: string;
  /** Machine-readable error code. */
  readonly code: ValidationErrorCode;
  /** The value that caused the validation failure. */
  readonly value?: unknown;
}

/** Result of validating a single record against its schema. */
export interface ValidationResult<T = Record<string, unknown>> {
  readonly isValid: boolean;
  readonly errors: readonly ValidationError[];
  /** Typed version of the record, present when `isValid` is `true`. */
  readonly parsed?: T;
}

/** Create a passing validation result carrying the typed record. */
export function validResult<T>(parsed: T): ValidationResult<T> {
  return { isValid: true, errors: [], parsed };
}

/** Create a failing validation result with the given errors. */
export function invalidResult<T = Record<string, unknown>>(errors: readonly ValidationError[]): ValidationResult<T> {
  return { isValid: false, errors };
}

/** Flatten errors into a single line, e.g. for rejection reasons in events. */
export function describeErrors(errors: readonly ValidationError[]): string {
  return errors.map((e) => `${e.field}: ${e.message}`).join('; ');
}
