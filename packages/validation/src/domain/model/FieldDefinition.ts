/**
 * Supported field types.
 *
 * - `string`: a string that is not blank after trimming.
 * - `numeric-string`: digits only after trimming (numbers are stringified first).
 * - `number`: a finite number, or a string that parses to one.
 * - `integer`: a whole number, or a string holding one.
 * - `date`: a `YYYY-MM-DD` string naming a real calendar day.
 */
export type FieldType = 'string' | 'numeric-string' | 'number' | 'integer' | 'date';

/** Defines a single field of a record schema. */
export interface FieldDefinition {
  /** Field name as it appears in the source data. */
  readonly name: string;
  readonly type: FieldType;
  /** When `true`, the field must be present and non-blank. */
  readonly required: boolean;
  /** Inclusive lower bound for `number` / `integer` fields. */
  readonly min?: number;
  /** Inclusive upper bound for `number` / `integer` fields. */
  readonly max?: number;
  /** Exclusive lower bound for `number` / `integer` fields (e.g. `0` for "positive"). */
  readonly greaterThan?: number;
}
