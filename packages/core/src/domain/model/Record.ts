import type { ValidationError } from './ValidationResult.js';

/** The three record streams handled by the pipeline. */
export const RecordKind = {
  CUSTOMER: 'customer',
  PURCHASE: 'purchase',
  FEEDBACK: 'feedback',
} as const;

export type RecordKind = (typeof RecordKind)[keyof typeof RecordKind];

/** A key-value record as parsed from the source data. */
export interface RawRecord {
  readonly [key: string]: unknown;
}

/** Customer profile record after validation. Extra source fields are carried through untouched. */
export interface CustomerRecord extends RawRecord {
  readonly CustomerID: string;
  readonly Name: string;
  readonly City: string;
}

/** Purchase transaction after validation. `Amount` is numeric, `Date` is `YYYY-MM-DD`. */
export interface PurchaseRecord extends RawRecord {
  readonly CustomerID: string;
  readonly Product: string;
  readonly Amount: number;
  readonly Date: string;
}

/** Feedback entry after validation. `Rating` is an integer in [1, 5]. */
export interface FeedbackRecord extends RawRecord {
  readonly CustomerID: string;
  readonly Rating: number;
  readonly Feedback: string;
}

/** Maps each record kind to its typed shape. */
export interface TypedRecordMap {
  readonly customer: CustomerRecord;
  readonly purchase: PurchaseRecord;
  readonly feedback: FeedbackRecord;
}

/** Outcome of validating a single record. */
export type RecordStatus = 'accepted' | 'rejected';

/** A record enriched with its validation outcome. */
export interface ProcessedRecord<T extends RawRecord = RawRecord> {
  /** Zero-based index of this record in the source file. */
  readonly index: number;
  /** Original key-value data as parsed from the source. */
  readonly raw: RawRecord;
  readonly status: RecordStatus;
  /** Validation errors (populated when `status` is `'rejected'`). */
  readonly errors: readonly ValidationError[];
  /** Typed record, present only for accepted records. */
  readonly parsed?: T;
}

/** Build an accepted record carrying its typed form. */
export function acceptRecord<T extends RawRecord>(index: number, raw: RawRecord, parsed: T): ProcessedRecord<T> {
  return { index, raw, status: 'accepted', errors: [], parsed };
}

/** Build a rejected record with the errors that caused the rejection. */
export function rejectRecord<T extends RawRecord = RawRecord>(
  index: number,
  raw: RawRecord,
  errors: readonly ValidationError[],
): ProcessedRecord<T> {
  return { index, raw, status: 'rejected', errors };
}

/** Check whether every value in a raw record is empty (`undefined`, `null`, or `''`). */
export function isEmptyRow(record: RawRecord): boolean {
  return Object.values(record).every((v) => v === undefined || v === null || v === '');
}
