import type { RawRecord, ValidationResult, ValidationError, ProcessedRecord } from '@customer360/core';
import { validResult, invalidResult, acceptRecord, rejectRecord, errorMessage } from '@customer360/core';
import type { RecordSchema } from '../model/RecordSchema.js';
import { ValidatedFields } from '../model/RecordSchema.js';
import type { FieldDefinition } from '../model/FieldDefinition.js';
import type { ParsedItem } from '../ports/RecordCodec.js';

const DIGITS = /^\d+$/;
const INTEGER = /^[+-]?\d+$/;
const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

type FieldCheck = { readonly ok: true; readonly value: string | number } | { readonly ok: false; readonly error: ValidationError };

/** Accepted and rejected records of one file, each side in source order. */
export interface ValidationOutcome<T extends RawRecord> {
  readonly accepted: readonly ProcessedRecord<T>[];
  readonly rejected: readonly ProcessedRecord<T>[];
}

/**
 * Domain service that classifies records against a schema.
 *
 * Never throws for record content: an exception while evaluating a rule turns
 * into a `MALFORMED_RECORD` error on that record only.
 */
export class RecordValidator<T extends RawRecord> {
  constructor(private readonly schema: RecordSchema<T>) {}

  get kind(): RecordSchema<T>['kind'] {
    return this.schema.kind;
  }

  /** Validate a record against all field definitions. Returns one error per failing field. */
  validate(record: RawRecord): ValidationResult<T> {
    try {
      const errors: ValidationError[] = [];
      const values = new Map<string, string | number>();

      for (const field of this.schema.fields) {
        const value = record[field.name];
        if (isBlank(value)) {
          if (field.required) {
            errors.push({ field: field.name, message: `Field '${field.name}' is required`, code: 'REQUIRED', value });
          }
          continue;
        }

        const check = this.checkField(field, value);
        if (check.ok) {
          values.set(field.name, check.value);
        } else {
          errors.push(check.error);
        }
      }

      if (errors.length > 0) return invalidResult(errors);
      return validResult(this.schema.build(record, new ValidatedFields(values)));
    } catch (error) {
      return invalidResult([
        { field: '*', message: `Record could not be evaluated: ${errorMessage(error)}`, code: 'MALFORMED_RECORD' },
      ]);
    }
  }

  /** Split parsed items into accepted and rejected records, preserving order within each side. */
  partition(items: readonly ParsedItem[]): ValidationOutcome<T> {
    const accepted: ProcessedRecord<T>[] = [];
    const rejected: ProcessedRecord<T>[] = [];

    items.forEach((item, index) => {
      if (item.malformed !== undefined) {
        rejected.push(
          rejectRecord<T>(index, item.raw, [{ field: '*', message: item.malformed, code: 'MALFORMED_RECORD' }]),
        );
        return;
      }

      const result = this.validate(item.raw);
      if (result.isValid && result.parsed !== undefined) {
        accepted.push(acceptRecord(index, item.raw, result.parsed));
      } else {
        rejected.push(rejectRecord<T>(index, item.raw, result.errors));
      }
    });

    return { accepted, rejected };
  }

  private checkField(field: FieldDefinition, value: unknown): FieldCheck {
    switch (field.type) {
      case 'string':
        if (typeof value !== 'string') return this.fail(field, value, 'TYPE_MISMATCH', 'must be text');
        return { ok: true, value: value.trim() };

      case 'numeric-string': {
        if (typeof value !== 'string' && typeof value !== 'number') {
          return this.fail(field, value, 'TYPE_MISMATCH', 'must be numeric');
        }
        const text = String(value).trim();
        if (!DIGITS.test(text)) return this.fail(field, value, 'TYPE_MISMATCH', 'must contain digits only');
        return { ok: true, value: text };
      }

      case 'number': {
        const n = toNumber(value);
        if (n === null) return this.fail(field, value, 'TYPE_MISMATCH', 'must be a number');
        return this.checkRange(field, value, n);
      }

      case 'integer': {
        const n = toInteger(value);
        if (n === null) return this.fail(field, value, 'TYPE_MISMATCH', 'must be an integer');
        return this.checkRange(field, value, n);
      }

      case 'date':
        if (typeof value !== 'string' || !isCalendarDate(value.trim())) {
          return this.fail(field, value, 'PATTERN_MISMATCH', 'must be a date formatted YYYY-MM-DD');
        }
        return { ok: true, value: value.trim() };
    }
  }

  private checkRange(field: FieldDefinition, raw: unknown, n: number): FieldCheck {
    if (field.greaterThan !== undefined && !(n > field.greaterThan)) {
      return this.fail(field, raw, 'OUT_OF_RANGE', `must be greater than ${String(field.greaterThan)}`);
    }
    if (field.min !== undefined && n < field.min) {
      return this.fail(field, raw, 'OUT_OF_RANGE', `must be at least ${String(field.min)}`);
    }
    if (field.max !== undefined && n > field.max) {
      return this.fail(field, raw, 'OUT_OF_RANGE', `must be at most ${String(field.max)}`);
    }
    return { ok: true, value: n };
  }

  private fail(
    field: FieldDefinition,
    value: unknown,
    code: ValidationError['code'],
    reason: string,
  ): FieldCheck {
    return { ok: false, error: { field: field.name, message: `Field '${field.name}' ${reason}`, code, value } };
  }
}

function isBlank(value: unknown): boolean {
  return value === undefined || value === null || (typeof value === 'string' && value.trim() === '');
}

function toNumber(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value !== 'string') return null;
  const n = Number(value.trim());
  return Number.isFinite(n) ? n : null;
}

function toInteger(value: unknown): number | null {
  if (typeof value === 'number') return Number.isInteger(value) ? value : null;
  if (typeof value !== 'string' || !INTEGER.test(value.trim())) return null;
  return Number.parseInt(value.trim(), 10);
}

function isCalendarDate(text: string): boolean {
  const match = ISO_DATE.exec(text);
  if (!match) return false;
  const [, y, m, d] = match;
  const year = Number(y);
  const month = Number(m);
  const day = Number(d);
  const date = new Date(Date.UTC(year, month - 1, day));
  return date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day;
}
