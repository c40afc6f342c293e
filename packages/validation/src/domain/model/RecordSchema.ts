import type { RawRecord, RecordKind } from '@customer360/core';
import type { FieldDefinition } from './FieldDefinition.js';

/** Typed access to the field values a schema has already validated. */
export class ValidatedFields {
  constructor(private readonly values: ReadonlyMap<string, string | number>) {}

  text(name: string): string {
    const value = this.values.get(name);
    if (typeof value !== 'string') {
      throw new Error(`Field '${name}' was not validated as text`);
    }
    return value;
  }

  number(name: string): number {
    const value = this.values.get(name);
    if (typeof value !== 'number') {
      throw new Error(`Field '${name}' was not validated as a number`);
    }
    return value;
  }
}

/** Validation rules for one record kind, plus the mapping to its typed shape. */
export interface RecordSchema<T extends RawRecord> {
  readonly kind: RecordKind;
  /** Ordered list of field definitions. */
  readonly fields: readonly FieldDefinition[];
  /** Build the typed record once every field passed. Extra source fields should be carried over from `raw`. */
  build(raw: RawRecord, fields: ValidatedFields): T;
}
