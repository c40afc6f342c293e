import type { RecordKind, TypedRecordMap } from '@customer360/core';
import type { RecordCodec } from '../ports/RecordCodec.js';
import type { RecordValidator } from './RecordValidator.js';

/** Everything needed to handle one record stream: where it lives, how it is encoded, how it is validated. */
export interface FormatBinding<K extends RecordKind = RecordKind> {
  readonly kind: K;
  /** Lower-case file extension including the dot, e.g. `'.xml'`. */
  readonly extension: string;
  /** Directory below the raw/accepted/rejected prefixes, e.g. `'customer_details'`. */
  readonly directory: string;
  readonly codec: RecordCodec;
  readonly validator: RecordValidator<TypedRecordMap[K]>;
}

export type FormatBindings = { readonly [K in RecordKind]: FormatBinding<K> };

/** Dispatches object keys to their format binding by file extension. */
export class FormatRegistry {
  constructor(private readonly bindings: FormatBindings) {}

  forKind<K extends RecordKind>(kind: K): FormatBindings[K] {
    return this.bindings[kind];
  }

  /** Binding whose extension ends `key` (case-insensitive), or `undefined` for unsupported files. */
  forKey(key: string): FormatBinding | undefined {
    const lower = key.toLowerCase();
    return this.all().find((binding) => lower.endsWith(binding.extension));
  }

  all(): FormatBinding[] {
    return [this.bindings.customer, this.bindings.purchase, this.bindings.feedback];
  }
}
