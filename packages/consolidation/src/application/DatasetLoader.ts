import type { ObjectLocation, ObjectStore, RecordKind, TypedRecordMap } from '@customer360/core';
import type { FormatRegistry } from '@customer360/validation';

/**
 * Reads every accepted partition of one record kind under a location and
 * re-validates it to obtain typed records. Objects with another extension are
 * ignored; a malformed object rejects the whole load.
 */
export class DatasetLoader {
  constructor(
    private readonly store: ObjectStore,
    private readonly registry: FormatRegistry,
  ) {}

  async load<K extends RecordKind>(kind: K, location: ObjectLocation): Promise<TypedRecordMap[K][]> {
    const binding = this.registry.forKind(kind);
    const keys = await this.store.list(location.bucket, location.prefix);
    const records: TypedRecordMap[K][] = [];

    for (const key of keys) {
      if (!key.toLowerCase().endsWith(binding.extension)) continue;

      const items = binding.codec.parse(await this.store.get(location.bucket, key));
      for (const record of binding.validator.partition(items).accepted) {
        if (record.parsed !== undefined) records.push(record.parsed);
      }
    }

    return records;
  }
}
