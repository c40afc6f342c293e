import type { EventBus, ObjectStore, RawRecord, RecordStatus } from '@customer360/core';
import type { RecordCodec } from '../domain/ports/RecordCodec.js';
import type { ValidationOutcome } from '../domain/services/RecordValidator.js';
import type { PartitionRouter } from '../domain/services/PartitionRouter.js';

/** Keys written for one source file. A side with no records has no key. */
export interface WrittenPartitions {
  readonly acceptedKey?: string;
  readonly rejectedKey?: string;
}

/** Writes the accepted and rejected sides of a validated file back in the source format. */
export class PartitionWriter {
  constructor(
    private readonly store: ObjectStore,
    private readonly router: PartitionRouter,
    private readonly eventBus: EventBus,
  ) {}

  async write(
    bucket: string,
    sourceKey: string,
    codec: RecordCodec,
    outcome: ValidationOutcome<RawRecord>,
  ): Promise<WrittenPartitions> {
    const acceptedKey = await this.writeSide(
      bucket,
      sourceKey,
      codec,
      'accepted',
      outcome.accepted.map((r) => r.raw),
    );
    const rejectedKey = await this.writeSide(
      bucket,
      sourceKey,
      codec,
      'rejected',
      outcome.rejected.map((r) => r.raw),
    );

    return {
      ...(acceptedKey !== undefined ? { acceptedKey } : {}),
      ...(rejectedKey !== undefined ? { rejectedKey } : {}),
    };
  }

  private async writeSide(
    bucket: string,
    sourceKey: string,
    codec: RecordCodec,
    outcome: RecordStatus,
    records: readonly RawRecord[],
  ): Promise<string | undefined> {
    if (records.length === 0) return undefined;

    const key = this.router.keyFor(sourceKey, outcome);
    await this.store.put(bucket, key, codec.serialize(records));

    this.eventBus.emit({
      type: 'partition:written',
      bucket,
      key,
      outcome,
      recordCount: records.length,
      timestamp: Date.now(),
    });

    return key;
  }
}
