import type {
  EventBus,
  ObjectStore,
  QualityCounterStore,
  QualityCounts,
  QualityScore,
  ScoreMode,
} from '@customer360/core';
import { computeQualityScore, errorMessage } from '@customer360/core';
import type { FormatRegistry } from '../../domain/services/FormatRegistry.js';

export interface AggregateQualityScoreDeps {
  readonly store: ObjectStore;
  readonly counters: QualityCounterStore;
  readonly registry: FormatRegistry;
  readonly eventBus: EventBus;
}

export interface AggregateQualityScoreOptions {
  readonly mode: ScoreMode;
  readonly acceptedPrefix: string;
  readonly rejectedPrefix: string;
}

/**
 * Use case: compute the corpus-wide quality score after a file was partitioned.
 *
 * In `incremental` mode the file's counters replace any earlier counters for
 * the same file. In `rescan` mode every stored partition is read again; the
 * current file's partitions are already stored at that point.
 */
export class AggregateQualityScore {
  constructor(
    private readonly deps: AggregateQualityScoreDeps,
    private readonly options: AggregateQualityScoreOptions,
  ) {}

  async execute(bucket: string, sourceKey: string, fileCounts: QualityCounts): Promise<QualityScore> {
    const totals =
      this.options.mode === 'incremental'
        ? await this.deps.counters.recordFile(`${bucket}/${sourceKey}`, fileCounts)
        : await this.rescan(bucket);

    const quality = computeQualityScore(totals.accepted, totals.rejected);
    this.deps.eventBus.emit({ type: 'quality:computed', mode: this.options.mode, quality, timestamp: Date.now() });
    return quality;
  }

  /**
   * Re-read every partition. Accepted partitions count the records that still
   * validate; rejected partitions count every record they hold.
   */
  async rescan(bucket: string): Promise<QualityCounts> {
    let accepted = 0;
    let rejected = 0;

    for (const key of await this.deps.store.list(bucket, this.options.acceptedPrefix)) {
      const outcome = await this.readPartition(bucket, key);
      if (outcome) accepted += outcome.accepted;
    }

    for (const key of await this.deps.store.list(bucket, this.options.rejectedPrefix)) {
      const outcome = await this.readPartition(bucket, key);
      if (outcome) rejected += outcome.accepted + outcome.rejected;
    }

    return { accepted, rejected };
  }

  private async readPartition(bucket: string, key: string): Promise<QualityCounts | null> {
    const binding = this.deps.registry.forKey(key);
    if (!binding) return null;

    try {
      const items = binding.codec.parse(await this.deps.store.get(bucket, key));
      const outcome = binding.validator.partition(items);
      return { accepted: outcome.accepted.length, rejected: outcome.rejected.length };
    } catch (error) {
      this.deps.eventBus.emit({
        type: 'file:failed',
        bucket,
        key,
        error: errorMessage(error),
        timestamp: Date.now(),
      });
      return null;
    }
  }
}
