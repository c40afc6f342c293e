import type { QualityCounterStore } from '../../domain/ports/QualityCounterStore.js';
import type { QualityCounts } from '../../domain/model/QualityScore.js';
import { sumCounts } from '../../domain/model/QualityScore.js';

/** Non-persistent per-file counters. */
export class InMemoryQualityCounterStore implements QualityCounterStore {
  private readonly files = new Map<string, QualityCounts>();

  recordFile(fileKey: string, counts: QualityCounts): Promise<QualityCounts> {
    this.files.set(fileKey, { accepted: counts.accepted, rejected: counts.rejected });
    return this.totals();
  }

  totals(): Promise<QualityCounts> {
    return Promise.resolve(sumCounts(this.files.values()));
  }
}
