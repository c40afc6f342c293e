import type { QualityCounts } from '../model/QualityScore.js';

/**
 * Port for incrementally maintained data-quality counters.
 *
 * Counters are stored per source file so that replaying a file replaces its
 * contribution instead of adding to it.
 */
export interface QualityCounterStore {
  /** Set the counters of `fileKey` and return the corpus totals after the update. */
  recordFile(fileKey: string, counts: QualityCounts): Promise<QualityCounts>;
  /** Corpus totals over every recorded file. */
  totals(): Promise<QualityCounts>;
}
