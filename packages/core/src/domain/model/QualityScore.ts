/** Corpus-wide data-quality figures. */
export interface QualityScore {
  readonly acceptedCount: number;
  readonly rejectedCount: number;
  /** Percentage of accepted records (0–100). `0` when no records were seen. */
  readonly score: number;
}

/** Accepted/rejected counters for a single source file or a whole corpus. */
export interface QualityCounts {
  readonly accepted: number;
  readonly rejected: number;
}

export function computeQualityScore(acceptedCount: number, rejectedCount: number): QualityScore {
  const total = acceptedCount + rejectedCount;
  return {
    acceptedCount,
    rejectedCount,
    score: total > 0 ? (acceptedCount / total) * 100 : 0,
  };
}

export function sumCounts(counts: Iterable<QualityCounts>): QualityCounts {
  let accepted = 0;
  let rejected = 0;
  for (const c of counts) {
    accepted += c.accepted;
    rejected += c.rejected;
  }
  return { accepted, rejected };
}
