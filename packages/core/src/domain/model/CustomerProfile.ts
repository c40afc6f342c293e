/** Sentiment labels assigned by the enrichment stage. */
export const Sentiment = {
  POSITIVE: 'Positive',
  NEGATIVE: 'Negative',
  NEUTRAL: 'Neutral',
  UNKNOWN: 'Unknown',
} as const;

export type Sentiment = (typeof Sentiment)[keyof typeof Sentiment];

/** Consolidated, one-row-per-customer view. */
export interface CustomerProfile {
  readonly CustomerID: string;
  readonly Name: string;
  readonly City: string;
  readonly TotalSpend: number;
  readonly PurchaseCount: number;
  /** Latest purchase date as `YYYY-MM-DD`. */
  readonly LastPurchaseDate: string;
  readonly AvgRating: number;
  readonly FeedbackCount: number;
  readonly Sentiment: Sentiment;
}
