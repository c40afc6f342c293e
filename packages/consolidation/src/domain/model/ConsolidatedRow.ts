import type { Sentiment } from '@customer360/core';

/** Purchase after the join, with its date carried under collision-free names. */
export interface JoinedPurchase {
  readonly CustomerID: string;
  readonly Product: string;
  readonly Amount: number;
  /** The source `Date` value, `YYYY-MM-DD`. */
  readonly PurchaseRawDate: string;
  /** `PurchaseRawDate` as epoch milliseconds (UTC midnight). */
  readonly PurchaseDate: number;
}

export interface PurchaseAggregate {
  readonly TotalSpend: number;
  readonly PurchaseCount: number;
  /** `YYYY-MM-DD` of the latest purchase. */
  readonly LastPurchaseDate: string;
}

export interface FeedbackAggregate {
  readonly AvgRating: number;
  readonly FeedbackCount: number;
}

/** One customer joined with one of their feedback entries and both aggregates. */
export interface ConsolidatedRow extends PurchaseAggregate, FeedbackAggregate {
  readonly CustomerID: string;
  readonly Name: string;
  readonly City: string;
  readonly Feedback: string;
  readonly Rating: number;
}

export interface EnrichedRow extends ConsolidatedRow {
  readonly Sentiment: Sentiment;
}
