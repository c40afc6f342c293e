import type { CustomerProfile } from '@customer360/core';
import { Sentiment } from '@customer360/core';
import type { ProfileRow } from '../models/ProfileModel.js';
import { parseNumeric } from '../utils/parseNumeric.js';

const SENTIMENTS: ReadonlySet<string> = new Set(Object.values(Sentiment));

function isSentiment(value: string): value is Sentiment {
  return SENTIMENTS.has(value);
}

export function toRow(profile: CustomerProfile): ProfileRow {
  return {
    customerId: profile.CustomerID,
    name: profile.Name,
    city: profile.City,
    totalSpend: profile.TotalSpend,
    purchaseCount: profile.PurchaseCount,
    lastPurchaseDate: profile.LastPurchaseDate,
    avgRating: profile.AvgRating,
    feedbackCount: profile.FeedbackCount,
    sentiment: profile.Sentiment,
  };
}

export function toDomain(row: ProfileRow): CustomerProfile {
  return {
    CustomerID: row.customerId,
    Name: row.name,
    City: row.city,
    TotalSpend: parseNumeric(row.totalSpend, 'total_spend'),
    PurchaseCount: row.purchaseCount,
    LastPurchaseDate: row.lastPurchaseDate,
    AvgRating: parseNumeric(row.avgRating, 'avg_rating'),
    FeedbackCount: row.feedbackCount,
    Sentiment: isSentiment(row.sentiment) ? row.sentiment : Sentiment.UNKNOWN,
  };
}
