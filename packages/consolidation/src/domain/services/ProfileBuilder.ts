import type { CustomerProfile } from '@customer360/core';
import type { EnrichedRow } from '../model/ConsolidatedRow.js';
import { resolveSentiment } from './SentimentProtocol.js';

/** Collapse enriched rows into one profile per customer, in first-seen order. */
export function buildProfiles(rows: readonly EnrichedRow[]): CustomerProfile[] {
  const groups = new Map<string, EnrichedRow[]>();
  for (const row of rows) {
    const group = groups.get(row.CustomerID);
    if (group) {
      group.push(row);
    } else {
      groups.set(row.CustomerID, [row]);
    }
  }

  const profiles: CustomerProfile[] = [];
  for (const group of groups.values()) {
    const [first] = group;
    if (!first) continue;
    profiles.push({
      CustomerID: first.CustomerID,
      Name: first.Name,
      City: first.City,
      TotalSpend: first.TotalSpend,
      PurchaseCount: first.PurchaseCount,
      LastPurchaseDate: first.LastPurchaseDate,
      AvgRating: first.AvgRating,
      FeedbackCount: first.FeedbackCount,
      Sentiment: resolveSentiment(group.map((row) => row.Sentiment)),
    });
  }
  return profiles;
}
