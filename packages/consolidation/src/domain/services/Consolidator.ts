import type { CustomerRecord, FeedbackRecord, PurchaseRecord } from '@customer360/core';
import type {
  ConsolidatedRow,
  FeedbackAggregate,
  JoinedPurchase,
  PurchaseAggregate,
} from '../model/ConsolidatedRow.js';
import { dedupeBy, customerKey, purchaseKey, feedbackKey } from './Deduplicator.js';

export interface ConsolidationInput {
  readonly customers: readonly CustomerRecord[];
  readonly purchases: readonly PurchaseRecord[];
  readonly feedback: readonly FeedbackRecord[];
}

export interface ConsolidationResult {
  /** One row per customer and feedback entry, customers in input order. */
  readonly rows: readonly ConsolidatedRow[];
  /** Customers + joined purchases + joined feedback after deduplication. */
  readonly recordCount: number;
  readonly customerCount: number;
  readonly purchaseCount: number;
  readonly feedbackCount: number;
}

/**
 * Deduplicate, join and aggregate the three accepted datasets.
 *
 * Purchases and feedback referencing unknown customers are discarded. A
 * customer appears in `rows` only with at least one purchase and one feedback
 * entry.
 */
export function consolidate(input: ConsolidationInput): ConsolidationResult {
  const customers = dedupeBy(input.customers, customerKey);
  const validIds = new Set(customers.map((c) => c.CustomerID));

  const purchases = dedupeBy(input.purchases, purchaseKey)
    .filter((p) => validIds.has(p.CustomerID))
    .map(toJoinedPurchase);
  const feedback = dedupeBy(input.feedback, feedbackKey).filter((f) => validIds.has(f.CustomerID));

  const purchaseAggregates = aggregatePurchases(purchases);
  const feedbackAggregates = aggregateFeedback(feedback);
  const feedbackByCustomer = groupBy(feedback, (f) => f.CustomerID);

  const rows: ConsolidatedRow[] = [];
  for (const customer of customers) {
    const spend = purchaseAggregates.get(customer.CustomerID);
    const rating = feedbackAggregates.get(customer.CustomerID);
    const entries = feedbackByCustomer.get(customer.CustomerID);
    if (!spend || !rating || !entries) continue;

    for (const entry of entries) {
      rows.push({
        CustomerID: customer.CustomerID,
        Name: customer.Name,
        City: customer.City,
        Feedback: entry.Feedback,
        Rating: entry.Rating,
        ...spend,
        ...rating,
      });
    }
  }

  return {
    rows,
    recordCount: customers.length + purchases.length + feedback.length,
    customerCount: customers.length,
    purchaseCount: purchases.length,
    feedbackCount: feedback.length,
  };
}

function toJoinedPurchase(p: PurchaseRecord): JoinedPurchase {
  const time = Date.parse(`${p.Date}T00:00:00Z`);
  if (Number.isNaN(time)) {
    throw new Error(`Purchase of customer ${p.CustomerID} has an unreadable date '${p.Date}'`);
  }
  return { CustomerID: p.CustomerID, Product: p.Product, Amount: p.Amount, PurchaseRawDate: p.Date, PurchaseDate: time };
}

export function aggregatePurchases(purchases: readonly JoinedPurchase[]): Map<string, PurchaseAggregate> {
  const result = new Map<string, PurchaseAggregate>();
  for (const [customerId, group] of groupBy(purchases, (p) => p.CustomerID)) {
    let total = 0;
    let latest = Number.NEGATIVE_INFINITY;
    for (const p of group) {
      total += p.Amount;
      latest = Math.max(latest, p.PurchaseDate);
    }
    result.set(customerId, {
      TotalSpend: total,
      PurchaseCount: group.length,
      LastPurchaseDate: new Date(latest).toISOString().slice(0, 10),
    });
  }
  return result;
}

export function aggregateFeedback(feedback: readonly FeedbackRecord[]): Map<string, FeedbackAggregate> {
  const result = new Map<string, FeedbackAggregate>();
  for (const [customerId, group] of groupBy(feedback, (f) => f.CustomerID)) {
    const sum = group.reduce((acc, f) => acc + f.Rating, 0);
    result.set(customerId, { AvgRating: sum / group.length, FeedbackCount: group.length });
  }
  return result;
}

function groupBy<T>(items: readonly T[], keyOf: (item: T) => string): Map<string, T[]> {
  const groups = new Map<string, T[]>();
  for (const item of items) {
    const key = keyOf(item);
    const group = groups.get(key);
    if (group) {
      group.push(item);
    } else {
      groups.set(key, [item]);
    }
  }
  return groups;
}
