import type { CustomerRecord, FeedbackRecord, PurchaseRecord } from '@customer360/core';

/** Keep the first record of every natural key, in input order. */
export function dedupeBy<T>(records: readonly T[], keyOf: (record: T) => string): T[] {
  const seen = new Set<string>();
  const unique: T[] = [];
  for (const record of records) {
    const key = keyOf(record);
    if (seen.has(key)) continue;
    seen.add(key);
    unique.push(record);
  }
  return unique;
}

export const customerKey = (c: CustomerRecord): string => c.CustomerID;

export const purchaseKey = (p: PurchaseRecord): string => JSON.stringify([p.CustomerID, p.Product, p.Date]);

export const feedbackKey = (f: FeedbackRecord): string => JSON.stringify([f.CustomerID, f.Feedback]);
