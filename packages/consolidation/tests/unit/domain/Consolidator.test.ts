import { describe, it, expect } from 'vitest';
import type { CustomerRecord, FeedbackRecord, PurchaseRecord } from '@customer360/core';
import { aggregateFeedback, aggregatePurchases, consolidate } from '../../../src/domain/services/Consolidator.js';
import { dedupeBy, feedbackKey, purchaseKey } from '../../../src/domain/services/Deduplicator.js';

const customers: CustomerRecord[] = [
  { CustomerID: '1', Name: 'Ana', City: 'Lisbon' },
  { CustomerID: '1', Name: 'Duplicate', City: 'Nowhere' },
  { CustomerID: '2', Name: 'Bo', City: 'Porto' },
  { CustomerID: '3', Name: 'Cy', City: 'Faro' },
];

const purchases: PurchaseRecord[] = [
  { CustomerID: '1', Product: 'Book', Amount: 10, Date: '2024-01-05' },
  { CustomerID: '1', Product: 'Pen', Amount: 20, Date: '2024-03-01' },
  { CustomerID: '1', Product: 'Pen', Amount: 99, Date: '2024-03-01' },
  { CustomerID: '2', Product: 'Lamp', Amount: 7, Date: '2024-02-02' },
  { CustomerID: '9', Product: 'Ghost', Amount: 50, Date: '2024-01-01' },
];

const feedback: FeedbackRecord[] = [
  { CustomerID: '1', Rating: 5, Feedback: 'great' },
  { CustomerID: '1', Rating: 1, Feedback: 'terrible' },
  { CustomerID: '1', Rating: 2, Feedback: 'great' },
  { CustomerID: '3', Rating: 4, Feedback: 'ok' },
  { CustomerID: '9', Rating: 2, Feedback: 'orphan' },
];

describe('Deduplicator', () => {
  it('should keep the first record of each key', () => {
    expect(dedupeBy(purchases, purchaseKey).map((p) => p.Amount)).toEqual([10, 20, 7, 50]);
  });

  it('should key feedback by customer and text only', () => {
    expect(dedupeBy(feedback, feedbackKey).map((f) => f.Rating)).toEqual([5, 1, 4, 2]);
  });

  it('should not confuse keys whose fields share separators', () => {
    const a: PurchaseRecord = { CustomerID: '1', Product: 'a|b', Amount: 1, Date: '2024-01-01' };
    const b: PurchaseRecord = { CustomerID: '1|a', Product: 'b', Amount: 1, Date: '2024-01-01' };
    expect(dedupeBy([a, b], purchaseKey)).toHaveLength(2);
  });
});

describe('consolidate', () => {
  it('should emit one row per feedback entry of customers with purchases and feedback', () => {
    const result = consolidate({ customers, purchases, feedback });

    expect(result.rows).toEqual([
      {
        CustomerID: '1',
        Name: 'Ana',
        City: 'Lisbon',
        Feedback: 'great',
        Rating: 5,
        TotalSpend: 30,
        PurchaseCount: 2,
        LastPurchaseDate: '2024-03-01',
        AvgRating: 3,
        FeedbackCount: 2,
      },
      {
        CustomerID: '1',
        Name: 'Ana',
        City: 'Lisbon',
        Feedback: 'terrible',
        Rating: 1,
        TotalSpend: 30,
        PurchaseCount: 2,
        LastPurchaseDate: '2024-03-01',
        AvgRating: 3,
        FeedbackCount: 2,
      },
    ]);
  });

  it('should count deduplicated customers and joined purchases and feedback', () => {
    const result = consolidate({ customers, purchases, feedback });

    expect(result.customerCount).toBe(3);
    expect(result.purchaseCount).toBe(3);
    expect(result.feedbackCount).toBe(3);
    expect(result.recordCount).toBe(9);
  });

  it('should return no rows for empty input', () => {
    expect(consolidate({ customers: [], purchases: [], feedback: [] })).toEqual({
      rows: [],
      recordCount: 0,
      customerCount: 0,
      purchaseCount: 0,
      feedbackCount: 0,
    });
  });

  it('should throw on a purchase date it cannot read', () => {
    expect(() =>
      consolidate({
        customers: [{ CustomerID: '1', Name: 'Ana', City: 'Lisbon' }],
        purchases: [{ CustomerID: '1', Product: 'Book', Amount: 1, Date: 'soon' }],
        feedback: [],
      }),
    ).toThrow("Purchase of customer 1 has an unreadable date 'soon'");
  });
});

describe('aggregates', () => {
  it('should sum spend and keep the latest purchase date', () => {
    const aggregates = aggregatePurchases([
      { CustomerID: '4', Product: 'A', Amount: 1.5, PurchaseRawDate: '2023-12-31', PurchaseDate: Date.UTC(2023, 11, 31) },
      { CustomerID: '4', Product: 'B', Amount: 2.5, PurchaseRawDate: '2023-06-01', PurchaseDate: Date.UTC(2023, 5, 1) },
    ]);

    expect(aggregates.get('4')).toEqual({ TotalSpend: 4, PurchaseCount: 2, LastPurchaseDate: '2023-12-31' });
  });

  it('should average ratings per customer', () => {
    const aggregates = aggregateFeedback([
      { CustomerID: '4', Rating: 4, Feedback: 'a' },
      { CustomerID: '4', Rating: 5, Feedback: 'b' },
      { CustomerID: '5', Rating: 2, Feedback: 'c' },
    ]);

    expect(aggregates.get('4')).toEqual({ AvgRating: 4.5, FeedbackCount: 2 });
    expect(aggregates.get('5')).toEqual({ AvgRating: 2, FeedbackCount: 1 });
  });
});
