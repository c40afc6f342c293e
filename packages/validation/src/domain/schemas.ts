import type { CustomerRecord, PurchaseRecord, FeedbackRecord } from '@customer360/core';
import type { RecordSchema } from './model/RecordSchema.js';

/** Customer profiles: CustomerID numeric, Name and City present. */
export const CUSTOMER_SCHEMA: RecordSchema<CustomerRecord> = {
  kind: 'customer',
  fields: [
    { name: 'CustomerID', type: 'numeric-string', required: true },
    { name: 'Name', type: 'string', required: true },
    { name: 'City', type: 'string', required: true },
  ],
  build: (raw, f) => ({
    ...raw,
    CustomerID: f.text('CustomerID'),
    Name: f.text('Name'),
    City: f.text('City'),
  }),
};

/** Purchases: CustomerID numeric, Product present, Amount > 0, Date `YYYY-MM-DD`. */
export const PURCHASE_SCHEMA: RecordSchema<PurchaseRecord> = {
  kind: 'purchase',
  fields: [
    { name: 'CustomerID', type: 'numeric-string', required: true },
    { name: 'Amount', type: 'number', required: true, greaterThan: 0 },
    { name: 'Product', type: 'string', required: true },
    { name: 'Date', type: 'date', required: true },
  ],
  build: (raw, f) => ({
    ...raw,
    CustomerID: f.text('CustomerID'),
    Product: f.text('Product'),
    Amount: f.number('Amount'),
    Date: f.text('Date'),
  }),
};

/** Feedback: CustomerID numeric, Rating an integer in [1, 5], Feedback present. */
export const FEEDBACK_SCHEMA: RecordSchema<FeedbackRecord> = {
  kind: 'feedback',
  fields: [
    { name: 'CustomerID', type: 'numeric-string', required: true },
    { name: 'Rating', type: 'integer', required: true, min: 1, max: 5 },
    { name: 'Feedback', type: 'string', required: true },
  ],
  build: (raw, f) => ({
    ...raw,
    CustomerID: f.text('CustomerID'),
    Rating: f.number('Rating'),
    Feedback: f.text('Feedback'),
  }),
};
