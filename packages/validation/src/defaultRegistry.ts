import { FormatRegistry } from './domain/services/FormatRegistry.js';
import { RecordValidator } from './domain/services/RecordValidator.js';
import { CUSTOMER_SCHEMA, PURCHASE_SCHEMA, FEEDBACK_SCHEMA } from './domain/schemas.js';
import { XmlCodec } from './infrastructure/codecs/XmlCodec.js';
import { JsonCodec } from './infrastructure/codecs/JsonCodec.js';
import { CsvCodec } from './infrastructure/codecs/CsvCodec.js';

/** Customers as XML, purchases as JSON, feedback as CSV. */
export function createDefaultRegistry(): FormatRegistry {
  return new FormatRegistry({
    customer: {
      kind: 'customer',
      extension: '.xml',
      directory: 'customer_details',
      codec: new XmlCodec(),
      validator: new RecordValidator(CUSTOMER_SCHEMA),
    },
    purchase: {
      kind: 'purchase',
      extension: '.json',
      directory: 'customer_purchases',
      codec: new JsonCodec(),
      validator: new RecordValidator(PURCHASE_SCHEMA),
    },
    feedback: {
      kind: 'feedback',
      extension: '.csv',
      directory: 'customer_feedback',
      codec: new CsvCodec(),
      validator: new RecordValidator(FEEDBACK_SCHEMA),
    },
  });
}
