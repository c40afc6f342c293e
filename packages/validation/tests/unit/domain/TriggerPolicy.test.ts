import { describe, it, expect } from 'vitest';
import { computeQualityScore } from '@customer360/core';
import { shouldTrigger, buildJobArguments } from '../../../src/domain/services/TriggerPolicy.js';
import { createDefaultRegistry } from '../../../src/defaultRegistry.js';

describe('shouldTrigger', () => {
  it('should fire only when the file produced accepted records', () => {
    expect(shouldTrigger(1)).toBe(true);
    expect(shouldTrigger(0)).toBe(false);
  });
});

describe('buildJobArguments', () => {
  it('should encode every argument as a string', () => {
    const args = buildJobArguments(
      {
        jobName: 'Customer-360',
        bucket: 'datalake',
        acceptedPrefix: 'validated/',
        trackingTable: 'customer360_etl_tracking',
        databaseUrl: 'sqlite::memory:',
        quality: computeQualityScore(18, 2),
      },
      createDefaultRegistry(),
    );

    expect(args).toEqual({
      '--JOB_NAME': 'Customer-360',
      '--VALIDATED_CUSTOMERS_PATH': 's3://datalake/validated/customer_details/',
      '--VALIDATED_PURCHASES_PATH': 's3://datalake/validated/customer_purchases/',
      '--VALIDATED_FEEDBACK_PATH': 's3://datalake/validated/customer_feedback/',
      '--TRACKING_TABLE': 'customer360_etl_tracking',
      '--DATABASE_URL': 'sqlite::memory:',
      '--DQ_SCORE': '90',
      '--ERROR_COUNT': '2',
    });
  });
});

describe('FormatRegistry', () => {
  const registry = createDefaultRegistry();

  it('should dispatch by extension, ignoring case', () => {
    expect(registry.forKey('raw/customer_details/a.xml')?.kind).toBe('customer');
    expect(registry.forKey('raw/customer_purchases/a.JSON')?.kind).toBe('purchase');
    expect(registry.forKey('raw/customer_feedback/a.csv')?.kind).toBe('feedback');
  });

  it('should return undefined for unsupported extensions', () => {
    expect(registry.forKey('raw/notes.txt')).toBeUndefined();
  });
});
