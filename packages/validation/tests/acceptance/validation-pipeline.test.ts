import { describe, it, expect, vi } from 'vitest';
import type { BatchTrigger, JobArguments } from '@customer360/core';
import { InMemoryObjectStore, defaultPipelineConfig } from '@customer360/core';
import { ValidationPipeline } from '../../src/ValidationPipeline.js';
import { XmlCodec } from '../../src/infrastructure/codecs/XmlCodec.js';

class RecordingTrigger implements BatchTrigger {
  readonly calls: { jobName: string; args: JobArguments }[] = [];

  startJobRun(jobName: string, args: JobArguments): Promise<string> {
    this.calls.push({ jobName, args });
    return Promise.resolve(`run-${String(this.calls.length)}`);
  }
}

function notification(...keys: string[]): unknown {
  return { Records: keys.map((key) => ({ s3: { bucket: { name: 'datalake' }, object: { key } } })) };
}

const CUSTOMERS_XML = `<Customers>
  <Customer><CustomerID>1</CustomerID><Name>Ana</Name><City>Lisbon</City></Customer>
  <Customer><CustomerID>2</CustomerID><Name>Bo</Name></Customer>
  <Customer><CustomerID>3</CustomerID><Name>Cy</Name><City>Porto</City></Customer>
</Customers>`;

function setup(settings = defaultPipelineConfig()) {
  const store = new InMemoryObjectStore();
  const trigger = new RecordingTrigger();
  const pipeline = new ValidationPipeline({ store, trigger, settings });
  return { store, trigger, pipeline };
}

describe('ValidationPipeline', () => {
  it('should route two of three customers to the accepted partition', async () => {
    const { store, trigger, pipeline } = setup();
    await store.put('datalake', 'raw/customer_details/day1.xml', CUSTOMERS_XML);

    const result = await pipeline.handle(notification('raw/customer_details/day1.xml'));

    expect(result.status).toBe('processed');
    if (result.status !== 'processed') return;
    expect(result.files[0]).toEqual(
      expect.objectContaining({ status: 'validated', kind: 'customer', acceptedCount: 2, rejectedCount: 1, runId: 'run-1' }),
    );

    const codec = new XmlCodec();
    const accepted = codec.parse(await store.get('datalake', 'validated/customer_details/day1.xml'));
    const rejected = codec.parse(await store.get('datalake', 'error/customer_details/day1.xml'));
    expect(accepted.map((item) => item.raw['CustomerID'])).toEqual(['1', '3']);
    expect(rejected).toEqual([{ raw: { CustomerID: '2', Name: 'Bo' } }]);

    expect(trigger.calls).toHaveLength(1);
    expect(trigger.calls[0]?.jobName).toBe('Customer-360');
    expect(trigger.calls[0]?.args['--ERROR_COUNT']).toBe('1');
    expect(trigger.calls[0]?.args['--VALIDATED_CUSTOMERS_PATH']).toBe('s3://datalake/validated/customer_details/');
  });

  it('should not trigger for a rejection-only file', async () => {
    const { store, trigger, pipeline } = setup();
    await store.put(
      'datalake',
      'raw/customer_purchases/p.json',
      JSON.stringify([{ CustomerID: '7', Amount: -5, Product: 'X', Date: '2024-01-01' }]),
    );

    const result = await pipeline.processObject('datalake', 'raw/customer_purchases/p.json');

    expect(result).toEqual(expect.objectContaining({ status: 'validated', acceptedCount: 0, rejectedCount: 1 }));
    expect(result).not.toHaveProperty('runId');
    expect(pipeline.failureCount).toBe(1);
    expect(trigger.calls).toHaveLength(0);
    expect(await store.list('datalake', 'validated/')).toEqual([]);
  });

  it('should count files with rejected records as failures', async () => {
    const { store, pipeline } = setup();
    await store.put('datalake', 'raw/customer_feedback/clean.csv', 'CustomerID,Rating,Feedback\n1,5,great\n');
    await store.put('datalake', 'raw/customer_details/day1.xml', CUSTOMERS_XML);

    await pipeline.processObject('datalake', 'raw/customer_feedback/clean.csv');
    expect(pipeline.failureCount).toBe(0);

    await pipeline.processObject('datalake', 'raw/customer_details/day1.xml');
    expect(pipeline.failureCount).toBe(1);
  });

  it('should validate CSV feedback by rating', async () => {
    const { store, pipeline } = setup();
    await store.put('datalake', 'raw/customer_feedback/f.csv', 'CustomerID,Rating,Feedback\n1,6,too good\n1,5,great\n');

    await pipeline.processObject('datalake', 'raw/customer_feedback/f.csv');

    const accepted = (await store.get('datalake', 'validated/customer_feedback/f.csv')).toString('utf-8');
    const rejected = (await store.get('datalake', 'error/customer_feedback/f.csv')).toString('utf-8');
    expect(accepted).toBe('CustomerID,Rating,Feedback\n1,5,great');
    expect(rejected).toBe('CustomerID,Rating,Feedback\n1,6,too good');
  });

  it('should produce the same partitions and score when a file is replayed', async () => {
    const { store, pipeline } = setup();
    await store.put('datalake', 'raw/customer_details/day1.xml', CUSTOMERS_XML);

    const first = await pipeline.processObject('datalake', 'raw/customer_details/day1.xml');
    const before = (await store.get('datalake', 'validated/customer_details/day1.xml')).toString('utf-8');
    const second = await pipeline.processObject('datalake', 'raw/customer_details/day1.xml');
    const after = (await store.get('datalake', 'validated/customer_details/day1.xml')).toString('utf-8');

    expect(after).toBe(before);
    expect(second.status === 'validated' && second.quality).toEqual(first.status === 'validated' && first.quality);
    expect(await store.list('datalake', 'validated/')).toEqual(['validated/customer_details/day1.xml']);
  });

  it('should report a malformed document without writing partitions', async () => {
    const { store, trigger, pipeline } = setup();
    const failed = vi.fn();
    pipeline.on('file:failed', failed);
    await store.put('datalake', 'raw/customer_details/bad.xml', '<Customers><Customer></Customers>');

    const result = await pipeline.processObject('datalake', 'raw/customer_details/bad.xml');

    expect(result).toEqual({
      status: 'failed',
      bucket: 'datalake',
      key: 'raw/customer_details/bad.xml',
      error: 'xml: mismatched closing tag </Customers>',
    });
    expect(pipeline.failureCount).toBe(1);
    expect(failed).toHaveBeenCalledOnce();
    expect(await store.list('datalake', 'validated/')).toEqual([]);
    expect(await store.list('datalake', 'error/')).toEqual([]);
    expect(trigger.calls).toHaveLength(0);
  });

  it('should report a missing object as a failed file', async () => {
    const { pipeline } = setup();

    const result = await pipeline.processObject('datalake', 'raw/customer_details/missing.xml');

    expect(result).toEqual(
      expect.objectContaining({ status: 'failed', error: 'Object not found: datalake/raw/customer_details/missing.xml' }),
    );
  });

  it('should report a trigger failure as a failed file', async () => {
    const store = new InMemoryObjectStore();
    const trigger: BatchTrigger = { startJobRun: () => Promise.reject(new Error('job quota exceeded')) };
    const pipeline = new ValidationPipeline({ store, trigger });
    await store.put('datalake', 'raw/customer_details/day1.xml', CUSTOMERS_XML);

    const result = await pipeline.processObject('datalake', 'raw/customer_details/day1.xml');

    expect(result).toEqual(expect.objectContaining({ status: 'failed', error: 'job quota exceeded' }));
    expect(await store.list('datalake', 'validated/')).toEqual(['validated/customer_details/day1.xml']);
  });

  it('should skip unsupported extensions and keys outside the raw prefix', async () => {
    const { pipeline } = setup();
    const skipped = vi.fn();
    pipeline.on('file:skipped', skipped);

    const result = await pipeline.handle(notification('raw/notes.txt', 'validated/customer_details/day1.xml'));

    expect(result).toEqual({
      status: 'processed',
      files: [
        { status: 'skipped', bucket: 'datalake', key: 'raw/notes.txt', reason: 'unsupported file extension' },
        {
          status: 'skipped',
          bucket: 'datalake',
          key: 'validated/customer_details/day1.xml',
          reason: 'outside the raw prefix',
        },
      ],
    });
    expect(skipped).toHaveBeenCalledTimes(2);
    expect(pipeline.failureCount).toBe(0);
  });

  it('should reject a malformed event and count the failure', async () => {
    const { pipeline } = setup();
    const rejected = vi.fn();
    pipeline.on('event:rejected', rejected);

    const result = await pipeline.handle({ detail: 'not a notification' });

    expect(result.status).toBe('rejected');
    expect(pipeline.failureCount).toBe(1);
    expect(rejected).toHaveBeenCalledOnce();
  });

  it('should process every record of an event, continuing after a failure', async () => {
    const { store, pipeline } = setup();
    await store.put('datalake', 'raw/customer_details/day1.xml', CUSTOMERS_XML);

    const result = await pipeline.handle(
      notification('raw/customer_details/missing.xml', 'raw/customer_details/day1.xml'),
    );

    expect(result.status === 'processed' && result.files.map((f) => f.status)).toEqual(['failed', 'validated']);
  });

  it('should process only the first record in first event mode', async () => {
    const { store, pipeline } = setup(defaultPipelineConfig({ eventMode: 'first' }));
    await store.put('datalake', 'raw/customer_details/day1.xml', CUSTOMERS_XML);

    const result = await pipeline.handle(notification('raw/customer_details/day1.xml', 'raw/notes.txt'));

    expect(result.status === 'processed' && result.files).toHaveLength(1);
  });

  it('should compute the score from a rescan when configured', async () => {
    const { store, pipeline } = setup(defaultPipelineConfig({ scoreMode: 'rescan' }));
    await store.put('datalake', 'raw/customer_details/day1.xml', CUSTOMERS_XML);
    await store.put('datalake', 'error/customer_details/old.xml', '<Customers><Customer><Name>x</Name></Customer></Customers>');

    const result = await pipeline.processObject('datalake', 'raw/customer_details/day1.xml');

    expect(result.status === 'validated' && result.quality).toEqual({ acceptedCount: 2, rejectedCount: 2, score: 50 });
  });
});
