import { describe, it, expect, vi } from 'vitest';
import { EventBus, InMemoryObjectStore, acceptRecord, rejectRecord } from '@customer360/core';
import { PartitionWriter } from '../../../src/application/PartitionWriter.js';
import { PartitionRouter } from '../../../src/domain/services/PartitionRouter.js';
import { JsonCodec } from '../../../src/infrastructure/codecs/JsonCodec.js';

describe('PartitionWriter', () => {
  const router = new PartitionRouter({ rawPrefix: 'raw/', acceptedPrefix: 'validated/', rejectedPrefix: 'error/' });
  const good = { CustomerID: '7', Amount: 5, Product: 'X', Date: '2024-01-01' };
  const bad = { CustomerID: '7', Amount: -5, Product: 'X', Date: '2024-01-01' };

  it('should write each side in the source format', async () => {
    const store = new InMemoryObjectStore();
    const writer = new PartitionWriter(store, router, new EventBus());

    const written = await writer.write('datalake', 'raw/customer_purchases/p.json', new JsonCodec(), {
      accepted: [acceptRecord(0, good, good)],
      rejected: [rejectRecord(1, bad, [])],
    });

    expect(written).toEqual({
      acceptedKey: 'validated/customer_purchases/p.json',
      rejectedKey: 'error/customer_purchases/p.json',
    });
    const accepted = await store.get('datalake', 'validated/customer_purchases/p.json');
    expect(JSON.parse(accepted.toString('utf-8'))).toEqual([good]);
    const rejected = await store.get('datalake', 'error/customer_purchases/p.json');
    expect(JSON.parse(rejected.toString('utf-8'))).toEqual([bad]);
  });

  it('should not write an empty side', async () => {
    const store = new InMemoryObjectStore();
    const eventBus = new EventBus();
    const handler = vi.fn();
    eventBus.on('partition:written', handler);
    const writer = new PartitionWriter(store, router, eventBus);

    const written = await writer.write('datalake', 'raw/customer_purchases/p.json', new JsonCodec(), {
      accepted: [],
      rejected: [rejectRecord(0, bad, [])],
    });

    expect(written).toEqual({ rejectedKey: 'error/customer_purchases/p.json' });
    expect(await store.list('datalake', 'validated/')).toEqual([]);
    expect(handler).toHaveBeenCalledOnce();
    expect(handler).toHaveBeenCalledWith(
      expect.objectContaining({ key: 'error/customer_purchases/p.json', outcome: 'rejected', recordCount: 1 }),
    );
  });

  it('should overwrite the same keys on replay', async () => {
    const store = new InMemoryObjectStore();
    const writer = new PartitionWriter(store, router, new EventBus());
    const outcome = { accepted: [acceptRecord(0, good, good)], rejected: [] };

    await writer.write('datalake', 'raw/customer_purchases/p.json', new JsonCodec(), outcome);
    const first = (await store.get('datalake', 'validated/customer_purchases/p.json')).toString('utf-8');
    await writer.write('datalake', 'raw/customer_purchases/p.json', new JsonCodec(), outcome);
    const second = (await store.get('datalake', 'validated/customer_purchases/p.json')).toString('utf-8');

    expect(second).toBe(first);
    expect(await store.list('datalake', '')).toEqual(['validated/customer_purchases/p.json']);
  });
});
