import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { FileObjectStore } from '../../../src/infrastructure/storage/FileObjectStore.js';

describe('FileObjectStore', () => {
  let directory: string;
  let store: FileObjectStore;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'c360-objects-'));
    store = new FileObjectStore({ directory });
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it('should create nested keys and read them back', async () => {
    await store.put('lake', 'validated/customer_details/a.xml', '<Customers/>');

    const body = await store.get('lake', 'validated/customer_details/a.xml');
    expect(body.toString('utf-8')).toBe('<Customers/>');
  });

  it('should list only files under the prefix using forward slashes', async () => {
    await store.put('lake', 'validated/customer_details/a.xml', 'x');
    await store.put('lake', 'validated/customer_purchases/b.json', 'x');
    await store.put('lake', 'error/customer_details/a.xml', 'x');

    expect(await store.list('lake', 'validated/')).toEqual([
      'validated/customer_details/a.xml',
      'validated/customer_purchases/b.json',
    ]);
  });

  it('should return an empty list for an unknown bucket', async () => {
    expect(await store.list('nowhere', 'validated/')).toEqual([]);
  });

  it('should refuse keys that escape the bucket', async () => {
    await expect(store.put('lake', '../outside.txt', 'x')).rejects.toThrow('Invalid object key: ../outside.txt');
  });
});
