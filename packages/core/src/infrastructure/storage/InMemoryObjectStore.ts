import type { ObjectStore } from '../../domain/ports/ObjectStore.js';

/** Non-persistent object store. Used in tests and local runs. */
export class InMemoryObjectStore implements ObjectStore {
  private readonly buckets = new Map<string, Map<string, Buffer>>();

  get(bucket: string, key: string): Promise<Buffer> {
    const body = this.buckets.get(bucket)?.get(key);
    if (!body) {
      return Promise.reject(new Error(`Object not found: ${bucket}/${key}`));
    }
    return Promise.resolve(Buffer.from(body));
  }

  put(bucket: string, key: string, body: string | Buffer): Promise<void> {
    let objects = this.buckets.get(bucket);
    if (!objects) {
      objects = new Map();
      this.buckets.set(bucket, objects);
    }
    objects.set(key, typeof body === 'string' ? Buffer.from(body, 'utf-8') : Buffer.from(body));
    return Promise.resolve();
  }

  list(bucket: string, prefix: string): Promise<readonly string[]> {
    const objects = this.buckets.get(bucket);
    if (!objects) return Promise.resolve([]);
    return Promise.resolve([...objects.keys()].filter((k) => k.startsWith(prefix)).sort());
  }
}
