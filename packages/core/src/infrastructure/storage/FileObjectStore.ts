import { writeFile, readFile, mkdir, readdir, stat } from 'node:fs/promises';
import { join, dirname, relative, sep } from 'node:path';
import type { ObjectStore } from '../../domain/ports/ObjectStore.js';

export interface FileObjectStoreOptions {
  /** Root directory; each bucket is a sub-directory. Default: `'.datalake'`. */
  readonly directory?: string;
}

/**
 * Object store backed by the local file system.
 *
 * `bucket/raw/customer_details/a.xml` lives at `{directory}/bucket/raw/customer_details/a.xml`.
 * Keys use `/` regardless of platform.
 *
 * Node.js only.
 */
export class FileObjectStore implements ObjectStore {
  private readonly directory: string;

  constructor(options?: FileObjectStoreOptions) {
    this.directory = options?.directory ?? '.datalake';
  }

  async get(bucket: string, key: string): Promise<Buffer> {
    return readFile(this.objectPath(bucket, key));
  }

  async put(bucket: string, key: string, body: string | Buffer): Promise<void> {
    const path = this.objectPath(bucket, key);
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, body);
  }

  async list(bucket: string, prefix: string): Promise<readonly string[]> {
    const bucketDir = join(this.directory, bucket);
    let entries: string[];
    try {
      entries = await readdir(bucketDir, { recursive: true });
    } catch (error) {
      if (isNotFound(error)) return [];
      throw error;
    }

    const keys: string[] = [];
    for (const entry of entries) {
      const key = relative(bucketDir, join(bucketDir, entry)).split(sep).join('/');
      if (!key.startsWith(prefix)) continue;
      const info = await stat(join(bucketDir, entry));
      if (info.isFile()) keys.push(key);
    }
    return keys.sort();
  }

  private objectPath(bucket: string, key: string): string {
    if (key.split('/').includes('..')) {
      throw new Error(`Invalid object key: ${key}`);
    }
    return join(this.directory, bucket, ...key.split('/'));
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
