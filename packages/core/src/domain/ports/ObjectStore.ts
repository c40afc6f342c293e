/**
 * Port for durable object storage (an S3 bucket, a directory tree, ...).
 *
 * Keys encode routing through path segments (`raw/`, `validated/`, `error/`).
 * `put()` creates or overwrites; there is no append.
 */
export interface ObjectStore {
  /** Read an object. Rejects when the object does not exist. */
  get(bucket: string, key: string): Promise<Buffer>;
  /** Create or overwrite an object. */
  put(bucket: string, key: string, body: string | Buffer): Promise<void>;
  /** List every key under `prefix`, sorted lexicographically. */
  list(bucket: string, prefix: string): Promise<readonly string[]>;
}

/** A bucket plus key prefix, e.g. parsed from `s3://bucket/validated/customer_details/`. */
export interface ObjectLocation {
  readonly bucket: string;
  readonly prefix: string;
}

const OBJECT_URI = /^[a-z][a-z0-9+.-]*:\/\/([^/]+)\/?(.*)$/i;

/** Parse a `scheme://bucket/prefix` URI. Returns `null` for anything else. */
export function parseObjectUri(uri: string): ObjectLocation | null {
  const match = OBJECT_URI.exec(uri.trim());
  if (!match?.[1]) return null;
  return { bucket: match[1], prefix: match[2] ?? '' };
}

export function formatObjectUri(location: ObjectLocation, scheme = 's3'): string {
  return `${scheme}://${location.bucket}/${location.prefix}`;
}
