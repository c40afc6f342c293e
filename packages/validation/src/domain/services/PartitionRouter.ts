import type { RecordStatus } from '@customer360/core';

export interface PartitionPrefixes {
  readonly rawPrefix: string;
  readonly acceptedPrefix: string;
  readonly rejectedPrefix: string;
}

/**
 * Derives partition keys from source keys. `raw/a/b.xml` maps to
 * `validated/a/b.xml` or `error/a/b.xml`, so replaying a source overwrites
 * the same partitions.
 */
export class PartitionRouter {
  constructor(private readonly prefixes: PartitionPrefixes) {}

  /** Whether `key` lives under the raw prefix and is therefore a pipeline input. */
  isRawKey(key: string): boolean {
    return key.startsWith(this.prefixes.rawPrefix);
  }

  keyFor(sourceKey: string, outcome: RecordStatus): string {
    if (!this.isRawKey(sourceKey)) {
      throw new Error(`Key '${sourceKey}' is not under '${this.prefixes.rawPrefix}'`);
    }
    const target = outcome === 'accepted' ? this.prefixes.acceptedPrefix : this.prefixes.rejectedPrefix;
    return target + sourceKey.slice(this.prefixes.rawPrefix.length);
  }
}
