import type { RawRecord } from '@customer360/core';

/** One record slot of a parsed file. */
export interface ParsedItem {
  readonly raw: RawRecord;
  /** Set when the item is structurally broken (e.g. a CSV row with the wrong column count). */
  readonly malformed?: string;
}

/** Source formats understood by the pipeline. */
export type SourceFormat = 'xml' | 'json' | 'csv';

/**
 * Port for decoding and re-encoding one source format.
 *
 * `parse()` throws `MalformedFileError` only when the file cannot be read as a
 * whole; problems confined to one record are reported through
 * `ParsedItem.malformed` instead.
 */
export interface RecordCodec {
  readonly format: SourceFormat;
  parse(data: string | Buffer): readonly ParsedItem[];
  /** Encode records in this format, e.g. to write a partition. */
  serialize(records: readonly RawRecord[]): string;
}
