import type { RawRecord } from '@customer360/core';
import { MalformedFileError, errorMessage } from '@customer360/core';
import type { RecordCodec, ParsedItem } from '../../domain/ports/RecordCodec.js';

export interface JsonCodecOptions {
  /** Parse format: 'array' for JSON array of objects, 'ndjson' for newline-delimited JSON. Default: 'auto'. */
  readonly format?: 'array' | 'ndjson' | 'auto';
}

/** JSON codec supporting JSON array and NDJSON input with auto-detection. Writes pretty-printed arrays. */
export class JsonCodec implements RecordCodec {
  readonly format = 'json';
  private readonly layout: 'array' | 'ndjson' | 'auto';

  constructor(options?: JsonCodecOptions) {
    this.layout = options?.format ?? 'auto';
  }

  parse(data: string | Buffer): readonly ParsedItem[] {
    const content = typeof data === 'string' ? data : data.toString('utf-8');
    const trimmed = content.replace(/^\uFEFF/, '').trim();

    if (trimmed === '') return [];

    const layout = this.layout === 'auto' ? this.detectLayout(trimmed) : this.layout;
    return layout === 'array' ? this.parseArray(trimmed) : this.parseNdjson(trimmed);
  }

  serialize(records: readonly RawRecord[]): string {
    return JSON.stringify(records, null, 2);
  }

  private detectLayout(content: string): 'array' | 'ndjson' {
    return content.startsWith('[') ? 'array' : 'ndjson';
  }

  private parseArray(content: string): ParsedItem[] {
    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new MalformedFileError('json', errorMessage(error), { cause: error });
    }

    if (!Array.isArray(parsed)) {
      throw new MalformedFileError('json', 'expected a JSON array of objects');
    }

    return parsed.map((item: unknown) => this.toItem(item));
  }

  private parseNdjson(content: string): ParsedItem[] {
    const items: ParsedItem[] = [];

    for (const line of content.split('\n')) {
      const trimmedLine = line.trim();
      if (trimmedLine === '') continue;

      try {
        items.push(this.toItem(JSON.parse(trimmedLine)));
      } catch (error) {
        items.push({ raw: { line: trimmedLine }, malformed: `invalid JSON line: ${errorMessage(error)}` });
      }
    }

    return items;
  }

  private toItem(value: unknown): ParsedItem {
    if (isPlainObject(value)) return { raw: value };
    return { raw: { value }, malformed: 'each item must be a plain object' };
  }
}

function isPlainObject(value: unknown): value is RawRecord {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}
