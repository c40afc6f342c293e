import Papa from 'papaparse';
import type { RawRecord } from '@customer360/core';
import { isEmptyRow } from '@customer360/core';
import type { RecordCodec, ParsedItem } from '../../domain/ports/RecordCodec.js';

export interface CsvCodecOptions {
  /** Field delimiter. Default: `','`. */
  readonly delimiter?: string;
}

const EXTRA_FIELDS = '__parsed_extra';

/**
 * CSV codec using PapaParse. The first row is the header; values stay strings.
 * Rows PapaParse reports as broken (wrong column count, unbalanced quotes) are
 * returned as malformed items so the rest of the file still validates.
 */
export class CsvCodec implements RecordCodec {
  readonly format = 'csv';
  private readonly delimiter: string;

  constructor(options?: CsvCodecOptions) {
    this.delimiter = options?.delimiter ?? ',';
  }

  parse(data: string | Buffer): readonly ParsedItem[] {
    const content = (typeof data === 'string' ? data : data.toString('utf-8')).replace(/^\uFEFF/, '');
    if (content.trim() === '') return [];

    const result = Papa.parse<Record<string, unknown>>(content, {
      header: true,
      delimiter: this.delimiter,
      skipEmptyLines: true,
      dynamicTyping: false,
      transformHeader: (header) => header.trim(),
    });

    const problems = new Map<number, string>();
    for (const error of result.errors) {
      if (typeof error.row === 'number' && !problems.has(error.row)) {
        problems.set(error.row, error.message);
      }
    }

    const items: ParsedItem[] = [];
    result.data.forEach((row, index) => {
      const problem = problems.get(index);
      if (problem !== undefined) {
        items.push({ raw: withoutExtras(row), malformed: `row ${String(index + 1)}: ${problem}` });
        return;
      }
      if (isEmptyRow(row)) return;
      items.push({ raw: row });
    });

    return items;
  }

  serialize(records: readonly RawRecord[]): string {
    if (records.length === 0) return '';

    const fields: string[] = [];
    for (const record of records) {
      for (const key of Object.keys(record)) {
        if (!fields.includes(key)) fields.push(key);
      }
    }

    return Papa.unparse(
      { fields, data: records.map((record) => fields.map((field) => toCell(record[field]))) },
      { delimiter: this.delimiter, newline: '\n' },
    );
  }
}

function withoutExtras(row: Record<string, unknown>): RawRecord {
  const { [EXTRA_FIELDS]: extra, ...rest } = row;
  if (Array.isArray(extra) && extra.length > 0) {
    return { ...rest, [EXTRA_FIELDS]: extra.map((value) => String(value)).join(',') };
  }
  return rest;
}

function toCell(value: unknown): string {
  if (value === undefined || value === null) return '';
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}
