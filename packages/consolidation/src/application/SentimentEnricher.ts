import type { CorrelationMode, EventBus, Partition, SentimentClassifier } from '@customer360/core';
import { Partitioner, Sentiment } from '@customer360/core';
import type { ConsolidatedRow, EnrichedRow } from '../domain/model/ConsolidatedRow.js';
import {
  buildPrompt,
  matchPositional,
  matchTagged,
  responseLines,
} from '../domain/services/SentimentProtocol.js';

export interface SentimentEnricherOptions {
  /** Rows per classifier request. */
  readonly partitionSize: number;
  /** Requests in flight at once. */
  readonly maxConcurrentPartitions: number;
  readonly correlation: CorrelationMode;
}

/**
 * Labels consolidated rows with a sentiment, one classifier request per
 * partition of rows. Every row comes back labelled; rows the response does
 * not cover are `Unknown`. A classifier error rejects the whole enrichment.
 */
export class SentimentEnricher {
  private readonly partitioner: Partitioner;

  constructor(
    private readonly classifier: SentimentClassifier,
    private readonly eventBus: EventBus,
    private readonly options: SentimentEnricherOptions,
  ) {
    this.partitioner = new Partitioner(options.partitionSize);
  }

  async enrich(runId: string, rows: readonly ConsolidatedRow[]): Promise<EnrichedRow[]> {
    const partitions = this.partitioner.split(rows);
    const results = new Map<number, EnrichedRow[]>();
    const active = new Set<Promise<void>>();
    const maxConcurrency = Math.max(1, this.options.maxConcurrentPartitions);

    const failures: unknown[] = [];

    for (const partition of partitions) {
      while (active.size >= maxConcurrency) {
        await Promise.race(active);
      }
      if (failures.length > 0) break;

      const task: Promise<void> = this.enrichPartition(runId, partition)
        .then(
          (enriched) => {
            results.set(partition.partitionIndex, enriched);
          },
          (error: unknown) => {
            failures.push(error);
          },
        )
        .finally(() => {
          active.delete(task);
        });
      active.add(task);
    }

    await Promise.all([...active]);
    if (failures.length > 0) throw failures[0];
    return partitions.flatMap((partition) => results.get(partition.partitionIndex) ?? []);
  }

  private async enrichPartition(runId: string, partition: Partition<ConsolidatedRow>): Promise<EnrichedRow[]> {
    const rows = partition.items;
    if (rows.length === 0) return [];

    const { correlation } = this.options;
    const response = await this.classifier.classify(buildPrompt(rows.map((row) => row.Feedback), correlation));
    const lines = responseLines(response);
    const labels = correlation === 'tagged' ? matchTagged(lines, rows.length) : matchPositional(lines, rows.length);

    if (lines.length !== rows.length) {
      this.eventBus.emit({
        type: 'enrichment:mismatch',
        runId,
        partitionIndex: partition.partitionIndex,
        requestedLines: rows.length,
        receivedLines: lines.length,
        timestamp: Date.now(),
      });
    }

    const enriched = rows.map((row, i) => ({ ...row, Sentiment: labels[i] ?? Sentiment.UNKNOWN }));

    this.eventBus.emit({
      type: 'enrichment:partition',
      runId,
      partitionIndex: partition.partitionIndex,
      rowCount: rows.length,
      unknownCount: enriched.filter((row) => row.Sentiment === Sentiment.UNKNOWN).length,
      timestamp: Date.now(),
    });

    return enriched;
  }
}
