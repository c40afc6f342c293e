import type { BatchTrigger, EventBus, ObjectStore, QualityScore, RecordKind } from '@customer360/core';
import type { FormatRegistry } from '../../domain/services/FormatRegistry.js';
import type { PartitionRouter } from '../../domain/services/PartitionRouter.js';
import { shouldTrigger, buildJobArguments } from '../../domain/services/TriggerPolicy.js';
import type { PartitionWriter, WrittenPartitions } from '../PartitionWriter.js';
import type { AggregateQualityScore } from './AggregateQualityScore.js';

/** A file that was parsed, validated and partitioned. */
export interface ValidatedFile {
  readonly status: 'validated';
  readonly bucket: string;
  readonly key: string;
  readonly kind: RecordKind;
  readonly acceptedCount: number;
  readonly rejectedCount: number;
  readonly partitions: WrittenPartitions;
  readonly quality: QualityScore;
  /** Identifier of the consolidation run started for this file, if one was started. */
  readonly runId?: string;
}

export interface SkippedFile {
  readonly status: 'skipped';
  readonly bucket: string;
  readonly key: string;
  readonly reason: string;
}

export interface FailedFile {
  readonly status: 'failed';
  readonly bucket: string;
  readonly key: string;
  readonly error: string;
}

export type FileResult = ValidatedFile | SkippedFile | FailedFile;

export interface ValidateFileDeps {
  readonly store: ObjectStore;
  readonly registry: FormatRegistry;
  readonly router: PartitionRouter;
  readonly writer: PartitionWriter;
  readonly quality: AggregateQualityScore;
  readonly trigger: BatchTrigger;
  readonly eventBus: EventBus;
}

export interface ValidateFileOptions {
  readonly jobName: string;
  readonly acceptedPrefix: string;
  readonly trackingTable: string;
  readonly databaseUrl: string;
}

/**
 * Use case: validate one raw object end to end.
 *
 * Read, parse, validate, write partitions, update the quality score and start
 * the consolidation job when the file contributed accepted records. File-level
 * failures (unreadable object, malformed document, trigger failure) reject.
 */
export class ValidateFile {
  constructor(
    private readonly deps: ValidateFileDeps,
    private readonly options: ValidateFileOptions,
  ) {}

  async execute(bucket: string, key: string): Promise<ValidatedFile | SkippedFile> {
    const { eventBus } = this.deps;
    eventBus.emit({ type: 'file:received', bucket, key, timestamp: Date.now() });

    if (!this.deps.router.isRawKey(key)) {
      return this.skip(bucket, key, 'outside the raw prefix');
    }

    const binding = this.deps.registry.forKey(key);
    if (!binding) {
      return this.skip(bucket, key, 'unsupported file extension');
    }

    const content = await this.deps.store.get(bucket, key);
    const items = binding.codec.parse(content);
    const outcome = binding.validator.partition(items);
    const acceptedCount = outcome.accepted.length;
    const rejectedCount = outcome.rejected.length;

    eventBus.emit({
      type: 'file:validated',
      bucket,
      key,
      kind: binding.kind,
      acceptedCount,
      rejectedCount,
      timestamp: Date.now(),
    });

    const partitions = await this.deps.writer.write(bucket, key, binding.codec, outcome);
    const quality = await this.deps.quality.execute(bucket, key, { accepted: acceptedCount, rejected: rejectedCount });

    const result: ValidatedFile = {
      status: 'validated',
      bucket,
      key,
      kind: binding.kind,
      acceptedCount,
      rejectedCount,
      partitions,
      quality,
    };

    if (!shouldTrigger(acceptedCount)) return result;

    const runId = await this.deps.trigger.startJobRun(
      this.options.jobName,
      buildJobArguments({ ...this.options, bucket, quality }, this.deps.registry),
    );
    eventBus.emit({
      type: 'batch:triggered',
      jobName: this.options.jobName,
      runId,
      dqScore: quality.score,
      errorCount: quality.rejectedCount,
      timestamp: Date.now(),
    });

    return { ...result, runId };
  }

  private skip(bucket: string, key: string, reason: string): SkippedFile {
    this.deps.eventBus.emit({ type: 'file:skipped', bucket, key, reason, timestamp: Date.now() });
    return { status: 'skipped', bucket, key, reason };
  }
}
