import type { RecordKind } from '../model/Record.js';
import type { QualityScore } from '../model/QualityScore.js';
import type { RunStatus } from '../model/RunStatus.js';

/** Emitted when a trigger event names an object to validate. */
export interface FileReceivedEvent {
  readonly type: 'file:received';
  readonly bucket: string;
  readonly key: string;
  readonly timestamp: number;
}

/** Emitted when an object is ignored (unsupported extension, outside the raw prefix). */
export interface FileSkippedEvent {
  readonly type: 'file:skipped';
  readonly bucket: string;
  readonly key: string;
  readonly reason: string;
  readonly timestamp: number;
}

/** Emitted after a file has been parsed, validated and partitioned. */
export interface FileValidatedEvent {
  readonly type: 'file:validated';
  readonly bucket: string;
  readonly key: string;
  readonly kind: RecordKind;
  readonly acceptedCount: number;
  readonly rejectedCount: number;
  readonly timestamp: number;
}

/** Emitted when a file cannot be read or parsed as a whole. */
export interface FileFailedEvent {
  readonly type: 'file:failed';
  readonly bucket: string;
  readonly key: string;
  readonly error: string;
  readonly timestamp: number;
}

/** Emitted for each partition object written. */
export interface PartitionWrittenEvent {
  readonly type: 'partition:written';
  readonly bucket: string;
  readonly key: string;
  readonly outcome: 'accepted' | 'rejected';
  readonly recordCount: number;
  readonly timestamp: number;
}

/** Emitted once the corpus-wide quality score is known for an invocation. */
export interface QualityComputedEvent {
  readonly type: 'quality:computed';
  readonly mode: 'incremental' | 'rescan';
  readonly quality: QualityScore;
  readonly timestamp: number;
}

/** Emitted when the consolidation job has been asked to start. */
export interface BatchTriggeredEvent {
  readonly type: 'batch:triggered';
  readonly jobName: string;
  readonly runId: string;
  readonly dqScore: number;
  readonly errorCount: number;
  readonly timestamp: number;
}

/** Emitted when a trigger event is missing or malformed. */
export interface EventRejectedEvent {
  readonly type: 'event:rejected';
  readonly error: string;
  readonly timestamp: number;
}

export interface RunStartedEvent {
  readonly type: 'run:started';
  readonly runId: string;
  readonly dqScore: number;
  readonly errorCount: number;
  readonly timestamp: number;
}

export interface RunCompletedEvent {
  readonly type: 'run:completed';
  readonly runId: string;
  readonly status: RunStatus;
  readonly recordCount: number;
  readonly profileCount: number;
  readonly elapsedMs: number;
  readonly timestamp: number;
}

export interface RunFailedEvent {
  readonly type: 'run:failed';
  readonly runId: string;
  readonly error: string;
  readonly timestamp: number;
}

/** Emitted when a run is not started because another run of the same job holds the lease. */
export interface RunSkippedEvent {
  readonly type: 'run:skipped';
  readonly jobName: string;
  readonly activeRunId: string;
  readonly timestamp: number;
}

/** Emitted after each enrichment partition has been classified. */
export interface EnrichmentPartitionEvent {
  readonly type: 'enrichment:partition';
  readonly runId: string;
  readonly partitionIndex: number;
  readonly rowCount: number;
  readonly unknownCount: number;
  readonly timestamp: number;
}

/** Emitted when the classifier answered with a different number of lines than it was sent. */
export interface EnrichmentMismatchEvent {
  readonly type: 'enrichment:mismatch';
  readonly runId: string;
  readonly partitionIndex: number;
  readonly requestedLines: number;
  readonly receivedLines: number;
  readonly timestamp: number;
}

/** Discriminated union of all domain events. */
export type DomainEvent =
  | FileReceivedEvent
  | FileSkippedEvent
  | FileValidatedEvent
  | FileFailedEvent
  | PartitionWrittenEvent
  | QualityComputedEvent
  | BatchTriggeredEvent
  | EventRejectedEvent
  | RunStartedEvent
  | RunCompletedEvent
  | RunFailedEvent
  | RunSkippedEvent
  | EnrichmentPartitionEvent
  | EnrichmentMismatchEvent;

/** String literal union of all event type names. */
export type EventType = DomainEvent['type'];

/** Extract the payload type for a specific event type. */
export type EventPayload<T extends EventType> = Extract<DomainEvent, { type: T }>;
