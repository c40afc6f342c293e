// Domain model
export type {
  RawRecord,
  CustomerRecord,
  PurchaseRecord,
  FeedbackRecord,
  TypedRecordMap,
  ProcessedRecord,
  RecordStatus,
} from './domain/model/Record.js';
export { RecordKind, acceptRecord, rejectRecord, isEmptyRow } from './domain/model/Record.js';
export type { ValidationResult, ValidationError, ValidationErrorCode } from './domain/model/ValidationResult.js';
export { validResult, invalidResult, describeErrors } from './domain/model/ValidationResult.js';
export type { QualityScore, QualityCounts } from './domain/model/QualityScore.js';
export { computeQualityScore, sumCounts } from './domain/model/QualityScore.js';
export { RunStatus, canTransition, isRunStatus } from './domain/model/RunStatus.js';
export type { TerminalRunStatus } from './domain/model/RunStatus.js';
export type { RunRecord, RunCompletion } from './domain/model/RunRecord.js';
export { Sentiment } from './domain/model/CustomerProfile.js';
export type { CustomerProfile } from './domain/model/CustomerProfile.js';

// Errors
export {
  PipelineError,
  MalformedFileError,
  EventShapeError,
  RunFailureError,
  ConfigurationError,
  InvalidTransitionError,
  RunConflictError,
  errorMessage,
} from './domain/errors.js';
export type { PipelineErrorCode } from './domain/errors.js';

// Domain services
export { Partitioner } from './domain/services/Partitioner.js';
export type { Partition } from './domain/services/Partitioner.js';

// Ports
export type { ObjectStore, ObjectLocation } from './domain/ports/ObjectStore.js';
export { parseObjectUri, formatObjectUri } from './domain/ports/ObjectStore.js';
export type { RunStore } from './domain/ports/RunStore.js';
export type { ProfileSink } from './domain/ports/ProfileSink.js';
export type { StoreTarget, ConsolidationStores, ConsolidationStoreFactory } from './domain/ports/StoreFactory.js';
export type { QualityCounterStore } from './domain/ports/QualityCounterStore.js';
export type { SentimentClassifier } from './domain/ports/SentimentClassifier.js';
export type { BatchTrigger, JobArguments } from './domain/ports/BatchTrigger.js';
export { JobArgument } from './domain/ports/BatchTrigger.js';

// Domain events
export type {
  DomainEvent,
  EventType,
  EventPayload,
  FileReceivedEvent,
  FileSkippedEvent,
  FileValidatedEvent,
  FileFailedEvent,
  PartitionWrittenEvent,
  QualityComputedEvent,
  BatchTriggeredEvent,
  EventRejectedEvent,
  RunStartedEvent,
  RunCompletedEvent,
  RunFailedEvent,
  RunSkippedEvent,
  EnrichmentPartitionEvent,
  EnrichmentMismatchEvent,
} from './domain/events/DomainEvents.js';
export { EventBus, isEventOf } from './application/EventBus.js';
export type { EventBusOptions, EventHandler, Unsubscribe, WildcardHandler } from './application/EventBus.js';

// Configuration
export {
  loadPipelineConfig,
  defaultPipelineConfig,
  pipelineConfigSchema,
  eventModes,
  scoreModes,
  correlationModes,
  duplicateRunPolicies,
} from './config/PipelineConfig.js';
export type {
  PipelineConfig,
  EventMode,
  ScoreMode,
  CorrelationMode,
  DuplicateRunPolicy,
} from './config/PipelineConfig.js';

// Infrastructure adapters
export { InMemoryObjectStore } from './infrastructure/storage/InMemoryObjectStore.js';
export { FileObjectStore } from './infrastructure/storage/FileObjectStore.js';
export type { FileObjectStoreOptions } from './infrastructure/storage/FileObjectStore.js';
export { InMemoryRunStore } from './infrastructure/state/InMemoryRunStore.js';
export { InMemoryQualityCounterStore } from './infrastructure/state/InMemoryQualityCounterStore.js';
export { InMemoryProfileSink } from './infrastructure/state/InMemoryProfileSink.js';
export { attachEventLogger, formatEvent } from './infrastructure/logging/EventLogger.js';
export type { EventLogSink } from './infrastructure/logging/EventLogger.js';
