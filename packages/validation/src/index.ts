// Main entry point
export { ValidationPipeline } from './ValidationPipeline.js';
export type { ValidationPipelineConfig, HandleResult } from './ValidationPipeline.js';
export { createDefaultRegistry } from './defaultRegistry.js';

// Domain model
export type { FieldDefinition, FieldType } from './domain/model/FieldDefinition.js';
export type { RecordSchema } from './domain/model/RecordSchema.js';
export { ValidatedFields } from './domain/model/RecordSchema.js';
export { CUSTOMER_SCHEMA, PURCHASE_SCHEMA, FEEDBACK_SCHEMA } from './domain/schemas.js';

// Domain services
export { RecordValidator } from './domain/services/RecordValidator.js';
export type { ValidationOutcome } from './domain/services/RecordValidator.js';
export { FormatRegistry } from './domain/services/FormatRegistry.js';
export type { FormatBinding, FormatBindings } from './domain/services/FormatRegistry.js';
export { PartitionRouter } from './domain/services/PartitionRouter.js';
export type { PartitionPrefixes } from './domain/services/PartitionRouter.js';
export { shouldTrigger, buildJobArguments } from './domain/services/TriggerPolicy.js';
export type { JobArgumentsInput } from './domain/services/TriggerPolicy.js';

// Domain ports
export type { RecordCodec, ParsedItem, SourceFormat } from './domain/ports/RecordCodec.js';

// Application
export { PartitionWriter } from './application/PartitionWriter.js';
export type { WrittenPartitions } from './application/PartitionWriter.js';
export { AggregateQualityScore } from './application/usecases/AggregateQualityScore.js';
export type {
  AggregateQualityScoreDeps,
  AggregateQualityScoreOptions,
} from './application/usecases/AggregateQualityScore.js';
export { ValidateFile } from './application/usecases/ValidateFile.js';
export type { FileResult, ValidatedFile, SkippedFile, FailedFile } from './application/usecases/ValidateFile.js';

// Infrastructure adapters
export { XmlCodec } from './infrastructure/codecs/XmlCodec.js';
export type { XmlCodecOptions } from './infrastructure/codecs/XmlCodec.js';
export { JsonCodec } from './infrastructure/codecs/JsonCodec.js';
export type { JsonCodecOptions } from './infrastructure/codecs/JsonCodec.js';
export { CsvCodec } from './infrastructure/codecs/CsvCodec.js';
export type { CsvCodecOptions } from './infrastructure/codecs/CsvCodec.js';
export { parseTriggerEvent, decodeObjectKey } from './infrastructure/events/TriggerEvent.js';
export type { TriggerEvent, ObjectNotification } from './infrastructure/events/TriggerEvent.js';
