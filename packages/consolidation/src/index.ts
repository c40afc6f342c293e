// Main entry point
export { ConsolidationJob } from './ConsolidationJob.js';
export type { ConsolidationJobConfig } from './ConsolidationJob.js';

// Domain model
export type {
  ConsolidatedRow,
  EnrichedRow,
  JoinedPurchase,
  PurchaseAggregate,
  FeedbackAggregate,
} from './domain/model/ConsolidatedRow.js';

// Domain services
export { consolidate, aggregatePurchases, aggregateFeedback } from './domain/services/Consolidator.js';
export type { ConsolidationInput, ConsolidationResult } from './domain/services/Consolidator.js';
export { dedupeBy, customerKey, purchaseKey, feedbackKey } from './domain/services/Deduplicator.js';
export {
  buildPrompt,
  parseSentimentLabel,
  responseLines,
  matchPositional,
  matchTagged,
  resolveSentiment,
} from './domain/services/SentimentProtocol.js';
export { buildProfiles } from './domain/services/ProfileBuilder.js';

// Application
export { DatasetLoader } from './application/DatasetLoader.js';
export { SentimentEnricher } from './application/SentimentEnricher.js';
export type { SentimentEnricherOptions } from './application/SentimentEnricher.js';
export { RunTracker } from './application/RunTracker.js';
export type { RunTrackerOptions } from './application/RunTracker.js';
export { RunConsolidation } from './application/usecases/RunConsolidation.js';
export type { ConsolidationRunResult, RunConsolidationDeps } from './application/usecases/RunConsolidation.js';

// Infrastructure adapters
export { parseJobArguments } from './infrastructure/arguments/JobParameters.js';
export type { JobParameters } from './infrastructure/arguments/JobParameters.js';
export { InProcessBatchTrigger } from './infrastructure/trigger/InProcessBatchTrigger.js';
export { GenAiSentimentClassifier } from './infrastructure/classifiers/GenAiSentimentClassifier.js';
export type {
  GenAiSentimentClassifierOptions,
  GenerateContentClient,
} from './infrastructure/classifiers/GenAiSentimentClassifier.js';
