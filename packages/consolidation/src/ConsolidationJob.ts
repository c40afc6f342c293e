import type {
  ConsolidationStoreFactory,
  ConsolidationStores,
  DomainEvent,
  EventPayload,
  EventType,
  JobArguments,
  ObjectStore,
  PipelineConfig,
  ProfileSink,
  RunStore,
  SentimentClassifier,
} from '@customer360/core';
import { EventBus, InMemoryProfileSink, InMemoryRunStore, defaultPipelineConfig } from '@customer360/core';
import type { FormatRegistry } from '@customer360/validation';
import { createDefaultRegistry } from '@customer360/validation';
import { DatasetLoader } from './application/DatasetLoader.js';
import { RunTracker } from './application/RunTracker.js';
import { SentimentEnricher } from './application/SentimentEnricher.js';
import { RunConsolidation } from './application/usecases/RunConsolidation.js';
import type { ConsolidationRunResult } from './application/usecases/RunConsolidation.js';
import { parseJobArguments } from './infrastructure/arguments/JobParameters.js';
import type { JobParameters } from './infrastructure/arguments/JobParameters.js';

/** Configuration for the consolidation stage. */
export interface ConsolidationJobConfig {
  /** Storage holding the accepted partitions. */
  readonly store: ObjectStore;
  /** Text classification service used for sentiment enrichment. */
  readonly classifier: SentimentClassifier;
  /** Job-tracking table. Ignored when `stores` is set. Default: `InMemoryRunStore`. */
  readonly runStore?: RunStore;
  /** Consolidated profile table. Ignored when `stores` is set. Default: `InMemoryProfileSink`. */
  readonly sink?: ProfileSink;
  /**
   * Opens the stores named by each run's `--DATABASE_URL` and `--TRACKING_TABLE`
   * arguments and the configured `profileTable`. Stores are opened once per
   * distinct target and reused.
   */
  readonly stores?: ConsolidationStoreFactory;
  /** Pipeline settings (partitioning, correlation, duplicate-run policy). Default: `defaultPipelineConfig()`. */
  readonly settings?: PipelineConfig;
  /** Default: XML customers, JSON purchases, CSV feedback. */
  readonly registry?: FormatRegistry;
  /** Default: a new `EventBus`. */
  readonly eventBus?: EventBus;
  /** Clock in epoch ms, used for run ids and run timestamps. Default: `Date.now`. */
  readonly now?: () => number;
}

/**
 * Facade for the consolidation stage: job arguments in, one enriched profile
 * per customer out, every run recorded in the tracking table.
 *
 * @example
 * ```typescript
 * const job = new ConsolidationJob({ store, classifier: new GenAiSentimentClassifier({ apiKey }) });
 * const result = await job.run(args);
 * ```
 */
export class ConsolidationJob {
  readonly events: EventBus;
  private readonly settings: PipelineConfig;
  private readonly loader: DatasetLoader;
  private readonly enricher: SentimentEnricher;
  private readonly defaultStores: ConsolidationStores;
  private readonly storeFactory: ConsolidationStoreFactory | undefined;
  private readonly openStores = new Map<string, Promise<ConsolidationStores>>();
  private readonly trackers = new WeakMap<RunStore, Map<string, RunTracker>>();
  private readonly now: (() => number) | undefined;

  constructor(config: ConsolidationJobConfig) {
    this.events = config.eventBus ?? new EventBus();
    this.settings = config.settings ?? defaultPipelineConfig();
    this.defaultStores = {
      runStore: config.runStore ?? new InMemoryRunStore(),
      sink: config.sink ?? new InMemoryProfileSink(),
    };
    this.storeFactory = config.stores;
    this.now = config.now;
    this.loader = new DatasetLoader(config.store, config.registry ?? createDefaultRegistry());
    this.enricher = new SentimentEnricher(config.classifier, this.events, {
      partitionSize: this.settings.partitionSize,
      maxConcurrentPartitions: this.settings.maxConcurrentPartitions,
      correlation: this.settings.correlation,
    });
  }

  /**
   * Decode string-encoded arguments and run.
   *
   * Rejects with `ConfigurationError` when the arguments are invalid; no run is recorded then.
   */
  async run(args: JobArguments): Promise<ConsolidationRunResult> {
    return this.execute(parseJobArguments(args));
  }

  /**
   * Run with decoded parameters. Run failures are returned, not thrown.
   *
   * Rejects when the stores cannot be opened or the run cannot be recorded.
   */
  async execute(params: JobParameters): Promise<ConsolidationRunResult> {
    const { runStore, sink } = await this.resolveStores(params);

    return new RunConsolidation({
      loader: this.loader,
      enricher: this.enricher,
      tracker: this.trackerFor(runStore, params.jobName),
      sink,
      eventBus: this.events,
    }).execute(params);
  }

  private resolveStores(params: JobParameters): Promise<ConsolidationStores> {
    const factory = this.storeFactory;
    if (!factory) return Promise.resolve(this.defaultStores);

    const target = {
      databaseUrl: params.databaseUrl,
      trackingTable: params.trackingTable,
      profileTable: this.settings.profileTable,
    };
    const key = JSON.stringify([target.databaseUrl, target.trackingTable, target.profileTable]);
    const cached = this.openStores.get(key);
    if (cached) return cached;

    const opening = factory(target).catch((error: unknown) => {
      this.openStores.delete(key);
      throw error;
    });
    this.openStores.set(key, opening);
    return opening;
  }

  /** One tracker per store and job name, so concurrent runs of a job are admitted one at a time. */
  private trackerFor(runStore: RunStore, jobName: string): RunTracker {
    let byJob = this.trackers.get(runStore);
    if (!byJob) {
      byJob = new Map();
      this.trackers.set(runStore, byJob);
    }
    let tracker = byJob.get(jobName);
    if (!tracker) {
      tracker = new RunTracker(runStore, this.events, {
        jobName,
        duplicateRunPolicy: this.settings.duplicateRunPolicy,
        runLeaseMs: this.settings.runLeaseMs,
        ...(this.now ? { now: this.now } : {}),
      });
      byJob.set(jobName, tracker);
    }
    return tracker;
  }

  /** Subscribe to a domain event. */
  on<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.events.on(type, handler);
    return this;
  }

  /** Subscribe to every domain event. */
  onAny(handler: (event: DomainEvent) => void): this {
    this.events.onAny(handler);
    return this;
  }
}
