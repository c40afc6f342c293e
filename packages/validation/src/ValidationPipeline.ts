import type {
  BatchTrigger,
  DomainEvent,
  EventPayload,
  EventType,
  ObjectStore,
  PipelineConfig,
  QualityCounterStore,
} from '@customer360/core';
import { EventBus, InMemoryQualityCounterStore, defaultPipelineConfig, errorMessage } from '@customer360/core';
import type { FormatRegistry } from './domain/services/FormatRegistry.js';
import { PartitionRouter } from './domain/services/PartitionRouter.js';
import { PartitionWriter } from './application/PartitionWriter.js';
import { AggregateQualityScore } from './application/usecases/AggregateQualityScore.js';
import { ValidateFile } from './application/usecases/ValidateFile.js';
import type { FileResult } from './application/usecases/ValidateFile.js';
import { parseTriggerEvent } from './infrastructure/events/TriggerEvent.js';
import type { ObjectNotification } from './infrastructure/events/TriggerEvent.js';
import { createDefaultRegistry } from './defaultRegistry.js';

/** Configuration for the validation stage. */
export interface ValidationPipelineConfig {
  /** Storage holding raw objects and the partitions written from them. */
  readonly store: ObjectStore;
  /** Starts the consolidation job after a file with accepted records. */
  readonly trigger: BatchTrigger;
  /** Pipeline settings. Default: `defaultPipelineConfig()`. */
  readonly settings?: PipelineConfig;
  /** Per-file counters used in `incremental` score mode. Default: `InMemoryQualityCounterStore`. */
  readonly counters?: QualityCounterStore;
  /** Extension to format binding. Default: XML customers, JSON purchases, CSV feedback. */
  readonly registry?: FormatRegistry;
  /** Bus receiving every domain event. Default: a new `EventBus`. */
  readonly eventBus?: EventBus;
}

/** Result of handling one trigger event. */
export type HandleResult =
  | { readonly status: 'processed'; readonly files: readonly FileResult[] }
  | { readonly status: 'rejected'; readonly error: string };

/**
 * Facade for the validation stage: trigger event in, partitions and a quality
 * score out, consolidation job started when a file produced accepted data.
 *
 * @example
 * ```typescript
 * const pipeline = new ValidationPipeline({ store: new FileObjectStore(), trigger });
 * attachEventLogger(pipeline.events);
 * await pipeline.handle(notification);
 * ```
 */
export class ValidationPipeline {
  readonly events: EventBus;
  private readonly settings: PipelineConfig;
  private readonly validateFile: ValidateFile;
  private failures = 0;

  constructor(config: ValidationPipelineConfig) {
    this.events = config.eventBus ?? new EventBus();
    this.settings = config.settings ?? defaultPipelineConfig();
    const registry = config.registry ?? createDefaultRegistry();
    const router = new PartitionRouter(this.settings);

    const quality = new AggregateQualityScore(
      {
        store: config.store,
        counters: config.counters ?? new InMemoryQualityCounterStore(),
        registry,
        eventBus: this.events,
      },
      {
        mode: this.settings.scoreMode,
        acceptedPrefix: this.settings.acceptedPrefix,
        rejectedPrefix: this.settings.rejectedPrefix,
      },
    );

    this.validateFile = new ValidateFile(
      {
        store: config.store,
        registry,
        router,
        writer: new PartitionWriter(config.store, router, this.events),
        quality,
        trigger: config.trigger,
        eventBus: this.events,
      },
      this.settings,
    );
  }

  /**
   * Number of rejected events, failed files and files with at least one
   * rejected record since this instance was created.
   */
  get failureCount(): number {
    return this.failures;
  }

  /**
   * Handle an object-storage notification. Objects are processed one after the
   * other; a failing file does not stop the next one.
   */
  async handle(event: unknown): Promise<HandleResult> {
    let objects: ObjectNotification[];
    try {
      objects = parseTriggerEvent(event, this.settings.eventMode);
    } catch (error) {
      const message = errorMessage(error);
      this.failures++;
      this.events.emit({ type: 'event:rejected', error: message, timestamp: Date.now() });
      return { status: 'rejected', error: message };
    }

    const files: FileResult[] = [];
    for (const { bucket, key } of objects) {
      files.push(await this.processObject(bucket, key));
    }
    return { status: 'processed', files };
  }

  /** Validate a single object. File-level failures are reported in the result, never thrown. */
  async processObject(bucket: string, key: string): Promise<FileResult> {
    try {
      const result = await this.validateFile.execute(bucket, key);
      if (result.status === 'validated' && result.rejectedCount > 0) this.failures++;
      return result;
    } catch (error) {
      const message = errorMessage(error);
      this.failures++;
      this.events.emit({ type: 'file:failed', bucket, key, error: message, timestamp: Date.now() });
      return { status: 'failed', bucket, key, error: message };
    }
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
