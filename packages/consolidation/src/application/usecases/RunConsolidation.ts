import type { EventBus, ProfileSink } from '@customer360/core';
import { RunFailureError, RunStatus } from '@customer360/core';
import type { DatasetLoader } from '../DatasetLoader.js';
import type { RunTracker } from '../RunTracker.js';
import type { SentimentEnricher } from '../SentimentEnricher.js';
import type { JobParameters } from '../../infrastructure/arguments/JobParameters.js';
import { consolidate } from '../../domain/services/Consolidator.js';
import { buildProfiles } from '../../domain/services/ProfileBuilder.js';

/** Outcome of one consolidation request. */
export type ConsolidationRunResult =
  | { readonly status: 'SUCCESS'; readonly runId: string; readonly recordCount: number; readonly profileCount: number }
  | { readonly status: 'FAILED'; readonly runId: string; readonly error: string }
  | { readonly status: 'SKIPPED'; readonly activeRunId: string };

export interface RunConsolidationDeps {
  readonly loader: DatasetLoader;
  readonly enricher: SentimentEnricher;
  readonly tracker: RunTracker;
  readonly sink: ProfileSink;
  readonly eventBus: EventBus;
}

/**
 * Use case: one consolidation run.
 *
 * Load, deduplicate, join, aggregate, enrich, then overwrite the profile
 * table. Any error marks the run FAILED and leaves the table untouched; the
 * failure is returned, not thrown. Rejects only when the run cannot be
 * recorded in the tracking table.
 */
export class RunConsolidation {
  constructor(private readonly deps: RunConsolidationDeps) {}

  async execute(params: JobParameters): Promise<ConsolidationRunResult> {
    const { tracker, eventBus } = this.deps;

    const admission = await tracker.admit(params.dqScore, params.errorCount);
    if (admission.status === 'blocked') {
      const activeRunId = admission.blocking.runId;
      eventBus.emit({ type: 'run:skipped', jobName: params.jobName, activeRunId, timestamp: Date.now() });
      return { status: 'SKIPPED', activeRunId };
    }

    const { runId } = admission.run;
    const startedAt = Date.now();

    let recordCount = 0;
    try {
      const [customers, purchases, feedback] = await Promise.all([
        this.deps.loader.load('customer', params.customersPath),
        this.deps.loader.load('purchase', params.purchasesPath),
        this.deps.loader.load('feedback', params.feedbackPath),
      ]);

      const consolidated = consolidate({ customers, purchases, feedback });
      recordCount = consolidated.recordCount;

      const enriched = await this.deps.enricher.enrich(runId, consolidated.rows);
      const profiles = buildProfiles(enriched);
      await this.deps.sink.overwrite(profiles);

      await tracker.finish(runId, RunStatus.SUCCESS, recordCount, params.dqScore, params.errorCount);
      eventBus.emit({
        type: 'run:completed',
        runId,
        status: RunStatus.SUCCESS,
        recordCount,
        profileCount: profiles.length,
        elapsedMs: Date.now() - startedAt,
        timestamp: Date.now(),
      });
      return { status: 'SUCCESS', runId, recordCount, profileCount: profiles.length };
    } catch (error) {
      const failure = new RunFailureError(runId, error);
      await tracker.finish(
        runId,
        RunStatus.FAILED,
        recordCount,
        params.dqScore,
        params.errorCount,
        failure.message,
      );
      eventBus.emit({ type: 'run:failed', runId, error: failure.message, timestamp: Date.now() });
      return { status: 'FAILED', runId, error: failure.message };
    }
  }
}
