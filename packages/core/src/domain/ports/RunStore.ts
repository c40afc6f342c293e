import type { RunRecord, RunCompletion } from '../model/RunRecord.js';

/**
 * Port for the job-tracking table.
 *
 * Records are keyed by `runId`. The pipeline never deletes records; retention
 * is the store's concern.
 */
export interface RunStore {
  /** Persist a new run record. Rejects with `RunConflictError` when `runId` already exists. */
  create(record: RunRecord): Promise<void>;
  /** Apply the completion fields to an existing record. Rejects when it does not exist. */
  complete(runId: string, completion: RunCompletion): Promise<void>;
  get(runId: string): Promise<RunRecord | null>;
  /** Most recent `RUNNING` record of `jobName` started at or after `since` (epoch ms). */
  findRunning(jobName: string, since: number): Promise<RunRecord | null>;
}
