import type { RunStatus } from './RunStatus.js';

/** Audit entry for one consolidation run. Created at start, updated once at completion. */
export interface RunRecord {
  readonly runId: string;
  readonly jobName: string;
  /** Epoch milliseconds. */
  readonly startTime: number;
  readonly status: RunStatus;
  readonly endTime?: number;
  /** Customers + joined purchases + joined feedback after deduplication. */
  readonly recordCount?: number;
  readonly dqScore: number;
  readonly errorCount: number;
  /** Message of the error that failed the run. */
  readonly error?: string;
}

/** Fields written when a run completes. */
export interface RunCompletion {
  readonly status: RunStatus;
  readonly endTime: number;
  readonly recordCount: number;
  readonly dqScore: number;
  readonly errorCount: number;
  readonly error?: string;
}
