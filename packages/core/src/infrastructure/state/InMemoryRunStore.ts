import { RunConflictError } from '../../domain/errors.js';
import type { RunStore } from '../../domain/ports/RunStore.js';
import type { RunRecord, RunCompletion } from '../../domain/model/RunRecord.js';

/** Non-persistent run store. Used as the default when no tracking table is configured. */
export class InMemoryRunStore implements RunStore {
  private readonly runs = new Map<string, RunRecord>();

  create(record: RunRecord): Promise<void> {
    if (this.runs.has(record.runId)) {
      return Promise.reject(new RunConflictError(record.runId));
    }
    this.runs.set(record.runId, record);
    return Promise.resolve();
  }

  complete(runId: string, completion: RunCompletion): Promise<void> {
    const existing = this.runs.get(runId);
    if (!existing) {
      return Promise.reject(new Error(`Run '${runId}' not found`));
    }
    this.runs.set(runId, { ...existing, ...completion });
    return Promise.resolve();
  }

  get(runId: string): Promise<RunRecord | null> {
    return Promise.resolve(this.runs.get(runId) ?? null);
  }

  findRunning(jobName: string, since: number): Promise<RunRecord | null> {
    const candidates = [...this.runs.values()]
      .filter((r) => r.jobName === jobName && r.status === 'RUNNING' && r.startTime >= since)
      .sort((a, b) => b.startTime - a.startTime);
    return Promise.resolve(candidates[0] ?? null);
  }

  /** All runs in insertion order. */
  all(): readonly RunRecord[] {
    return [...this.runs.values()];
  }
}
