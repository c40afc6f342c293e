import type { DuplicateRunPolicy, EventBus, RunRecord, RunStore, TerminalRunStatus } from '@customer360/core';
import { InvalidTransitionError, RunConflictError, RunStatus, canTransition } from '@customer360/core';

/** Result of asking for a new run: either it was recorded as RUNNING, or another run blocks it. */
export type RunAdmission =
  | { readonly status: 'started'; readonly run: RunRecord }
  | { readonly status: 'blocked'; readonly blocking: RunRecord };

const MAX_CREATE_ATTEMPTS = 5;

export interface RunTrackerOptions {
  readonly jobName: string;
  /** Default: `'allow'`. */
  readonly duplicateRunPolicy?: DuplicateRunPolicy;
  /** How long a RUNNING record blocks new runs under `skip-if-running`. Default: `900000`. */
  readonly runLeaseMs?: number;
  /** Clock in epoch ms. Default: `Date.now`. */
  readonly now?: () => number;
}

/** Records the lifecycle of consolidation runs in a `RunStore`. */
export class RunTracker {
  private readonly policy: DuplicateRunPolicy;
  private readonly leaseMs: number;
  private readonly now: () => number;
  private admissions: Promise<unknown> = Promise.resolve();

  constructor(
    private readonly store: RunStore,
    private readonly eventBus: EventBus,
    private readonly options: RunTrackerOptions,
  ) {
    this.policy = options.duplicateRunPolicy ?? 'allow';
    this.leaseMs = options.runLeaseMs ?? 900_000;
    this.now = options.now ?? Date.now;
  }

  /**
   * Check the duplicate-run policy, then allocate an id and record the run.
   *
   * Admissions through one tracker run one at a time, so the policy check and
   * the insert cannot interleave. An id taken by another writer between the
   * lookup and the insert is retried with the next suffix.
   */
  admit(dqScore: number, errorCount: number): Promise<RunAdmission> {
    const admission = this.admissions.then(() => this.admitNow(dqScore, errorCount));
    this.admissions = admission.catch(() => undefined);
    return admission;
  }

  private async admitNow(dqScore: number, errorCount: number): Promise<RunAdmission> {
    const blocking = await this.findBlockingRun();
    if (blocking) return { status: 'blocked', blocking };

    for (let attempt = 1; ; attempt++) {
      const runId = await this.allocateRunId();
      try {
        return { status: 'started', run: await this.start(runId, dqScore, errorCount) };
      } catch (error) {
        if (!(error instanceof RunConflictError) || attempt >= MAX_CREATE_ATTEMPTS) throw error;
      }
    }
  }

  /** `<jobName>_<yyyyMMddHHmmss>` in UTC, with `_2`, `_3`, ... appended while the id is taken. */
  async allocateRunId(): Promise<string> {
    const base = `${this.options.jobName}_${formatTimestamp(this.now())}`;
    let candidate = base;
    for (let suffix = 2; (await this.store.get(candidate)) !== null; suffix++) {
      candidate = `${base}_${String(suffix)}`;
    }
    return candidate;
  }

  /** The run that blocks a new one under the configured policy, if any. */
  async findBlockingRun(): Promise<RunRecord | null> {
    if (this.policy === 'allow') return null;
    return this.store.findRunning(this.options.jobName, this.now() - this.leaseMs);
  }

  async start(runId: string, dqScore: number, errorCount: number): Promise<RunRecord> {
    const record: RunRecord = {
      runId,
      jobName: this.options.jobName,
      startTime: this.now(),
      status: RunStatus.RUNNING,
      dqScore,
      errorCount,
    };
    await this.store.create(record);
    this.eventBus.emit({ type: 'run:started', runId, dqScore, errorCount, timestamp: Date.now() });
    return record;
  }

  /**
   * Move a RUNNING record to its final status.
   *
   * @throws InvalidTransitionError when the run is unknown or already finished.
   */
  async finish(
    runId: string,
    status: TerminalRunStatus,
    recordCount: number,
    dqScore: number,
    errorCount: number,
    error?: string,
  ): Promise<RunRecord> {
    const current = await this.store.get(runId);
    if (!current) {
      throw new InvalidTransitionError(`Run '${runId}' does not exist`);
    }
    if (!canTransition(current.status, status)) {
      throw new InvalidTransitionError(`Cannot move run '${runId}' from ${current.status} to ${status}`);
    }

    const completion = {
      status,
      endTime: this.now(),
      recordCount,
      dqScore,
      errorCount,
      ...(error !== undefined ? { error } : {}),
    };
    await this.store.complete(runId, completion);
    return { ...current, ...completion };
  }
}

function formatTimestamp(epochMs: number): string {
  const d = new Date(epochMs);
  const pad = (n: number): string => String(n).padStart(2, '0');
  return (
    String(d.getUTCFullYear()) +
    pad(d.getUTCMonth() + 1) +
    pad(d.getUTCDate()) +
    pad(d.getUTCHours()) +
    pad(d.getUTCMinutes()) +
    pad(d.getUTCSeconds())
  );
}
