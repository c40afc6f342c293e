import type { RunCompletion, RunRecord } from '@customer360/core';
import { isRunStatus } from '@customer360/core';
import type { RunRow } from '../models/RunModel.js';
import { parseNumeric } from '../utils/parseNumeric.js';

export function toRow(record: RunRecord): RunRow {
  return {
    runId: record.runId,
    jobName: record.jobName,
    startTime: record.startTime,
    status: record.status,
    endTime: record.endTime ?? null,
    recordCount: record.recordCount ?? null,
    dqScore: record.dqScore,
    errorCount: record.errorCount,
    error: record.error ?? null,
  };
}

export type CompletionRow = Pick<RunRow, 'status' | 'endTime' | 'recordCount' | 'dqScore' | 'errorCount' | 'error'>;

export function completionToRow(completion: RunCompletion): CompletionRow {
  return {
    status: completion.status,
    endTime: completion.endTime,
    recordCount: completion.recordCount,
    dqScore: completion.dqScore,
    errorCount: completion.errorCount,
    error: completion.error ?? null,
  };
}

export function toDomain(row: RunRow): RunRecord {
  if (!isRunStatus(row.status)) {
    throw new Error(`Run '${row.runId}' has an unknown status '${row.status}'`);
  }

  return {
    runId: row.runId,
    jobName: row.jobName,
    startTime: parseNumeric(row.startTime, 'start_time'),
    status: row.status,
    ...(row.endTime !== null ? { endTime: parseNumeric(row.endTime, 'end_time') } : {}),
    ...(row.recordCount !== null ? { recordCount: row.recordCount } : {}),
    dqScore: parseNumeric(row.dqScore, 'dq_score'),
    errorCount: row.errorCount,
    ...(row.error !== null ? { error: row.error } : {}),
  };
}
