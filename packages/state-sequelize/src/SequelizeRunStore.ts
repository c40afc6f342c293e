import { Op, UniqueConstraintError } from 'sequelize';
import type { Sequelize } from 'sequelize';
import type { RunCompletion, RunRecord, RunStore } from '@customer360/core';
import { RunConflictError, RunStatus } from '@customer360/core';
import { defineRunModel } from './models/RunModel.js';
import type { RunModel } from './models/RunModel.js';
import * as RunMapper from './mappers/RunMapper.js';

export interface SequelizeRunStoreOptions {
  /** Default: `'customer360_etl_tracking'`. */
  readonly tableName?: string;
}

/**
 * Job-tracking table backed by Sequelize v6.
 *
 * Columns are snake_case (`job_id`, `start_time`, `status`, `end_time`,
 * `record_count`, `dq_score`, `error_count`, `error`); timestamps are epoch
 * milliseconds. Call `initialize()` after construction to create the table.
 */
export class SequelizeRunStore implements RunStore {
  private readonly Run: RunModel;

  constructor(sequelize: Sequelize, options?: SequelizeRunStoreOptions) {
    this.Run = defineRunModel(sequelize, options?.tableName ?? 'customer360_etl_tracking');
  }

  async initialize(): Promise<void> {
    await this.Run.sync();
  }

  async create(record: RunRecord): Promise<void> {
    try {
      await this.Run.create(RunMapper.toRow(record));
    } catch (error) {
      if (error instanceof UniqueConstraintError) {
        throw new RunConflictError(record.runId);
      }
      throw error;
    }
  }

  async complete(runId: string, completion: RunCompletion): Promise<void> {
    const [updated] = await this.Run.update(RunMapper.completionToRow(completion), { where: { runId } });
    if (updated === 0) {
      throw new Error(`Run '${runId}' not found`);
    }
  }

  async get(runId: string): Promise<RunRecord | null> {
    const row = await this.Run.findByPk(runId);
    if (!row) return null;
    return RunMapper.toDomain(row.get({ plain: true }));
  }

  async findRunning(jobName: string, since: number): Promise<RunRecord | null> {
    const row = await this.Run.findOne({
      where: { jobName, status: RunStatus.RUNNING, startTime: { [Op.gte]: since } },
      order: [['startTime', 'DESC']],
    });
    if (!row) return null;
    return RunMapper.toDomain(row.get({ plain: true }));
  }
}
