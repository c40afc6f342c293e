import type { Sequelize } from 'sequelize';
import type { QualityCounterStore, QualityCounts } from '@customer360/core';
import { sumCounts } from '@customer360/core';
import { defineQualityCounterModel } from './models/QualityCounterModel.js';
import type { QualityCounterModel } from './models/QualityCounterModel.js';

export interface SequelizeQualityCounterStoreOptions {
  /** Default: `'customer360_quality_counters'`. */
  readonly tableName?: string;
}

/** Per-file quality counters backed by Sequelize v6, one row per source file. */
export class SequelizeQualityCounterStore implements QualityCounterStore {
  private readonly Counter: QualityCounterModel;

  constructor(sequelize: Sequelize, options?: SequelizeQualityCounterStoreOptions) {
    this.Counter = defineQualityCounterModel(sequelize, options?.tableName ?? 'customer360_quality_counters');
  }

  async initialize(): Promise<void> {
    await this.Counter.sync();
  }

  async recordFile(fileKey: string, counts: QualityCounts): Promise<QualityCounts> {
    await this.Counter.upsert({ fileKey, accepted: counts.accepted, rejected: counts.rejected });
    return this.totals();
  }

  async totals(): Promise<QualityCounts> {
    const rows = await this.Counter.findAll({ attributes: ['accepted', 'rejected'] });
    return sumCounts(rows.map((r) => r.get({ plain: true })));
  }
}
