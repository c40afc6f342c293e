import { DataTypes } from 'sequelize';
import type { Sequelize, ModelStatic, Model } from 'sequelize';

export interface RunRow {
  runId: string;
  jobName: string;
  startTime: number | string;
  status: string;
  endTime: number | string | null;
  recordCount: number | null;
  dqScore: number | string;
  errorCount: number;
  error: string | null;
}

export type RunModel = ModelStatic<Model<RunRow, RunRow>>;

export function defineRunModel(sequelize: Sequelize, tableName: string): RunModel {
  return sequelize.define<Model<RunRow, RunRow>>(
    'Customer360Run',
    {
      runId: {
        type: DataTypes.STRING(128),
        primaryKey: true,
        allowNull: false,
        field: 'job_id',
      },
      jobName: {
        type: DataTypes.STRING(128),
        allowNull: false,
        field: 'job_name',
      },
      startTime: {
        type: DataTypes.BIGINT,
        allowNull: false,
        field: 'start_time',
      },
      status: {
        type: DataTypes.STRING(20),
        allowNull: false,
      },
      endTime: {
        type: DataTypes.BIGINT,
        allowNull: true,
        field: 'end_time',
      },
      recordCount: {
        type: DataTypes.INTEGER,
        allowNull: true,
        field: 'record_count',
      },
      dqScore: {
        type: DataTypes.DOUBLE,
        allowNull: false,
        field: 'dq_score',
      },
      errorCount: {
        type: DataTypes.INTEGER,
        allowNull: false,
        field: 'error_count',
      },
      error: {
        type: DataTypes.TEXT,
        allowNull: true,
      },
    },
    {
      tableName,
      timestamps: false,
      indexes: [{ fields: ['job_name', 'status'] }],
    },
  );
}
