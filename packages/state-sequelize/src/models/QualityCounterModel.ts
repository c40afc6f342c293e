import { DataTypes } from 'sequelize';
import type { Sequelize, ModelStatic, Model } from 'sequelize';

export interface QualityCounterRow {
  fileKey: string;
  accepted: number;
  rejected: number;
}

export type QualityCounterModel = ModelStatic<Model<QualityCounterRow, QualityCounterRow>>;

export function defineQualityCounterModel(sequelize: Sequelize, tableName: string): QualityCounterModel {
  return sequelize.define<Model<QualityCounterRow, QualityCounterRow>>(
    'Customer360QualityCounter',
    {
      fileKey: {
        type: DataTypes.STRING(1024),
        primaryKey: true,
        allowNull: false,
        field: 'file_key',
      },
      accepted: {
        type: DataTypes.INTEGER,
        allowNull: false,
        defaultValue: 0,
      },
      rejected: {
        type: DataTypes.INTEGER,
        allowNull: false,
        defaultValue: 0,
      },
    },
    {
      tableName,
      timestamps: false,
    },
  );
}
