import { DataTypes } from 'sequelize';
import type { Sequelize, ModelStatic, Model } from 'sequelize';

export interface ProfileRow {
  customerId: string;
  name: string;
  city: string;
  totalSpend: number | string;
  purchaseCount: number;
  lastPurchaseDate: string;
  avgRating: number | string;
  feedbackCount: number;
  sentiment: string;
}

export type ProfileModel = ModelStatic<Model<ProfileRow, ProfileRow>>;

export function defineProfileModel(sequelize: Sequelize, tableName: string): ProfileModel {
  return sequelize.define<Model<ProfileRow, ProfileRow>>(
    'Customer360Profile',
    {
      customerId: {
        type: DataTypes.STRING(64),
        primaryKey: true,
        allowNull: false,
        field: 'customer_id',
      },
      name: {
        type: DataTypes.STRING(255),
        allowNull: false,
      },
      city: {
        type: DataTypes.STRING(255),
        allowNull: false,
      },
      totalSpend: {
        type: DataTypes.DOUBLE,
        allowNull: false,
        field: 'total_spend',
      },
      purchaseCount: {
        type: DataTypes.INTEGER,
        allowNull: false,
        field: 'purchase_count',
      },
      lastPurchaseDate: {
        type: DataTypes.STRING(10),
        allowNull: false,
        field: 'last_purchase_date',
      },
      avgRating: {
        type: DataTypes.DOUBLE,
        allowNull: false,
        field: 'avg_rating',
      },
      feedbackCount: {
        type: DataTypes.INTEGER,
        allowNull: false,
        field: 'feedback_count',
      },
      sentiment: {
        type: DataTypes.STRING(16),
        allowNull: false,
      },
    },
    {
      tableName,
      timestamps: false,
    },
  );
}
