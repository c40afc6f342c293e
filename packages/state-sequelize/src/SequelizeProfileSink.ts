import type { Sequelize } from 'sequelize';
import type { CustomerProfile, ProfileSink } from '@customer360/core';
import { defineProfileModel } from './models/ProfileModel.js';
import type { ProfileModel } from './models/ProfileModel.js';
import * as ProfileMapper from './mappers/ProfileMapper.js';

export interface SequelizeProfileSinkOptions {
  /** Default: `'customer360_golden'`. */
  readonly tableName?: string;
}

/**
 * Consolidated profile table backed by Sequelize v6. Each `overwrite()`
 * replaces the table contents inside one transaction.
 */
export class SequelizeProfileSink implements ProfileSink {
  private readonly sequelize: Sequelize;
  private readonly Profile: ProfileModel;

  constructor(sequelize: Sequelize, options?: SequelizeProfileSinkOptions) {
    this.sequelize = sequelize;
    this.Profile = defineProfileModel(sequelize, options?.tableName ?? 'customer360_golden');
  }

  async initialize(): Promise<void> {
    await this.Profile.sync();
  }

  async overwrite(profiles: readonly CustomerProfile[]): Promise<void> {
    const rows = profiles.map(ProfileMapper.toRow);
    await this.sequelize.transaction(async (transaction) => {
      await this.Profile.destroy({ where: {}, transaction });
      if (rows.length > 0) {
        await this.Profile.bulkCreate(rows, { transaction });
      }
    });
  }

  /** Current table contents ordered by customer id. */
  async read(): Promise<CustomerProfile[]> {
    const rows = await this.Profile.findAll({ order: [['customerId', 'ASC']] });
    return rows.map((r) => ProfileMapper.toDomain(r.get({ plain: true })));
  }
}
