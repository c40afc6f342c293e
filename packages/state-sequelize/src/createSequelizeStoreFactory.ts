import { Sequelize } from 'sequelize';
import type { ConsolidationStoreFactory } from '@customer360/core';
import { ConfigurationError } from '@customer360/core';
import { SequelizeProfileSink } from './SequelizeProfileSink.js';
import { SequelizeRunStore } from './SequelizeRunStore.js';

/**
 * Store factory for `ConsolidationJob`: one connection per database URL, with
 * the tracking and profile tables created on first use.
 *
 * @param connect - Opens a connection for a URL. Default: `new Sequelize(url, { logging: false })`.
 */
export function createSequelizeStoreFactory(
  connect: (databaseUrl: string) => Sequelize = (databaseUrl) => new Sequelize(databaseUrl, { logging: false }),
): ConsolidationStoreFactory {
  const connections = new Map<string, Sequelize>();

  return async (target) => {
    if (target.databaseUrl === '') {
      throw new ConfigurationError('A database URL is required to open the tracking and profile tables');
    }

    let sequelize = connections.get(target.databaseUrl);
    if (!sequelize) {
      sequelize = connect(target.databaseUrl);
      connections.set(target.databaseUrl, sequelize);
    }

    const runStore = new SequelizeRunStore(sequelize, { tableName: target.trackingTable });
    const sink = new SequelizeProfileSink(sequelize, { tableName: target.profileTable });
    await runStore.initialize();
    await sink.initialize();
    return { runStore, sink };
  };
}
