/**
 * TypeORM DataSource
 *
 * PostgreSQL in production, SQLite (better-sqlite3) for tests and local runs.
 * Both run the same migrations; schema sync is never used.
 */

import 'reflect-metadata';
import { DataSource } from 'typeorm';
import type { DataSourceOptions } from 'typeorm';
import { config, type Config } from '@shared/config/index.js';
import { logger } from '@shared/utils/logger.js';
import { User } from './entities/User.js';
import { Post } from './entities/Post.js';
import { Follow } from './entities/Follow.js';
import { migrations } from './migrations/index.js';

export const entities = [User, Post, Follow];

export function buildDataSourceOptions(cfg: Config = config): DataSourceOptions {
  if (cfg.databaseType === 'postgres') {
    if (!cfg.postgresHost || !cfg.postgresDatabase) {
      throw new Error('PostgreSQL configuration is missing. Please set POSTGRES_HOST and POSTGRES_DATABASE in .env');
    }
    return {
      type: 'postgres',
      host: cfg.postgresHost,
      port: cfg.postgresPort,
      username: cfg.postgresUser,
      password: cfg.postgresPassword,
      database: cfg.postgresDatabase,
      ssl: cfg.postgresSsl,
      entities,
      migrations,
      migrationsRun: false,
      synchronize: false,
      extra: {
        max: 20,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 2000,
      },
    };
  }

  return {
    type: 'better-sqlite3',
    database: cfg.sqlitePath,
    entities,
    migrations,
    migrationsRun: false,
    synchronize: false,
  };
}

let dataSource: DataSource | null = null;
let initializing: Promise<DataSource> | null = null;

async function initialize(options: DataSourceOptions): Promise<DataSource> {
  const ds = new DataSource(options);
  await ds.initialize();
  // In-memory databases start empty on every connection
  if (options.type === 'better-sqlite3' && options.database === ':memory:') {
    await ds.runMigrations({ transaction: 'all' });
  }
  logger.debug(`DataSource initialized (${options.type})`);
  return ds;
}

/**
 * Lazily initialized, process-wide DataSource
 */
export async function getDataSource(): Promise<DataSource> {
  if (dataSource?.isInitialized) return dataSource;
  if (!initializing) {
    initializing = initialize(buildDataSourceOptions())
      .then((ds) => {
        dataSource = ds;
        return ds;
      })
      .finally(() => {
        initializing = null;
      });
  }
  return initializing;
}

export async function closeDataSource(): Promise<void> {
  if (dataSource?.isInitialized) {
    await dataSource.destroy();
  }
  dataSource = null;
}
