import { DataSource, DataSourceOptions } from 'typeorm';
import { StoredRecordEntity } from './entities';

export interface TypeORMStoreOptions {
  /**
   * PostgreSQL connection string
   */
  url: string;
  synchronize?: boolean;
  logging?: boolean;
}

/**
 * TypeORM configuration for the record table
 */
export const createTypeORMConfig = (
  options: TypeORMStoreOptions,
): DataSourceOptions => ({
  type: 'postgres',
  url: options.url,
  entities: [StoredRecordEntity],
  synchronize: options.synchronize ?? true,
  logging: options.logging ?? process.env.DB_LOGGING === 'true',
  // Connection pool settings
  extra: {
    max: parseInt(process.env.DB_POOL_SIZE || '10', 10),
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 2000,
  },
});

/**
 * Create TypeORM DataSource
 */
export const createDataSource = (options: TypeORMStoreOptions): DataSource => {
  return new DataSource(createTypeORMConfig(options));
};
