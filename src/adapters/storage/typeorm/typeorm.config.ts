import { DataSource, DataSourceOptions } from 'typeorm';
import {
  OrderEntity,
  AuditLogEntity,
  ProcessedEventEntity,
  AffiliateLedgerEntity,
} from './entities';

export const FULFILLMENT_ENTITIES = [
  OrderEntity,
  AuditLogEntity,
  ProcessedEventEntity,
  AffiliateLedgerEntity,
];

/**
 * TypeORM configuration for the order store (PostgreSQL)
 */
export const createTypeORMConfig = (
  options: Partial<PostgresConnectionSettings> = {},
): DataSourceOptions => {
  return {
    type: 'postgres',
    host: options.host ?? process.env.DB_HOST ?? 'localhost',
    port: options.port ?? parseInt(process.env.DB_PORT || '5432', 10),
    username: options.username ?? process.env.DB_USERNAME ?? 'fulfillment',
    password: options.password ?? process.env.DB_PASSWORD ?? 'fulfillment',
    database: options.database ?? process.env.DB_NAME ?? 'fulfillment',
    entities: FULFILLMENT_ENTITIES,
    synchronize: options.synchronize ?? process.env.NODE_ENV === 'development',
    logging: options.logging ?? process.env.DB_LOGGING === 'true',
    // Connection pool settings
    extra: {
      max: options.poolSize ?? parseInt(process.env.DB_POOL_SIZE || '10', 10),
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 2000,
    },
  };
};

export interface PostgresConnectionSettings {
  host: string;
  port: number;
  username: string;
  password: string;
  database: string;
  synchronize: boolean;
  logging: boolean;
  poolSize: number;
}

/**
 * In-memory SQLite store, used by tests and local runs
 */
export const createSqliteConfig = (database = ':memory:'): DataSourceOptions => ({
  type: 'better-sqlite3',
  database,
  entities: FULFILLMENT_ENTITIES,
  synchronize: true,
  logging: false,
});

/**
 * Create TypeORM DataSource
 */
export const createDataSource = (options: DataSourceOptions = createTypeORMConfig()): DataSource => {
  return new DataSource(options);
};
