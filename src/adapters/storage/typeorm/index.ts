/**
 * TypeORM storage adapter for PostgreSQL
 */

export { TypeORMStorageAdapter, isUniqueViolation } from './typeorm-storage.adapter';
export {
  createDataSource,
  createTypeORMConfig,
  createSqliteConfig,
  FULFILLMENT_ENTITIES,
} from './typeorm.config';
export type { PostgresConnectionSettings } from './typeorm.config';
export * from './entities';
