/**
 * Storage Adapters
 *
 * PostgreSQL persistence for the flow tables.
 *
 * @module packages/adapters/storage
 */

export {
  PostgresFlowTableStorage,
  FLOW_SCHEMA_DDL,
  TABLE_NAMES,
  buildUpsertSql,
  buildBulkInsertSql,
  type PostgresFlowTableStorageConfig,
  type SqlClient,
  type SqlPool,
} from './pg-flow-table-storage.js';

export {
  buildPoolConfig,
  createFlowTablePool,
  createPostgresStorageFactory,
  getPoolHealth,
  type FlowTablePoolOptions,
  type PoolHealthMetrics,
} from './pool-config.js';
