/**
 * Flow Table Pool Configuration
 *
 * Creates the pg Pool the table storage writes through and wires one
 * storage instance per device onto it.
 *
 * @module packages/adapters/storage/pool-config
 */

import { Pool, type PoolConfig } from 'pg';
import type { Logger } from 'pino';
import type { IFlowTableStorage } from '@flowmesh/core/ports';
import { PostgresFlowTableStorage, type SqlPool } from './pg-flow-table-storage.js';

// --------------------------------------------------------------------------
// Types
// --------------------------------------------------------------------------

export interface FlowTablePoolOptions {
  /** Maximum pool size */
  maxConnections?: number;
  /** Idle timeout in milliseconds */
  idleTimeoutMs?: number;
  /** Connection timeout in milliseconds */
  connectionTimeoutMs?: number;
  /** Statement timeout in milliseconds (per query) */
  statementTimeoutMs?: number;
}

/** Pool health metrics */
export interface PoolHealthMetrics {
  totalCount: number;
  idleCount: number;
  activeCount: number;
  waitingCount: number;
}

// --------------------------------------------------------------------------
// Constants
// --------------------------------------------------------------------------

const DEFAULT_POOL: Required<FlowTablePoolOptions> = {
  maxConnections: 10,
  idleTimeoutMs: 60_000,
  connectionTimeoutMs: 5_000,
  statementTimeoutMs: 30_000,
};

// --------------------------------------------------------------------------
// Factories
// --------------------------------------------------------------------------

/**
 * Build the pg PoolConfig for the flow tables.
 */
export function buildPoolConfig(databaseUrl: string, options: FlowTablePoolOptions = {}): PoolConfig {
  const settings = { ...DEFAULT_POOL, ...options };
  return {
    connectionString: databaseUrl,
    max: settings.maxConnections,
    idleTimeoutMillis: settings.idleTimeoutMs,
    connectionTimeoutMillis: settings.connectionTimeoutMs,
    statement_timeout: settings.statementTimeoutMs,
    // Application name for pg_stat_activity
    application_name: 'flowmesh-engine',
  };
}

export function createFlowTablePool(databaseUrl: string, options?: FlowTablePoolOptions): Pool {
  return new Pool(buildPoolConfig(databaseUrl, options));
}

/**
 * Per-device storage factory sharing one pool.
 */
export function createPostgresStorageFactory(
  pool: SqlPool,
  logger: Logger
): (deviceId: string) => IFlowTableStorage {
  return (deviceId) => new PostgresFlowTableStorage({ pool, deviceId, logger });
}

/**
 * Pool health for monitoring.
 */
export function getPoolHealth(pool: Pick<Pool, 'totalCount' | 'idleCount' | 'waitingCount'>): PoolHealthMetrics {
  return {
    totalCount: pool.totalCount,
    idleCount: pool.idleCount,
    activeCount: pool.totalCount - pool.idleCount,
    waitingCount: pool.waitingCount,
  };
}
