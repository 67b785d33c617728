/**
 * PostgreSQL Flow Table Storage
 *
 * Persists the interfaces, incoming and outgoing tables for one device.
 * Rows of every device share the same three tables and are keyed by
 * (device_id, instance).
 *
 *   upsertRow  → INSERT ... ON CONFLICT (device_id, instance) DO UPDATE
 *   deleteRow  → DELETE (missing rows are fine)
 *   replaceAll → BEGIN / DELETE device rows / INSERT batches / COMMIT
 *
 * @module packages/adapters/storage/pg-flow-table-storage
 */

import type { Logger } from 'pino';
import type { TableName } from '@flowmesh/core/domain';
import type {
  FlowRow,
  IFlowTableStorage,
  InterfaceRow,
  TableRowMap,
} from '@flowmesh/core/ports';

// --------------------------------------------------------------------------
// Types
// --------------------------------------------------------------------------

/** The slice of a pg PoolClient this adapter uses */
export interface SqlClient {
  query(text: string, values?: unknown[]): Promise<unknown>;
  release(): void;
}

/** The slice of a pg Pool this adapter uses */
export interface SqlPool {
  query(text: string, values?: unknown[]): Promise<unknown>;
  connect(): Promise<SqlClient>;
}

export interface PostgresFlowTableStorageConfig {
  pool: SqlPool;
  deviceId: string;
  logger: Logger;
}

type RowEncoders = { [K in TableName]: (row: TableRowMap[K]) => unknown[] };

// --------------------------------------------------------------------------
// Schema
// --------------------------------------------------------------------------

/** pg rejects statements with more bind parameters than this */
export const MAX_BIND_PARAMETERS = 65535;

export const TABLE_NAMES: Record<TableName, string> = {
  interfaces: 'flow_interfaces',
  incoming: 'flow_incoming',
  outgoing: 'flow_outgoing',
};

const INTERFACE_COLUMNS = [
  'instance',
  'description',
  'display_key',
  'type',
  'admin_status',
  'operational_status',
  'physical_interface_id',
  'rx_bitrate',
  'tx_bitrate',
  'rx_flows',
  'tx_flows',
  'expected_rx_bitrate',
  'expected_tx_bitrate',
  'expected_rx_flows',
  'expected_tx_flows',
  'rx_bitrate_status',
  'tx_bitrate_status',
  'rx_flows_status',
  'tx_flows_status',
] as const;

const FLOW_COLUMNS = [
  'instance',
  'transport_type',
  'destination_ip',
  'destination_port',
  'source_ip',
  'interface_key',
  'bitrate',
  'expected_bitrate',
  'expected_bitrate_status',
  'label',
  'linked_flow_key',
  'linked_flow',
  'owner',
  'present',
] as const;

const COLUMNS: Record<TableName, readonly string[]> = {
  interfaces: INTERFACE_COLUMNS,
  incoming: FLOW_COLUMNS,
  outgoing: FLOW_COLUMNS,
};

function encodeInterface(row: InterfaceRow): unknown[] {
  return [
    row.instance,
    row.description,
    row.displayKey,
    row.type,
    row.adminStatus,
    row.operationalStatus,
    row.physicalInterfaceId,
    row.rxBitrate,
    row.txBitrate,
    row.rxFlows,
    row.txFlows,
    row.expectedRxBitrate,
    row.expectedTxBitrate,
    row.expectedRxFlows,
    row.expectedTxFlows,
    row.rxBitrateStatus,
    row.txBitrateStatus,
    row.rxFlowsStatus,
    row.txFlowsStatus,
  ];
}

function encodeFlow(row: FlowRow): unknown[] {
  return [
    row.instance,
    row.transportType,
    row.destinationIp,
    row.destinationPort,
    row.sourceIp,
    row.interfaceKey,
    row.bitrate,
    row.expectedBitrate,
    row.expectedBitrateStatus,
    row.label,
    row.linkedFlowKey,
    row.linkedFlow,
    row.owner,
    row.present,
  ];
}

const ENCODERS: RowEncoders = {
  interfaces: encodeInterface,
  incoming: encodeFlow,
  outgoing: encodeFlow,
};

const FLOW_TABLE_DDL = (name: string) => `
CREATE TABLE IF NOT EXISTS ${name} (
  device_id               TEXT NOT NULL,
  instance                TEXT NOT NULL,
  transport_type          TEXT NOT NULL,
  destination_ip          TEXT,
  destination_port        INTEGER,
  source_ip               TEXT,
  interface_key           TEXT NOT NULL,
  bitrate                 DOUBLE PRECISION NOT NULL DEFAULT 0,
  expected_bitrate        DOUBLE PRECISION,
  expected_bitrate_status TEXT NOT NULL,
  label                   TEXT,
  linked_flow_key         TEXT,
  linked_flow             TEXT,
  owner                   TEXT NOT NULL,
  present                 BOOLEAN NOT NULL,
  updated_at              TIMESTAMPTZ NOT NULL DEFAULT now(),
  PRIMARY KEY (device_id, instance)
)`;

export const FLOW_SCHEMA_DDL: readonly string[] = [
  `
CREATE TABLE IF NOT EXISTS ${TABLE_NAMES.interfaces} (
  device_id             TEXT NOT NULL,
  instance              TEXT NOT NULL,
  description           TEXT NOT NULL,
  display_key           TEXT NOT NULL,
  type                  TEXT NOT NULL,
  admin_status          TEXT NOT NULL,
  operational_status    TEXT NOT NULL,
  physical_interface_id TEXT,
  rx_bitrate            DOUBLE PRECISION NOT NULL DEFAULT 0,
  tx_bitrate            DOUBLE PRECISION NOT NULL DEFAULT 0,
  rx_flows              INTEGER NOT NULL DEFAULT 0,
  tx_flows              INTEGER NOT NULL DEFAULT 0,
  expected_rx_bitrate   DOUBLE PRECISION NOT NULL DEFAULT 0,
  expected_tx_bitrate   DOUBLE PRECISION NOT NULL DEFAULT 0,
  expected_rx_flows     INTEGER NOT NULL DEFAULT 0,
  expected_tx_flows     INTEGER NOT NULL DEFAULT 0,
  rx_bitrate_status     TEXT NOT NULL,
  tx_bitrate_status     TEXT NOT NULL,
  rx_flows_status       TEXT NOT NULL,
  tx_flows_status       TEXT NOT NULL,
  updated_at            TIMESTAMPTZ NOT NULL DEFAULT now(),
  PRIMARY KEY (device_id, instance)
)`,
  FLOW_TABLE_DDL(TABLE_NAMES.incoming),
  FLOW_TABLE_DDL(TABLE_NAMES.outgoing),
];

// --------------------------------------------------------------------------
// SQL builders
// --------------------------------------------------------------------------

export function buildUpsertSql(table: TableName): string {
  const columns = COLUMNS[table];
  const placeholders = ['$1', ...columns.map((_, i) => `$${i + 2}`)].join(', ');
  const updates = columns
    .filter((column) => column !== 'instance')
    .map((column) => `${column} = EXCLUDED.${column}`)
    .concat('updated_at = now()')
    .join(', ');

  return (
    `INSERT INTO ${TABLE_NAMES[table]} (device_id, ${columns.join(', ')}) ` +
    `VALUES (${placeholders}) ` +
    `ON CONFLICT (device_id, instance) DO UPDATE SET ${updates}`
  );
}

/**
 * Rows per multi-row insert that stay within the bind parameter limit,
 * `$1` included.
 */
export function bulkInsertBatchSize(table: TableName): number {
  return Math.floor((MAX_BIND_PARAMETERS - 1) / COLUMNS[table].length);
}

/**
 * Multi-row insert; `$1` is the device id, row values follow.
 */
export function buildBulkInsertSql(table: TableName, rowCount: number): string {
  const columns = COLUMNS[table];
  const tuples: string[] = [];
  for (let r = 0; r < rowCount; r++) {
    const offset = 2 + r * columns.length;
    const params = columns.map((_, c) => `$${offset + c}`);
    tuples.push(`($1, ${params.join(', ')})`);
  }
  return `INSERT INTO ${TABLE_NAMES[table]} (device_id, ${columns.join(', ')}) VALUES ${tuples.join(', ')}`;
}

// --------------------------------------------------------------------------
// PostgresFlowTableStorage
// --------------------------------------------------------------------------

export class PostgresFlowTableStorage implements IFlowTableStorage {
  private readonly pool: SqlPool;
  private readonly deviceId: string;
  private readonly logger: Logger;

  constructor(config: PostgresFlowTableStorageConfig) {
    this.pool = config.pool;
    this.deviceId = config.deviceId;
    this.logger = config.logger.child({ component: 'PostgresFlowTableStorage', deviceId: config.deviceId });
  }

  /**
   * Create the three tables if they do not exist.
   */
  async ensureSchema(): Promise<void> {
    for (const statement of FLOW_SCHEMA_DDL) {
      await this.pool.query(statement);
    }
  }

  async upsertRow<T extends TableName>(table: T, row: TableRowMap[T]): Promise<void> {
    const encode: (row: TableRowMap[T]) => unknown[] = ENCODERS[table];
    await this.pool.query(buildUpsertSql(table), [this.deviceId, ...encode(row)]);
  }

  async deleteRow(table: TableName, instance: string): Promise<void> {
    await this.pool.query(
      `DELETE FROM ${TABLE_NAMES[table]} WHERE device_id = $1 AND instance = $2`,
      [this.deviceId, instance]
    );
  }

  async replaceAll<T extends TableName>(table: T, rows: TableRowMap[T][]): Promise<void> {
    const encode: (row: TableRowMap[T]) => unknown[] = ENCODERS[table];
    const client = await this.pool.connect();

    try {
      await client.query('BEGIN');
      await client.query(`DELETE FROM ${TABLE_NAMES[table]} WHERE device_id = $1`, [this.deviceId]);
      const batchSize = bulkInsertBatchSize(table);
      for (let start = 0; start < rows.length; start += batchSize) {
        const batch = rows.slice(start, start + batchSize);
        await client.query(buildBulkInsertSql(table, batch.length), [
          this.deviceId,
          ...batch.flatMap(encode),
        ]);
      }
      await client.query('COMMIT');
      this.logger.debug({ table, rows: rows.length }, 'Table replaced');
    } catch (error) {
      try {
        await client.query('ROLLBACK');
      } catch (rollbackError) {
        this.logger.error({ err: rollbackError, table }, 'Rollback failed');
      }
      throw error;
    } finally {
      client.release();
    }
  }
}
