/**
 * Flow Table Storage Port
 *
 * Contract for the external, persisted representation of the three
 * logical tables. Column semantics here are what downstream path-tracing
 * tools read, so row shapes are part of the public contract.
 *
 * @module packages/core/ports/flow-table-storage
 */

import type {
  AdminStatus,
  ExpectationStatus,
  FlowOwner,
  InterfaceType,
  OperationalStatus,
  TableName,
  TransportType,
} from '../domain/flow.js';

// =============================================================================
// Rows
// =============================================================================

/**
 * Interfaces table row.
 */
export interface InterfaceRow {
  instance: string;
  description: string;
  displayKey: string;
  type: InterfaceType;
  adminStatus: AdminStatus;
  operationalStatus: OperationalStatus;
  physicalInterfaceId: string | null;
  rxBitrate: number;
  txBitrate: number;
  rxFlows: number;
  txFlows: number;
  expectedRxBitrate: number;
  expectedTxBitrate: number;
  expectedRxFlows: number;
  expectedTxFlows: number;
  rxBitrateStatus: ExpectationStatus;
  txBitrateStatus: ExpectationStatus;
  rxFlowsStatus: ExpectationStatus;
  txFlowsStatus: ExpectationStatus;
}

/**
 * Incoming or outgoing flows table row.
 *
 * `linkedFlowKey` is the cross-direction foreign key: the incoming flow
 * instance for an outgoing row, the outgoing flow instance for an
 * incoming row.
 */
export interface FlowRow {
  instance: string;
  transportType: TransportType;
  destinationIp: string | null;
  destinationPort: number | null;
  sourceIp: string | null;
  interfaceKey: string;
  bitrate: number;
  expectedBitrate: number | null;
  expectedBitrateStatus: ExpectationStatus;
  label: string | null;
  linkedFlowKey: string | null;
  linkedFlow: string | null;
  owner: FlowOwner;
  present: boolean;
}

export interface TableRowMap {
  interfaces: InterfaceRow;
  incoming: FlowRow;
  outgoing: FlowRow;
}

// =============================================================================
// IFlowTableStorage
// =============================================================================

/**
 * Port interface for table persistence.
 *
 * Every method either resolves once the write is durable or rejects;
 * callers treat a rejection as "not written" and retry on the next cycle.
 */
export interface IFlowTableStorage {
  /**
   * Insert or update a single row keyed by its instance.
   */
  upsertRow<T extends TableName>(table: T, row: TableRowMap[T]): Promise<void>;

  /**
   * Delete a single row. Deleting a missing row is not an error.
   */
  deleteRow(table: TableName, instance: string): Promise<void>;

  /**
   * Atomically swap the whole table content.
   */
  replaceAll<T extends TableName>(table: T, rows: TableRowMap[T][]): Promise<void>;
}
