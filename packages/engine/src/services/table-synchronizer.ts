/**
 * TableSynchronizer - Projects the flow store onto the external tables
 *
 * Diffs the store against the rows last written successfully and only
 * emits what changed. The "last written" cache is updated per row and
 * only on success, so a failed write is retried by the next cycle's diff
 * without touching in-memory state.
 *
 * Write order per cycle:
 *   1. flow deletes (incoming, outgoing)
 *   2. interfaces (bulk replace after a wholesale swap, else per row)
 *   3. flow upserts (incoming, outgoing)
 *
 * The first sync after construction or `reset()` bulk-replaces all three
 * tables, so rows left behind by an earlier run of the device do not
 * survive.
 *
 * A flow is only written once its interface row has been written; a flow
 * row whose interface is unknown or not yet written is held back, and
 * deleted if it was written before.
 *
 * @module packages/engine/services/table-synchronizer
 */

import type { Logger } from 'pino';
import {
  FlowEngineErrorCode,
  FLOW_DIRECTIONS,
  type FlowDirection,
  type FlowRecord,
  type InterfaceRecord,
  type TableName,
} from '@flowmesh/core/domain';
import type { FlowRow, IFlowTableStorage, InterfaceRow } from '@flowmesh/core/ports';
import type { FlowEntityStore } from './flow-entity-store.js';
import { recordTableWrite } from '../metrics.js';

// =============================================================================
// Types
// =============================================================================

export interface TableSynchronizerConfig {
  storage: IFlowTableStorage;
  logger: Logger;
}

export interface SyncResult {
  upserted: number;
  deleted: number;
  /** Tables bulk-replaced in this sync */
  replaced: TableName[];
  /** Flow instances held back because their interface row is not written */
  skippedUnresolved: string[];
  failed: number;
}

// =============================================================================
// Row projection
// =============================================================================

export function toInterfaceRow(record: InterfaceRecord): InterfaceRow {
  const { aggregates } = record;
  return {
    instance: record.instance,
    description: record.description,
    displayKey: record.displayKey,
    type: record.type,
    adminStatus: record.adminStatus,
    operationalStatus: record.operationalStatus,
    physicalInterfaceId: record.physicalInterfaceId,
    rxBitrate: aggregates.rxBitrate,
    txBitrate: aggregates.txBitrate,
    rxFlows: aggregates.rxFlows,
    txFlows: aggregates.txFlows,
    expectedRxBitrate: aggregates.expectedRxBitrate,
    expectedTxBitrate: aggregates.expectedTxBitrate,
    expectedRxFlows: aggregates.expectedRxFlows,
    expectedTxFlows: aggregates.expectedTxFlows,
    rxBitrateStatus: aggregates.rxBitrateStatus,
    txBitrateStatus: aggregates.txBitrateStatus,
    rxFlowsStatus: aggregates.rxFlowsStatus,
    txFlowsStatus: aggregates.txFlowsStatus,
  };
}

export function toFlowRow(flow: FlowRecord): FlowRow {
  return {
    instance: flow.instance,
    transportType: flow.transportType,
    destinationIp: flow.destinationIp,
    destinationPort: flow.destinationPort,
    sourceIp: flow.sourceIp,
    interfaceKey: flow.interfaceKey,
    bitrate: flow.bitrate,
    expectedBitrate: flow.expectedBitrate,
    expectedBitrateStatus: flow.expectedBitrateStatus,
    label: flow.label,
    linkedFlowKey: flow.direction === 'incoming' ? flow.outgoingFlowKey : flow.incomingFlowKey,
    linkedFlow: flow.linkedFlow,
    owner: flow.owner,
    present: flow.present,
  };
}

function fingerprint(row: InterfaceRow | FlowRow): string {
  return JSON.stringify(row);
}

// =============================================================================
// TableSynchronizer
// =============================================================================

export class TableSynchronizer {
  private readonly storage: IFlowTableStorage;
  private readonly logger: Logger;

  /** instance → fingerprint of the last row written successfully */
  private readonly written: Record<TableName, Map<string, string>> = {
    interfaces: new Map(),
    incoming: new Map(),
    outgoing: new Map(),
  };

  /** Tables whose next write is a bulk replace */
  private readonly pendingReplace: Record<TableName, boolean> = {
    interfaces: true,
    incoming: true,
    outgoing: true,
  };

  constructor(config: TableSynchronizerConfig) {
    this.storage = config.storage;
    this.logger = config.logger.child({ component: 'TableSynchronizer' });
  }

  /**
   * Write out whatever changed since the last successful write.
   * Never throws for a storage failure; failures are counted and logged.
   */
  async sync(store: FlowEntityStore): Promise<SyncResult> {
    const result: SyncResult = {
      upserted: 0,
      deleted: 0,
      replaced: [],
      skippedUnresolved: [],
      failed: 0,
    };

    const desiredFlows = {
      incoming: this.desiredFlowRows(store, 'incoming', result),
      outgoing: this.desiredFlowRows(store, 'outgoing', result),
    };

    for (const direction of FLOW_DIRECTIONS) {
      if (!this.pendingReplace[direction]) {
        await this.deleteStaleFlows(direction, desiredFlows[direction], result);
      }
    }

    const interfaceRows = store.all('interfaces').map(toInterfaceRow);
    if (store.takeInterfacesReplaced() || this.pendingReplace.interfaces) {
      await this.replaceInterfaces(interfaceRows, result);
    } else {
      await this.syncInterfacesIncrementally(interfaceRows, result);
    }

    for (const direction of FLOW_DIRECTIONS) {
      const writable = this.writableFlowRows(desiredFlows[direction], result);
      if (this.pendingReplace[direction]) {
        await this.replaceFlows(direction, writable, result);
      } else {
        await this.deleteHeldBackFlows(direction, desiredFlows[direction], writable, result);
        await this.upsertFlows(direction, writable, result);
      }
    }

    if (result.upserted + result.deleted + result.failed + result.replaced.length > 0) {
      this.logger.info(
        {
          upserted: result.upserted,
          deleted: result.deleted,
          replaced: result.replaced,
          failed: result.failed,
          skippedUnresolved: result.skippedUnresolved.length,
        },
        'Tables synchronized'
      );
    }

    return result;
  }

  /**
   * Forget everything written so far; the next sync bulk-replaces every
   * table.
   */
  reset(): void {
    for (const cache of Object.values(this.written)) cache.clear();
    this.pendingReplace.interfaces = true;
    this.pendingReplace.incoming = true;
    this.pendingReplace.outgoing = true;
  }

  // ===========================================================================
  // Interfaces
  // ===========================================================================

  private async replaceInterfaces(rows: InterfaceRow[], result: SyncResult): Promise<void> {
    const cache = this.written.interfaces;
    const unchanged =
      !this.pendingReplace.interfaces &&
      rows.length === cache.size &&
      rows.every((row) => cache.get(row.instance) === fingerprint(row));
    if (unchanged) return;

    try {
      await this.storage.replaceAll('interfaces', rows);
      cache.clear();
      for (const row of rows) cache.set(row.instance, fingerprint(row));
      this.pendingReplace.interfaces = false;
      result.replaced.push('interfaces');
      recordTableWrite('interfaces', 'replace', 'success');
    } catch (err) {
      this.pendingReplace.interfaces = true;
      result.failed += 1;
      recordTableWrite('interfaces', 'replace', 'failure');
      this.logger.warn(
        { err, code: FlowEngineErrorCode.WRITE_FAILED, rows: rows.length },
        'Interface table replace failed; retrying next cycle'
      );
    }
  }

  private async syncInterfacesIncrementally(rows: InterfaceRow[], result: SyncResult): Promise<void> {
    const cache = this.written.interfaces;
    const desired = new Set(rows.map((row) => row.instance));

    for (const instance of [...cache.keys()]) {
      if (!desired.has(instance)) {
        await this.deleteRow('interfaces', instance, result);
      }
    }
    for (const row of rows) {
      const print = fingerprint(row);
      if (cache.get(row.instance) === print) continue;
      try {
        await this.storage.upsertRow('interfaces', row);
        cache.set(row.instance, print);
        result.upserted += 1;
        recordTableWrite('interfaces', 'upsert', 'success');
      } catch (err) {
        this.recordFailure('interfaces', 'upsert', row.instance, err, result);
      }
    }
  }

  // ===========================================================================
  // Flows
  // ===========================================================================

  private desiredFlowRows(
    store: FlowEntityStore,
    direction: FlowDirection,
    result: SyncResult
  ): Map<string, FlowRow> {
    const rows = new Map<string, FlowRow>();
    for (const flow of store.allFlows(direction)) {
      if (!store.hasInterface(flow.interfaceKey)) {
        // Never written with a dangling interface reference
        result.skippedUnresolved.push(flow.instance);
        continue;
      }
      rows.set(flow.instance, toFlowRow(flow));
    }
    return rows;
  }

  /**
   * Rows whose interface row is in the table as of this sync.
   */
  private writableFlowRows(desired: Map<string, FlowRow>, result: SyncResult): Map<string, FlowRow> {
    const writtenInterfaces = this.written.interfaces;
    const rows = new Map<string, FlowRow>();
    for (const [instance, row] of desired) {
      if (writtenInterfaces.has(row.interfaceKey)) {
        rows.set(instance, row);
      } else {
        result.skippedUnresolved.push(instance);
      }
    }
    return rows;
  }

  private async replaceFlows(
    direction: FlowDirection,
    rows: Map<string, FlowRow>,
    result: SyncResult
  ): Promise<void> {
    const cache = this.written[direction];
    try {
      await this.storage.replaceAll(direction, [...rows.values()]);
      cache.clear();
      for (const row of rows.values()) cache.set(row.instance, fingerprint(row));
      this.pendingReplace[direction] = false;
      result.replaced.push(direction);
      recordTableWrite(direction, 'replace', 'success');
    } catch (err) {
      result.failed += 1;
      recordTableWrite(direction, 'replace', 'failure');
      this.logger.warn(
        { err, code: FlowEngineErrorCode.WRITE_FAILED, table: direction, rows: rows.size },
        'Flow table replace failed; retrying next cycle'
      );
    }
  }

  /**
   * Remove written rows of flows held back this cycle.
   */
  private async deleteHeldBackFlows(
    direction: FlowDirection,
    desired: Map<string, FlowRow>,
    writable: Map<string, FlowRow>,
    result: SyncResult
  ): Promise<void> {
    for (const instance of desired.keys()) {
      if (!writable.has(instance) && this.written[direction].has(instance)) {
        await this.deleteRow(direction, instance, result);
      }
    }
  }

  private async deleteStaleFlows(
    direction: FlowDirection,
    desired: Map<string, FlowRow>,
    result: SyncResult
  ): Promise<void> {
    for (const instance of [...this.written[direction].keys()]) {
      if (!desired.has(instance)) {
        await this.deleteRow(direction, instance, result);
      }
    }
  }

  private async upsertFlows(
    direction: FlowDirection,
    desired: Map<string, FlowRow>,
    result: SyncResult
  ): Promise<void> {
    const cache = this.written[direction];
    for (const row of desired.values()) {
      const print = fingerprint(row);
      if (cache.get(row.instance) === print) continue;
      try {
        await this.storage.upsertRow(direction, row);
        cache.set(row.instance, print);
        result.upserted += 1;
        recordTableWrite(direction, 'upsert', 'success');
      } catch (err) {
        this.recordFailure(direction, 'upsert', row.instance, err, result);
      }
    }
  }

  // ===========================================================================
  // Helpers
  // ===========================================================================

  private async deleteRow(table: TableName, instance: string, result: SyncResult): Promise<void> {
    try {
      await this.storage.deleteRow(table, instance);
      this.written[table].delete(instance);
      result.deleted += 1;
      recordTableWrite(table, 'delete', 'success');
    } catch (err) {
      this.recordFailure(table, 'delete', instance, err, result);
    }
  }

  private recordFailure(
    table: TableName,
    operation: 'upsert' | 'delete',
    instance: string,
    err: unknown,
    result: SyncResult
  ): void {
    result.failed += 1;
    recordTableWrite(table, operation, 'failure');
    this.logger.warn(
      { err, code: FlowEngineErrorCode.WRITE_FAILED, table, operation, instance },
      'Table write failed; retrying next cycle'
    );
  }
}
