/**
 * Shared fixtures for engine tests.
 */

import { pino } from 'pino';
import {
  EMPTY_AGGREGATES,
  createFlow,
  type FlowBase,
  type FlowDirection,
  type FlowRecord,
  type InterfaceRecord,
  type TableName,
} from '@flowmesh/core/domain';
import type {
  FlowRow,
  IFlowTableStorage,
  InterfaceRow,
  TableRowMap,
} from '@flowmesh/core/ports';

export const testLogger = pino({ level: 'silent' });

export function makeInterface(instance: string, overrides: Partial<InterfaceRecord> = {}): InterfaceRecord {
  return {
    instance,
    description: `Interface ${instance}`,
    displayKey: instance,
    type: 'Ethernet',
    adminStatus: 'Up',
    operationalStatus: 'Up',
    physicalInterfaceId: null,
    aggregates: { ...EMPTY_AGGREGATES },
    ...overrides,
  };
}

export function makeFlow(
  direction: FlowDirection,
  instance: string,
  overrides: Partial<FlowBase> = {}
): FlowRecord {
  return createFlow(direction, {
    instance,
    transportType: 'IP',
    destinationIp: '239.1.1.1',
    destinationPort: 5004,
    sourceIp: '10.0.0.1',
    interfaceKey: '1',
    bitrate: 0,
    expectedBitrate: null,
    expectedBitrateStatus: 'Normal',
    label: null,
    linkedFlow: null,
    owner: 'LocalSystem',
    present: true,
    ...overrides,
  });
}

/**
 * Raw snapshot entry for an observed IP flow.
 */
export function observedFlow(
  instance: string,
  overrides: Record<string, unknown> = {}
): Record<string, unknown> {
  return {
    instance,
    transportType: 'IP',
    destinationIp: '239.1.1.1',
    destinationPort: 5004,
    sourceIp: '10.0.0.1',
    interfaceKey: '1',
    bitrate: 0,
    ...overrides,
  };
}

export function observedInterface(
  instance: string,
  overrides: Record<string, unknown> = {}
): Record<string, unknown> {
  return {
    instance,
    description: `Interface ${instance}`,
    type: 'Ethernet',
    adminStatus: 'Up',
    operationalStatus: 'Up',
    ...overrides,
  };
}

type StorageOperation = 'upsert' | 'delete' | 'replace';

/**
 * Table storage kept in process. `failWhen` makes matching writes reject.
 */
export class InMemoryTableStorage implements IFlowTableStorage {
  readonly tables: Record<TableName, Map<string, InterfaceRow | FlowRow>> = {
    interfaces: new Map(),
    incoming: new Map(),
    outgoing: new Map(),
  };

  readonly operations: string[] = [];

  failWhen: ((operation: StorageOperation, table: TableName, instance: string | null) => boolean) | null =
    null;

  async upsertRow<T extends TableName>(table: T, row: TableRowMap[T]): Promise<void> {
    this.check('upsert', table, row.instance);
    this.tables[table].set(row.instance, row);
    this.operations.push(`upsert ${table} ${row.instance}`);
  }

  async deleteRow(table: TableName, instance: string): Promise<void> {
    this.check('delete', table, instance);
    this.tables[table].delete(instance);
    this.operations.push(`delete ${table} ${instance}`);
  }

  async replaceAll<T extends TableName>(table: T, rows: TableRowMap[T][]): Promise<void> {
    this.check('replace', table, null);
    const target = this.tables[table];
    target.clear();
    for (const row of rows) target.set(row.instance, row);
    this.operations.push(`replace ${table} ${rows.length}`);
  }

  row(table: TableName, instance: string): InterfaceRow | FlowRow | undefined {
    return this.tables[table].get(instance);
  }

  private check(operation: StorageOperation, table: TableName, instance: string | null): void {
    if (this.failWhen?.(operation, table, instance)) {
      throw new Error(`simulated ${operation} failure on ${table}`);
    }
  }
}
