/**
 * FlowEntityStore - In-memory interfaces, incoming and outgoing flows
 *
 * Single source of truth for one device during a reconciliation cycle.
 * Keyed strictly by instance string; iteration follows insertion order.
 *
 * Every mutation marks the affected interface keys dirty so the
 * aggregate calculator only recomputes what changed.
 *
 * @module packages/engine/services/flow-entity-store
 */

import type {
  FlowDirection,
  FlowRecord,
  TableName,
  TableRecordMap,
} from '@flowmesh/core/domain';

type Tables = { [K in TableName]: Map<string, TableRecordMap[K]> };

function clone<T extends TableRecordMap[TableName]>(record: T): T {
  return structuredClone(record);
}

/**
 * Interface a record rolls up into: its own key for interfaces, the
 * foreign key for flows.
 */
function interfaceKeyOf(record: TableRecordMap[TableName]): string {
  return 'interfaceKey' in record ? record.interfaceKey : record.instance;
}

export class FlowEntityStore {
  private readonly tables: Tables = {
    interfaces: new Map(),
    incoming: new Map(),
    outgoing: new Map(),
  };

  private dirtyInterfaces = new Set<string>();
  private interfacesReplacedFlag = false;

  // ===========================================================================
  // Reads
  // ===========================================================================

  get<T extends TableName>(table: T, instance: string): TableRecordMap[T] | undefined {
    const record = this.tables[table].get(instance);
    return record ? clone(record) : undefined;
  }

  has(table: TableName, instance: string): boolean {
    return this.tables[table].has(instance);
  }

  hasInterface(interfaceKey: string): boolean {
    return this.tables.interfaces.has(interfaceKey);
  }

  all<T extends TableName>(table: T): TableRecordMap[T][] {
    return Array.from(this.tables[table].values(), (record) => clone(record));
  }

  getFlow(direction: FlowDirection, instance: string): FlowRecord | undefined {
    return this.get(direction, instance);
  }

  allFlows(direction: FlowDirection): FlowRecord[] {
    return this.all(direction);
  }

  size(table: TableName): number {
    return this.tables[table].size;
  }

  // ===========================================================================
  // Mutations
  // ===========================================================================

  upsert<T extends TableName>(table: T, record: TableRecordMap[T]): void {
    const map = this.tables[table];
    const previous = map.get(record.instance);
    if (previous) {
      this.dirtyInterfaces.add(interfaceKeyOf(previous));
    }
    map.set(record.instance, clone(record));
    this.dirtyInterfaces.add(interfaceKeyOf(record));
  }

  upsertFlow(flow: FlowRecord): void {
    if (flow.direction === 'incoming') {
      this.upsert('incoming', flow);
    } else {
      this.upsert('outgoing', flow);
    }
  }

  remove(table: TableName, instance: string): boolean {
    const map = this.tables[table];
    const previous = map.get(instance);
    if (!previous) return false;
    map.delete(instance);
    this.dirtyInterfaces.add(interfaceKeyOf(previous));
    return true;
  }

  /**
   * Swap the whole table content. Used for the per-cycle interface list.
   */
  replaceAll<T extends TableName>(table: T, records: readonly TableRecordMap[T][]): void {
    const map = this.tables[table];
    for (const previous of map.values()) {
      this.dirtyInterfaces.add(interfaceKeyOf(previous));
    }
    map.clear();
    for (const record of records) {
      map.set(record.instance, clone(record));
      this.dirtyInterfaces.add(interfaceKeyOf(record));
    }
    if (table === 'interfaces') {
      this.interfacesReplacedFlag = true;
    }
  }

  /**
   * Write derived aggregate fields back without marking anything dirty.
   */
  writeDerived<T extends TableName>(table: T, record: TableRecordMap[T]): void {
    const map = this.tables[table];
    if (map.has(record.instance)) {
      map.set(record.instance, clone(record));
    }
  }

  // ===========================================================================
  // Change tracking
  // ===========================================================================

  /**
   * Drain the set of interface keys touched since the last call.
   */
  takeDirtyInterfaces(): Set<string> {
    const dirty = this.dirtyInterfaces;
    this.dirtyInterfaces = new Set();
    return dirty;
  }

  peekDirtyInterfaces(): ReadonlySet<string> {
    return this.dirtyInterfaces;
  }

  /**
   * Whether the interface table was bulk-replaced since the last call.
   */
  takeInterfacesReplaced(): boolean {
    const replaced = this.interfacesReplacedFlag;
    this.interfacesReplacedFlag = false;
    return replaced;
  }
}
