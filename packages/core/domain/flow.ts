/**
 * Flow Domain Types
 *
 * Defines the interface, incoming-flow and outgoing-flow records held by
 * the flow entity store, and the enumerations that make up the external
 * table contract consumed by path-tracing tools.
 *
 * @module packages/core/domain/flow
 */

// =============================================================================
// Enumerations
// =============================================================================

/** Logical tables owned by the engine. */
export type TableName = 'interfaces' | 'incoming' | 'outgoing';

/** Flow tables only. */
export type FlowTableName = Exclude<TableName, 'interfaces'>;

export type FlowDirection = FlowTableName;

export const FLOW_DIRECTIONS: readonly FlowDirection[] = ['incoming', 'outgoing'];

/** Physical interface type. */
export type InterfaceType = 'Ethernet' | 'SDI' | 'ASI';

export type AdminStatus = 'Up' | 'Down' | 'Testing';

export type OperationalStatus =
  | 'Up'
  | 'Down'
  | 'Testing'
  | 'Unknown'
  | 'Dormant'
  | 'NotPresent'
  | 'LowerLayerDown';

/** Signal transport carried by a flow. */
export type TransportType = 'IP' | 'SDI' | 'ASI';

/** Which authority believes the flow should exist. */
export type FlowOwner = 'LocalSystem' | 'FlowEngineering';

/** Actual versus expected comparison. */
export type ExpectationStatus = 'Normal' | 'Low' | 'High';

// =============================================================================
// Interface
// =============================================================================

/**
 * Derived per-interface rollups. Always a function of the flow set;
 * only the aggregate calculator writes them.
 */
export interface InterfaceAggregates {
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

export interface InterfaceRecord {
  /** Interface index */
  instance: string;
  description: string;
  displayKey: string;
  type: InterfaceType;
  adminStatus: AdminStatus;
  operationalStatus: OperationalStatus;
  /** Reference to the physical interface, resolved externally */
  physicalInterfaceId: string | null;
  aggregates: InterfaceAggregates;
}

export const EMPTY_AGGREGATES: Readonly<InterfaceAggregates> = {
  rxBitrate: 0,
  txBitrate: 0,
  rxFlows: 0,
  txFlows: 0,
  expectedRxBitrate: 0,
  expectedTxBitrate: 0,
  expectedRxFlows: 0,
  expectedTxFlows: 0,
  rxBitrateStatus: 'Normal',
  txBitrateStatus: 'Normal',
  rxFlowsStatus: 'Normal',
  txFlowsStatus: 'Normal',
};

// =============================================================================
// Flows
// =============================================================================

/**
 * Fields shared by both flow directions.
 *
 * IP flows carry destination/source endpoints; SDI and ASI flows leave
 * them null.
 */
export interface FlowBase {
  /** Stable identity across polls, e.g. `sourceIp/groupIp/ifIndex` */
  instance: string;
  transportType: TransportType;
  destinationIp: string | null;
  destinationPort: number | null;
  sourceIp: string | null;
  /** Foreign key into the interfaces table */
  interfaceKey: string;
  /** Latest observed bitrate in bps */
  bitrate: number;
  /** Provisioned bitrate in bps, null unless provisioned */
  expectedBitrate: number | null;
  expectedBitrateStatus: ExpectationStatus;
  label: string | null;
  /** Correlates this flow with its counterpart on another device */
  linkedFlow: string | null;
  owner: FlowOwner;
  present: boolean;
}

export interface IncomingFlow extends FlowBase {
  direction: 'incoming';
  /** 1:N side of the cross-direction link */
  outgoingFlowKey: string | null;
}

export interface OutgoingFlow extends FlowBase {
  direction: 'outgoing';
  /** N:1 link to the incoming flow feeding this output */
  incomingFlowKey: string | null;
}

export type FlowRecord = IncomingFlow | OutgoingFlow;

/** Record type held by each table. */
export interface TableRecordMap {
  interfaces: InterfaceRecord;
  incoming: IncomingFlow;
  outgoing: OutgoingFlow;
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Default instance key for a flow that arrives without one.
 */
export function defaultFlowInstance(flow: {
  transportType: TransportType;
  sourceIp: string | null;
  destinationIp: string | null;
  interfaceKey: string;
}): string {
  if (flow.transportType === 'IP') {
    return `${flow.sourceIp ?? ''}/${flow.destinationIp ?? ''}/${flow.interfaceKey}`;
  }
  return `${flow.transportType}/${flow.interfaceKey}`;
}

/**
 * Build a flow record for a direction. The cross-direction foreign key
 * starts out empty.
 */
export function createFlow(direction: FlowDirection, fields: FlowBase): FlowRecord {
  return direction === 'incoming'
    ? { ...fields, direction: 'incoming', outgoingFlowKey: null }
    : { ...fields, direction: 'outgoing', incomingFlowKey: null };
}
