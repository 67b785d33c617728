/**
 * AggregateCalculator - Derives per-interface rollups from the flow set
 *
 * For every interface touched since the last run:
 *   - rx/tx bitrate and flow count over present flows
 *   - expected rx/tx bitrate over all flows, present or not
 *   - expected rx/tx flow count over provisioned flows
 *   - Normal/Low/High status for bitrate and count, per direction
 *
 * Also refreshes each flow's expected-bitrate status. Flows whose
 * interface does not exist are left out of every rollup and reported
 * as unresolved.
 *
 * @module packages/engine/services/aggregate-calculator
 */

import type { Logger } from 'pino';
import {
  FlowEngineErrorCode,
  compareToExpected,
  type FlowRecord,
  type IncomingFlow,
  type InterfaceAggregates,
  type OutgoingFlow,
} from '@flowmesh/core/domain';
import type { FlowEntityStore } from './flow-entity-store.js';

// =============================================================================
// Types
// =============================================================================

export interface AggregateCalculatorConfig {
  logger: Logger;
}

export interface AggregateOptions {
  bitrateTolerancePercent: number;
  /** Interfaces to recompute; defaults to the store's dirty set */
  interfaceKeys?: Iterable<string>;
}

export interface UnresolvedFlow {
  direction: FlowRecord['direction'];
  instance: string;
  interfaceKey: string;
}

export interface AggregateResult {
  /** Interfaces whose aggregates were recomputed */
  recomputed: string[];
  /** Flows whose interface key has no matching interface row */
  unresolved: UnresolvedFlow[];
}

interface InterfaceFlows {
  incoming: IncomingFlow[];
  outgoing: OutgoingFlow[];
}

// =============================================================================
// Pure computation
// =============================================================================

interface DirectionTotals {
  bitrate: number;
  flows: number;
  expectedBitrate: number;
  expectedFlows: number;
}

function totals(flows: readonly FlowRecord[]): DirectionTotals {
  const result: DirectionTotals = { bitrate: 0, flows: 0, expectedBitrate: 0, expectedFlows: 0 };
  for (const flow of flows) {
    if (flow.present) {
      result.bitrate += flow.bitrate;
      result.flows += 1;
    }
    result.expectedBitrate += flow.expectedBitrate ?? 0;
    if (flow.owner === 'FlowEngineering') {
      result.expectedFlows += 1;
    }
  }
  return result;
}

/**
 * Aggregates for one interface. Depends only on its arguments.
 */
export function computeAggregates(
  flows: InterfaceFlows,
  bitrateTolerancePercent: number
): InterfaceAggregates {
  const rx = totals(flows.incoming);
  const tx = totals(flows.outgoing);

  return {
    rxBitrate: rx.bitrate,
    txBitrate: tx.bitrate,
    rxFlows: rx.flows,
    txFlows: tx.flows,
    expectedRxBitrate: rx.expectedBitrate,
    expectedTxBitrate: tx.expectedBitrate,
    expectedRxFlows: rx.expectedFlows,
    expectedTxFlows: tx.expectedFlows,
    rxBitrateStatus: compareToExpected(rx.bitrate, rx.expectedBitrate, bitrateTolerancePercent),
    txBitrateStatus: compareToExpected(tx.bitrate, tx.expectedBitrate, bitrateTolerancePercent),
    rxFlowsStatus: compareToExpected(rx.flows, rx.expectedFlows, bitrateTolerancePercent),
    txFlowsStatus: compareToExpected(tx.flows, tx.expectedFlows, bitrateTolerancePercent),
  };
}

// =============================================================================
// AggregateCalculator
// =============================================================================

export class AggregateCalculator {
  private readonly logger: Logger;

  constructor(config: AggregateCalculatorConfig) {
    this.logger = config.logger.child({ component: 'AggregateCalculator' });
  }

  /**
   * Recompute rollups for the dirty (or given) interfaces and write them
   * back into the store. Running it twice without an intervening mutation
   * yields the same values.
   */
  recompute(store: FlowEntityStore, options: AggregateOptions): AggregateResult {
    const keys = options.interfaceKeys
      ? new Set(options.interfaceKeys)
      : store.takeDirtyInterfaces();

    const byInterface = this.indexFlows(store);
    const unresolved = this.findUnresolved(store, byInterface);
    const recomputed: string[] = [];

    for (const key of keys) {
      const flows = byInterface.get(key) ?? { incoming: [], outgoing: [] };
      this.refreshFlowStatuses(store, flows, options.bitrateTolerancePercent);

      const iface = store.get('interfaces', key);
      if (!iface) continue;

      const aggregates = computeAggregates(flows, options.bitrateTolerancePercent);
      store.writeDerived('interfaces', { ...iface, aggregates });
      recomputed.push(key);
    }

    if (unresolved.length > 0) {
      this.logger.debug(
        { code: FlowEngineErrorCode.UNRESOLVED_INTERFACE, unresolved: unresolved.length },
        'Flows reference unknown interfaces; excluded from aggregates'
      );
    }

    return { recomputed, unresolved };
  }

  /**
   * Lookup from interface key to the flows that reference it.
   */
  private indexFlows(store: FlowEntityStore): Map<string, InterfaceFlows> {
    const index = new Map<string, InterfaceFlows>();
    const bucket = (key: string): InterfaceFlows => {
      let entry = index.get(key);
      if (!entry) {
        entry = { incoming: [], outgoing: [] };
        index.set(key, entry);
      }
      return entry;
    };

    for (const flow of store.all('incoming')) bucket(flow.interfaceKey).incoming.push(flow);
    for (const flow of store.all('outgoing')) bucket(flow.interfaceKey).outgoing.push(flow);
    return index;
  }

  private findUnresolved(
    store: FlowEntityStore,
    byInterface: Map<string, InterfaceFlows>
  ): UnresolvedFlow[] {
    const unresolved: UnresolvedFlow[] = [];
    for (const [interfaceKey, flows] of byInterface) {
      if (store.hasInterface(interfaceKey)) continue;
      for (const flow of [...flows.incoming, ...flows.outgoing]) {
        unresolved.push({ direction: flow.direction, instance: flow.instance, interfaceKey });
      }
    }
    return unresolved;
  }

  private refreshFlowStatuses(
    store: FlowEntityStore,
    flows: InterfaceFlows,
    tolerancePercent: number
  ): void {
    for (const flow of flows.incoming) {
      const status = compareToExpected(flow.bitrate, flow.expectedBitrate, tolerancePercent);
      if (status !== flow.expectedBitrateStatus) {
        flow.expectedBitrateStatus = status;
        store.writeDerived('incoming', flow);
      }
    }
    for (const flow of flows.outgoing) {
      const status = compareToExpected(flow.bitrate, flow.expectedBitrate, tolerancePercent);
      if (status !== flow.expectedBitrateStatus) {
        flow.expectedBitrateStatus = status;
        store.writeDerived('outgoing', flow);
      }
    }
  }
}
