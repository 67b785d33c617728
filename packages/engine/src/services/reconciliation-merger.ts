/**
 * ReconciliationMerger - Merges a device snapshot into the flow store
 *
 * Per polling cycle, for one direction:
 *   1. Build the set of instances observed in the snapshot
 *   2. Unknown instances are created as ObservedPresent (LocalSystem)
 *   3. Known instances get their mutable fields refreshed and present=true;
 *      the owner is left as is
 *   4. Known instances missing from the snapshot:
 *      - FlowEngineering → present=false, row kept (ProvisionedAbsent)
 *      - LocalSystem     → row deleted (NoRow)
 *
 * Every state change goes through the lifecycle transition table.
 *
 * @module packages/engine/services/reconciliation-merger
 */

import type { Logger } from 'pino';
import {
  EMPTY_AGGREGATES,
  applyFlowEvent,
  createFlow,
  flowState,
  stateAttributes,
  type FlowDirection,
  type FlowRecord,
  type InterfaceRecord,
} from '@flowmesh/core/domain';
import type { FlowEntityStore } from './flow-entity-store.js';
import type { FlowObservation, InterfaceObservation } from '../schemas/device-snapshot.js';

// =============================================================================
// Types
// =============================================================================

export interface ReconciliationMergerConfig {
  logger: Logger;
}

/**
 * Outcome of merging one direction of a snapshot.
 */
export interface FlowMergeResult {
  direction: FlowDirection;
  created: string[];
  updated: string[];
  markedAbsent: string[];
  deleted: string[];
}

function sameRecord(a: object, b: object): boolean {
  return JSON.stringify(a) === JSON.stringify(b);
}

// =============================================================================
// ReconciliationMerger
// =============================================================================

export class ReconciliationMerger {
  private readonly logger: Logger;

  constructor(config: ReconciliationMergerConfig) {
    this.logger = config.logger.child({ component: 'ReconciliationMerger' });
  }

  /**
   * Merge the observed flows of one direction.
   *
   * @param alsoSeen - instances that were reported but failed validation;
   *   they count as observed so a bad sample never deletes a row
   */
  mergeFlows(
    store: FlowEntityStore,
    direction: FlowDirection,
    observations: readonly FlowObservation[],
    alsoSeen: Iterable<string> = []
  ): FlowMergeResult {
    const result: FlowMergeResult = {
      direction,
      created: [],
      updated: [],
      markedAbsent: [],
      deleted: [],
    };

    const seen = new Set<string>(alsoSeen);

    for (const observation of observations) {
      seen.add(observation.instance);
      const existing = store.getFlow(direction, observation.instance);
      const next = applyFlowEvent(flowState(existing), 'device_observed');
      const attributes = stateAttributes(next);
      if (!attributes) continue;

      if (!existing) {
        store.upsertFlow(
          createFlow(direction, {
            ...observation,
            expectedBitrate: null,
            expectedBitrateStatus: 'Normal',
            linkedFlow: null,
            owner: attributes.owner,
            present: attributes.present,
          })
        );
        result.created.push(observation.instance);
        continue;
      }

      const updated: FlowRecord = {
        ...existing,
        transportType: observation.transportType,
        destinationIp: observation.destinationIp,
        destinationPort: observation.destinationPort,
        sourceIp: observation.sourceIp,
        interfaceKey: observation.interfaceKey,
        bitrate: observation.bitrate,
        label: observation.label ?? existing.label,
        owner: attributes.owner,
        present: attributes.present,
      };
      if (!sameRecord(existing, updated)) {
        store.upsertFlow(updated);
        result.updated.push(observation.instance);
      }
    }

    for (const existing of store.allFlows(direction)) {
      if (seen.has(existing.instance)) continue;

      const next = applyFlowEvent(flowState(existing), 'device_lost');
      const attributes = stateAttributes(next);
      if (!attributes) {
        store.remove(direction, existing.instance);
        result.deleted.push(existing.instance);
        continue;
      }

      if (existing.present !== attributes.present) {
        store.upsertFlow({ ...existing, bitrate: 0, present: attributes.present });
        result.markedAbsent.push(existing.instance);
      }
    }

    this.logger.debug(
      {
        direction,
        created: result.created.length,
        updated: result.updated.length,
        markedAbsent: result.markedAbsent.length,
        deleted: result.deleted.length,
      },
      'Merged flow snapshot'
    );

    return result;
  }

  /**
   * Replace the interface table with a freshly polled list. Aggregates
   * start empty and are recomputed by the aggregate calculator; a
   * physical interface id already resolved is kept when the new
   * observation has none.
   */
  replaceInterfaces(store: FlowEntityStore, observations: readonly InterfaceObservation[]): void {
    const records: InterfaceRecord[] = observations.map((observation) => ({
      ...observation,
      physicalInterfaceId:
        observation.physicalInterfaceId ??
        store.get('interfaces', observation.instance)?.physicalInterfaceId ??
        null,
      aggregates: { ...EMPTY_AGGREGATES },
    }));

    store.replaceAll('interfaces', records);
    this.logger.debug({ interfaces: records.length }, 'Replaced interface table');
  }
}
