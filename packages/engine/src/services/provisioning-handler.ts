/**
 * ProvisioningMessageHandler - Applies flow-engineering intent to the store
 *
 * "add":    match each named flow against existing rows (instance first,
 *           then transport + endpoints + interface, optionally ignoring the
 *           destination port). A match becomes FlowEngineering-owned and
 *           takes the expected bitrate, label and provisioned flow id; no
 *           match creates a ProvisionedAbsent row.
 * "remove": ProvisionedAbsent rows are deleted, ProvisionedPresent rows
 *           revert to LocalSystem ownership (still observed).
 *
 * Entries are processed independently: a malformed entry is rejected and
 * the rest of the message still applies.
 *
 * @module packages/engine/services/provisioning-handler
 */

import type { Logger } from 'pino';
import type { z } from 'zod';
import {
  FlowEngineError,
  FlowEngineErrorCode,
  applyFlowEvent,
  createFlow,
  defaultFlowInstance,
  flowState,
  stateAttributes,
  type FlowDirection,
  type FlowRecord,
  type IncomingFlow,
  type OutgoingFlow,
} from '@flowmesh/core/domain';
import type { FlowEntityStore } from './flow-entity-store.js';
import {
  ProvisionedFlowRemovalSchema,
  ProvisionedFlowSchema,
  ProvisioningMessageSchema,
  type FlowEndpoints,
  type ProvisionedFlow,
  type ProvisionedFlowRemoval,
  type ProvisioningAction,
  type ProvisioningMessage,
} from '../schemas/provisioning-message.js';
import { describeIssues } from '../schemas/device-snapshot.js';

// =============================================================================
// Types
// =============================================================================

export interface ProvisioningHandlerConfig {
  logger: Logger;
}

export interface ProvisioningOptions {
  /** Used when the message does not carry its own flag */
  ignoreDestinationPort: boolean;
}

export interface FlowsByDirection<I, O = I> {
  incoming: I[];
  outgoing: O[];
}

export interface RejectedProvisioningEntry {
  code: FlowEngineErrorCode;
  index: number;
  reason: string;
}

export interface ProvisioningResult {
  action: ProvisioningAction;
  /** Flows newly added, or whose owner or endpoints changed */
  changed: FlowsByDirection<IncomingFlow, OutgoingFlow>;
  /** Rows deleted by a removal */
  deleted: FlowsByDirection<string>;
  /** Removals that matched no provisioned flow */
  ignored: FlowsByDirection<string>;
  rejected: RejectedProvisioningEntry[];
}

// =============================================================================
// Matching
// =============================================================================

function endpointsMatch(flow: FlowRecord, endpoints: FlowEndpoints, ignorePort: boolean): boolean {
  return (
    flow.transportType === endpoints.transportType &&
    flow.interfaceKey === endpoints.interfaceKey &&
    flow.destinationIp === endpoints.destinationIp &&
    flow.sourceIp === endpoints.sourceIp &&
    (ignorePort || flow.destinationPort === endpoints.destinationPort)
  );
}

function endpointsOf(flow: FlowRecord): FlowEndpoints {
  return {
    transportType: flow.transportType,
    destinationIp: flow.destinationIp,
    destinationPort: flow.destinationPort,
    sourceIp: flow.sourceIp,
    interfaceKey: flow.interfaceKey,
  };
}

function findMatch(
  store: FlowEntityStore,
  direction: FlowDirection,
  instance: string | null,
  endpoints: FlowEndpoints | null,
  ignorePort: boolean
): FlowRecord | undefined {
  if (instance) {
    const byInstance = store.getFlow(direction, instance);
    if (byInstance) return byInstance;
  }
  if (!endpoints) return undefined;
  return store.allFlows(direction).find((flow) => endpointsMatch(flow, endpoints, ignorePort));
}

function emptyResult(action: ProvisioningAction): ProvisioningResult {
  return {
    action,
    changed: { incoming: [], outgoing: [] },
    deleted: { incoming: [], outgoing: [] },
    ignored: { incoming: [], outgoing: [] },
    rejected: [],
  };
}

function malformed(index: number, error: z.ZodError): RejectedProvisioningEntry {
  return { code: FlowEngineErrorCode.MALFORMED_INPUT, index, reason: describeIssues(error) };
}

function pushChanged(result: ProvisioningResult, flow: FlowRecord): void {
  if (flow.direction === 'incoming') {
    result.changed.incoming.push(flow);
  } else {
    result.changed.outgoing.push(flow);
  }
}

// =============================================================================
// ProvisioningMessageHandler
// =============================================================================

export class ProvisioningMessageHandler {
  private readonly logger: Logger;

  constructor(config: ProvisioningHandlerConfig) {
    this.logger = config.logger.child({ component: 'ProvisioningMessageHandler' });
  }

  /**
   * Decode the message envelope.
   *
   * @throws FlowEngineError INVALID_MESSAGE when the envelope is unusable
   */
  decode(raw: unknown): ProvisioningMessage {
    const result = ProvisioningMessageSchema.safeParse(raw);
    if (!result.success) {
      throw new FlowEngineError(
        FlowEngineErrorCode.INVALID_MESSAGE,
        `Invalid provisioning message: ${describeIssues(result.error)}`
      );
    }
    return result.data;
  }

  /**
   * Apply a decoded message to the store.
   */
  handle(
    store: FlowEntityStore,
    message: ProvisioningMessage,
    options: ProvisioningOptions
  ): ProvisioningResult {
    const ignorePort = message.ignore_destination_port ?? options.ignoreDestinationPort;
    const result = emptyResult(message.action);

    message.flows.forEach((entry, index) => {
      try {
        if (message.action === 'add') {
          const parsed = ProvisionedFlowSchema.safeParse(entry);
          if (!parsed.success) {
            result.rejected.push(malformed(index, parsed.error));
            return;
          }
          this.applyAdd(store, parsed.data, ignorePort, result);
        } else {
          const parsed = ProvisionedFlowRemovalSchema.safeParse(entry);
          if (!parsed.success) {
            result.rejected.push(malformed(index, parsed.error));
            return;
          }
          this.applyRemove(store, parsed.data, ignorePort, result);
        }
      } catch (err) {
        if (!(err instanceof FlowEngineError)) throw err;
        result.rejected.push({ code: err.code, index, reason: err.message });
      }
    });

    if (result.rejected.length > 0) {
      this.logger.warn(
        { action: message.action, rejected: result.rejected },
        'Provisioning message entries rejected'
      );
    }

    this.logger.info(
      {
        action: message.action,
        ignorePort,
        changed: result.changed.incoming.length + result.changed.outgoing.length,
        deleted: result.deleted.incoming.length + result.deleted.outgoing.length,
        rejected: result.rejected.length,
      },
      'Provisioning message applied'
    );

    return result;
  }

  // ===========================================================================
  // Add
  // ===========================================================================

  private applyAdd(
    store: FlowEntityStore,
    flow: ProvisionedFlow,
    ignorePort: boolean,
    result: ProvisioningResult
  ): void {
    const endpoints: FlowEndpoints = {
      transportType: flow.transportType,
      destinationIp: flow.destinationIp,
      destinationPort: flow.destinationPort,
      sourceIp: flow.sourceIp,
      interfaceKey: flow.interfaceKey,
    };
    const existing = findMatch(store, flow.direction, flow.instance, endpoints, ignorePort);
    const next = applyFlowEvent(flowState(existing), 'provisioning_add');
    const attributes = stateAttributes(next);
    if (!attributes) return;

    if (!existing) {
      const instance = flow.instance ?? defaultFlowInstance(endpoints);
      // The derived key may already belong to a flow that differs on port
      if (store.getFlow(flow.direction, instance)) {
        throw new FlowEngineError(
          FlowEngineErrorCode.MALFORMED_INPUT,
          `Flow ${instance} already exists with other attributes; name its instance to provision it`
        );
      }
      const created = createFlow(flow.direction, {
        instance,
        ...endpoints,
        bitrate: 0,
        expectedBitrate: flow.expectedBitrate,
        expectedBitrateStatus: 'Normal',
        label: flow.label,
        linkedFlow: flow.provisionedFlowId,
        owner: attributes.owner,
        present: attributes.present,
      });
      store.upsertFlow(created);
      pushChanged(result, created);
      return;
    }

    // Observed endpoints stay authoritative while the device reports the flow
    const takeEndpoints = !existing.present;
    const updated: FlowRecord = {
      ...existing,
      ...(takeEndpoints ? endpoints : {}),
      expectedBitrate: flow.expectedBitrate ?? existing.expectedBitrate,
      label: flow.label ?? existing.label,
      linkedFlow: flow.provisionedFlowId ?? existing.linkedFlow,
      owner: attributes.owner,
      present: attributes.present,
    };
    store.upsertFlow(updated);

    const ownerChanged = existing.owner !== updated.owner;
    const endpointsChanged =
      JSON.stringify(endpointsOf(existing)) !== JSON.stringify(endpointsOf(updated));
    if (ownerChanged || endpointsChanged) {
      pushChanged(result, updated);
    }
  }

  // ===========================================================================
  // Remove
  // ===========================================================================

  private applyRemove(
    store: FlowEntityStore,
    removal: ProvisionedFlowRemoval,
    ignorePort: boolean,
    result: ProvisioningResult
  ): void {
    const existing = findMatch(
      store,
      removal.direction,
      removal.instance,
      removal.endpoints,
      ignorePort
    );
    const state = flowState(existing);

    if (!existing || (state !== 'ProvisionedAbsent' && state !== 'ProvisionedPresent')) {
      const key = existing?.instance ?? removal.instance ?? '(unmatched)';
      result.ignored[removal.direction].push(key);
      return;
    }

    const attributes = stateAttributes(applyFlowEvent(state, 'provisioning_remove'));
    if (!attributes) {
      store.remove(removal.direction, existing.instance);
      result.deleted[removal.direction].push(existing.instance);
      return;
    }

    const reverted: FlowRecord = {
      ...existing,
      expectedBitrate: null,
      linkedFlow: null,
      owner: attributes.owner,
      present: attributes.present,
    };
    store.upsertFlow(reverted);
    pushChanged(result, reverted);
  }
}

// =============================================================================
// Caller-side linking
// =============================================================================

/**
 * Populate the outgoing → incoming foreign key for outgoing IP flows
 * returned by a provisioning call. The key is `sourceIp/destinationIp`
 * and is only set when an incoming flow with that instance prefix
 * exists; otherwise the link stays null. Incoming flows are never linked
 * from here, so a link is only ever held on one side.
 *
 * @returns number of outgoing flows linked
 */
export function linkChangedFlows(store: FlowEntityStore, result: ProvisioningResult): number {
  let linked = 0;
  const incoming = store.all('incoming');

  for (const flow of result.changed.outgoing) {
    if (flow.transportType !== 'IP' || !flow.sourceIp || !flow.destinationIp) continue;

    const current = store.get('outgoing', flow.instance);
    if (!current || current.incomingFlowKey) continue;

    const key = `${flow.sourceIp}/${flow.destinationIp}`;
    const hasIncoming = incoming.some(
      (candidate) => candidate.instance === key || candidate.instance.startsWith(`${key}/`)
    );
    if (!hasIncoming) continue;

    store.upsert('outgoing', { ...current, incomingFlowKey: key });
    linked += 1;
  }

  return linked;
}
