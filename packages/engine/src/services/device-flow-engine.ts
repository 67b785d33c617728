/**
 * DeviceFlowEngine - Reconciliation cycles for a single device
 *
 * Owns the device's flow store and runs every cycle through one serial
 * queue:
 *
 *   poll snapshot ─┐
 *                  ├─► merge ─► recompute aggregates ─► sync tables
 *   provisioning ──┘
 *
 * A snapshot joins the queue as soon as it is handed in; physical
 * interface resolution starts at the same time and the cycle picks up its
 * result. Table writes are the only step that may fail; they never roll
 * back the store.
 *
 * Once closed, the engine finishes what is queued and refuses new cycles.
 * A replacement engine passes the closed engine's drain as `after` so the
 * device keeps a single writer.
 *
 * @module packages/engine/services/device-flow-engine
 */

import type { Logger } from 'pino';
import type {
  FlowDirection,
  FlowLifecycleState,
  FlowRecord,
  InterfaceRecord,
} from '@flowmesh/core/domain';
import {
  FLOW_DIRECTIONS,
  FlowEngineError,
  FlowEngineErrorCode,
  flowState,
} from '@flowmesh/core/domain';
import type {
  IDevicePoller,
  IFlowTableStorage,
  IPhysicalInterfaceResolver,
  RawDeviceSnapshot,
} from '@flowmesh/core/ports';
import type { ReconcileOptions } from '../config.js';
import {
  parseSnapshot,
  type InterfaceObservation,
  type ParsedSnapshot,
  type RejectedEntry,
} from '../schemas/device-snapshot.js';
import {
  recordCycle,
  recordRejected,
  updateFlowStateCounts,
  updateUnresolvedFlows,
} from '../metrics.js';
import { AggregateCalculator, type AggregateResult } from './aggregate-calculator.js';
import { DeviceSerialQueue } from './device-serial-queue.js';
import { FlowEntityStore } from './flow-entity-store.js';
import {
  ProvisioningMessageHandler,
  linkChangedFlows,
  type ProvisioningResult,
} from './provisioning-handler.js';
import { ReconciliationMerger, type FlowMergeResult } from './reconciliation-merger.js';
import { TableSynchronizer, type SyncResult } from './table-synchronizer.js';

// =============================================================================
// Types
// =============================================================================

export interface DeviceFlowEngineConfig {
  deviceId: string;
  storage: IFlowTableStorage;
  logger: Logger;
  options: ReconcileOptions;
  /** Resolves physical interface ids for polled interfaces */
  resolver?: IPhysicalInterfaceResolver;
  /** Parameter group handed to the resolver; resolution is off without it */
  interfaceParameterGroupId?: number;
  /** Settles when the device's previous engine has drained */
  after?: Promise<void>;
}

export interface SnapshotCycleResult {
  merge: { incoming: FlowMergeResult; outgoing: FlowMergeResult };
  interfacesReplaced: boolean;
  rejected: RejectedEntry[];
  aggregates: AggregateResult;
  sync: SyncResult;
}

export interface ProvisioningCycleResult {
  provisioning: ProvisioningResult;
  /** Outgoing flows that received an incoming-flow link */
  linked: number;
  aggregates: AggregateResult;
  sync: SyncResult;
}

export interface InterfaceCycleResult {
  rejected: RejectedEntry[];
  aggregates: AggregateResult;
  sync: SyncResult;
}

type CycleKind = 'poll' | 'provisioning' | 'interfaces';

// =============================================================================
// DeviceFlowEngine
// =============================================================================

export class DeviceFlowEngine {
  readonly deviceId: string;

  private readonly store = new FlowEntityStore();
  private readonly queue: DeviceSerialQueue;
  private readonly merger: ReconciliationMerger;
  private readonly calculator: AggregateCalculator;
  private readonly provisioning: ProvisioningMessageHandler;
  private readonly synchronizer: TableSynchronizer;
  private readonly logger: Logger;
  private readonly options: ReconcileOptions;
  private readonly resolver: IPhysicalInterfaceResolver | undefined;
  private readonly parameterGroupId: number | undefined;
  private closed = false;

  constructor(config: DeviceFlowEngineConfig) {
    this.deviceId = config.deviceId;
    this.queue = new DeviceSerialQueue(config.after);
    this.logger = config.logger.child({ component: 'DeviceFlowEngine', deviceId: config.deviceId });
    this.options = config.options;
    this.resolver = config.resolver;
    this.parameterGroupId = config.interfaceParameterGroupId;

    this.merger = new ReconciliationMerger({ logger: this.logger });
    this.calculator = new AggregateCalculator({ logger: this.logger });
    this.provisioning = new ProvisioningMessageHandler({ logger: this.logger });
    this.synchronizer = new TableSynchronizer({ storage: config.storage, logger: this.logger });
  }

  // ===========================================================================
  // Cycles
  // ===========================================================================

  /**
   * Poll the device once and reconcile the result.
   */
  async pollOnce(poller: IDevicePoller): Promise<SnapshotCycleResult> {
    const snapshot = await poller.poll();
    return this.applySnapshot(snapshot);
  }

  /**
   * Reconcile a device snapshot. Malformed entries are rejected and
   * reported; the rest of the snapshot still applies.
   */
  applySnapshot(raw: RawDeviceSnapshot): Promise<SnapshotCycleResult> {
    const parsed = parseSnapshot(raw);
    recordRejected('snapshot', parsed.rejected.length);
    if (parsed.rejected.length > 0) {
      this.logger.warn({ rejected: parsed.rejected }, 'Snapshot entries rejected');
    }

    const resolving = parsed.interfaces
      ? this.resolvePhysicalInterfaces(parsed.interfaces)
      : Promise.resolve(null);

    return this.runCycle('poll', async () => {
      const interfaces = await resolving;
      if (interfaces) {
        this.merger.replaceInterfaces(this.store, interfaces);
      }
      const merge = {
        incoming: this.mergeDirection(raw, parsed, 'incoming'),
        outgoing: this.mergeDirection(raw, parsed, 'outgoing'),
      };
      const aggregates = this.recompute();
      const sync = await this.synchronizer.sync(this.store);

      return {
        merge,
        interfacesReplaced: interfaces !== null,
        rejected: parsed.rejected,
        aggregates,
        sync,
      };
    });
  }

  /**
   * Bulk-replace the interface list outside a full poll.
   */
  replaceInterfaces(rawInterfaces: readonly unknown[]): Promise<InterfaceCycleResult> {
    const parsed = parseSnapshot({ interfaces: rawInterfaces });
    recordRejected('snapshot', parsed.rejected.length);
    const resolving = this.resolvePhysicalInterfaces(parsed.interfaces ?? []);

    return this.runCycle('interfaces', async () => {
      const interfaces = await resolving;
      this.merger.replaceInterfaces(this.store, interfaces);
      const aggregates = this.recompute();
      const sync = await this.synchronizer.sync(this.store);
      return { rejected: parsed.rejected, aggregates, sync };
    });
  }

  /**
   * Apply a provisioning message and link the flows it added or changed.
   *
   * @throws FlowEngineError INVALID_MESSAGE when the envelope cannot be decoded
   */
  async handleProvisioningMessage(raw: unknown): Promise<ProvisioningCycleResult> {
    const message = this.provisioning.decode(raw);

    return this.runCycle('provisioning', async () => {
      const provisioning = this.provisioning.handle(this.store, message, this.options);
      recordRejected('provisioning', provisioning.rejected.length);
      const linked = linkChangedFlows(this.store, provisioning);
      const aggregates = this.recompute();
      const sync = await this.synchronizer.sync(this.store);
      return { provisioning, linked, aggregates, sync };
    });
  }

  /**
   * Retry outstanding table writes without a new observation.
   */
  sync(): Promise<SyncResult> {
    if (this.closed) return Promise.reject(this.closedError());
    return this.queue.run(() => this.synchronizer.sync(this.store));
  }

  /**
   * Refuse new cycles. Resolves once the cycles already queued are done.
   */
  close(): Promise<void> {
    this.closed = true;
    return this.queue.idle();
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Resolves once every queued cycle has finished.
   */
  idle(): Promise<void> {
    return this.queue.idle();
  }

  // ===========================================================================
  // Reads
  // ===========================================================================

  interfaces(): InterfaceRecord[] {
    return this.store.all('interfaces');
  }

  flows(direction: FlowDirection): FlowRecord[] {
    return this.store.allFlows(direction);
  }

  getFlow(direction: FlowDirection, instance: string): FlowRecord | undefined {
    return this.store.getFlow(direction, instance);
  }

  getInterface(instance: string): InterfaceRecord | undefined {
    return this.store.get('interfaces', instance);
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private runCycle<T>(kind: CycleKind, cycle: () => Promise<T>): Promise<T> {
    if (this.closed) return Promise.reject(this.closedError());
    return this.queue.run(async () => {
      const started = performance.now();
      try {
        const result = await cycle();
        recordCycle(kind, 'success', (performance.now() - started) / 1000);
        this.updateStateMetrics();
        return result;
      } catch (err) {
        recordCycle(kind, 'failure', (performance.now() - started) / 1000);
        this.logger.error({ err, kind }, 'Reconciliation cycle failed');
        throw err;
      }
    });
  }

  /**
   * A direction the snapshot does not carry is left untouched.
   */
  private mergeDirection(
    raw: RawDeviceSnapshot,
    parsed: ParsedSnapshot,
    direction: FlowDirection
  ): FlowMergeResult {
    if (raw[direction] === undefined) {
      return { direction, created: [], updated: [], markedAbsent: [], deleted: [] };
    }
    return this.merger.mergeFlows(
      this.store,
      direction,
      parsed[direction],
      parsed.unparsedInstances[direction]
    );
  }

  private recompute(): AggregateResult {
    const result = this.calculator.recompute(this.store, {
      bitrateTolerancePercent: this.options.bitrateTolerancePercent,
    });
    updateUnresolvedFlows(this.deviceId, result.unresolved.length);
    return result;
  }

  private async resolvePhysicalInterfaces(
    interfaces: InterfaceObservation[]
  ): Promise<InterfaceObservation[]> {
    const resolver = this.resolver;
    const groupId = this.parameterGroupId;
    if (!resolver || groupId === undefined) return interfaces;

    return Promise.all(
      interfaces.map(async (observation) => {
        if (observation.physicalInterfaceId) return observation;
        try {
          const physicalInterfaceId = await resolver.resolve(groupId, observation.instance);
          return { ...observation, physicalInterfaceId };
        } catch (err) {
          this.logger.warn(
            { err, interface: observation.instance },
            'Physical interface resolution failed'
          );
          return observation;
        }
      })
    );
  }

  private closedError(): FlowEngineError {
    return new FlowEngineError(
      FlowEngineErrorCode.ENGINE_CLOSED,
      `Flow engine for ${this.deviceId} was reset; use the registry's current engine`,
      { deviceId: this.deviceId }
    );
  }

  private updateStateMetrics(): void {
    for (const direction of FLOW_DIRECTIONS) {
      const counts: Record<Exclude<FlowLifecycleState, 'NoRow'>, number> = {
        ProvisionedAbsent: 0,
        ProvisionedPresent: 0,
        ObservedPresent: 0,
      };
      for (const flow of this.store.allFlows(direction)) {
        const state = flowState(flow);
        if (state !== 'NoRow') counts[state] += 1;
      }
      updateFlowStateCounts(this.deviceId, direction, counts);
    }
  }
}
