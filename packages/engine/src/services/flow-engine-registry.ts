/**
 * FlowEngineRegistry - One engine per device
 *
 * Engines for different devices share nothing and may run in parallel.
 * A fresh engine (empty store, empty write cache) is obtained with
 * `reset`, typically at process startup. Its first sync bulk-replaces the
 * device's tables, so no stale rows from a previous run survive.
 *
 * A reset closes the old engine and starts the new one's queue behind
 * whatever the old one still had queued: one writer per device at a time.
 *
 * @module packages/engine/services/flow-engine-registry
 */

import type { Logger } from 'pino';
import type {
  IDevicePoller,
  IFlowTableStorage,
  IPhysicalInterfaceResolver,
} from '@flowmesh/core/ports';
import type { Config, ReconcileOptions } from '../config.js';
import { createLogger } from '../logger.js';
import { DeviceFlowEngine, type SnapshotCycleResult } from './device-flow-engine.js';

export interface FlowEngineRegistryConfig {
  logger: Logger;
  options: ReconcileOptions;
  /** Table storage for a device */
  storageFactory: (deviceId: string) => IFlowTableStorage;
  resolver?: IPhysicalInterfaceResolver;
  interfaceParameterGroupId?: number;
}

export class FlowEngineRegistry {
  private readonly engines = new Map<string, DeviceFlowEngine>();
  /** deviceId → drain of the most recently closed engine */
  private readonly draining = new Map<string, Promise<void>>();
  private readonly config: FlowEngineRegistryConfig;
  private readonly logger: Logger;

  constructor(config: FlowEngineRegistryConfig) {
    this.config = config;
    this.logger = config.logger.child({ component: 'FlowEngineRegistry' });
  }

  /**
   * Engine for a device, created on first use.
   */
  get(deviceId: string): DeviceFlowEngine {
    const existing = this.engines.get(deviceId);
    if (existing) return existing;
    return this.create(deviceId);
  }

  has(deviceId: string): boolean {
    return this.engines.has(deviceId);
  }

  deviceIds(): string[] {
    return [...this.engines.keys()];
  }

  /**
   * Discard any cached state for a device and return a fresh engine.
   */
  reset(deviceId: string): DeviceFlowEngine {
    const previous = this.engines.get(deviceId);
    if (previous) {
      this.retire(previous);
      this.logger.info({ deviceId }, 'Discarded cached flow state');
    }
    return this.create(deviceId);
  }

  /**
   * Drop every engine. Subsequent `get` calls start fresh.
   */
  resetAll(): void {
    const count = this.engines.size;
    for (const engine of this.engines.values()) this.retire(engine);
    this.logger.info({ devices: count }, 'Discarded all cached flow state');
  }

  /**
   * Resolves once every closed engine has finished its queued cycles.
   */
  async drained(): Promise<void> {
    await Promise.all(this.draining.values());
  }

  /**
   * Poll a device through its engine.
   */
  poll(poller: IDevicePoller): Promise<SnapshotCycleResult> {
    return this.get(poller.deviceId).pollOnce(poller);
  }

  private retire(engine: DeviceFlowEngine): void {
    this.engines.delete(engine.deviceId);
    this.draining.set(engine.deviceId, engine.close());
  }

  private create(deviceId: string): DeviceFlowEngine {
    const engine = new DeviceFlowEngine({
      deviceId,
      storage: this.config.storageFactory(deviceId),
      logger: this.config.logger,
      options: this.config.options,
      resolver: this.config.resolver,
      interfaceParameterGroupId: this.config.interfaceParameterGroupId,
      after: this.draining.get(deviceId),
    });
    this.engines.set(deviceId, engine);
    return engine;
  }
}

/**
 * Build a registry from loaded configuration.
 */
export function createFlowEngineRegistry(
  config: Config,
  deps: Pick<FlowEngineRegistryConfig, 'storageFactory' | 'resolver'> & { logger?: Logger }
): FlowEngineRegistry {
  return new FlowEngineRegistry({
    logger: deps.logger ?? createLogger(config),
    options: {
      bitrateTolerancePercent: config.bitrateTolerancePercent,
      ignoreDestinationPort: config.ignoreDestinationPort,
    },
    storageFactory: deps.storageFactory,
    resolver: deps.resolver,
    interfaceParameterGroupId: config.interfaceParameterGroupId,
  });
}
