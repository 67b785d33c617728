/**
 * Device Collaborator Ports
 *
 * The engine does not know how a device is polled or how a physical
 * interface is discovered; these interfaces are the boundary.
 *
 * @module packages/core/ports/device-collaborators
 */

// =============================================================================
// Device Poller
// =============================================================================

/**
 * Raw snapshot as produced by a poller. Entries are validated by the
 * engine one by one, so a poller may pass through whatever the device
 * returned.
 */
export interface RawDeviceSnapshot {
  /** Full interface list; omit to leave interfaces untouched */
  interfaces?: readonly unknown[];
  /** Omit a direction to leave its flows untouched */
  incoming?: readonly unknown[];
  outgoing?: readonly unknown[];
}

export interface IDevicePoller {
  /** Device identity the snapshots belong to */
  readonly deviceId: string;

  /**
   * Poll the device once.
   */
  poll(): Promise<RawDeviceSnapshot>;
}

// =============================================================================
// Physical Interface Resolver
// =============================================================================

/**
 * Maps a parameter-group identifier and index to a physical interface
 * identifier. Only used to fill in the interface's external reference.
 */
export interface IPhysicalInterfaceResolver {
  /**
   * @returns the physical interface id, or null when not found
   */
  resolve(parameterGroupId: number, index: string): Promise<string | null>;
}
