/**
 * DeviceSerialQueue - One-at-a-time execution for a device's cycles
 *
 * Poll-driven and provisioning-driven cycles for the same device read and
 * mutate the store across several rows, so they run strictly in arrival
 * order. A task that rejects does not block the ones queued behind it.
 *
 * @module packages/engine/services/device-serial-queue
 */

export class DeviceSerialQueue {
  private tail: Promise<void>;
  private pending = 0;

  /**
   * @param after - work that must settle before the first task starts
   */
  constructor(after: Promise<void> = Promise.resolve()) {
    this.tail = after;
  }

  /**
   * Queue a task; resolves or rejects with the task's own outcome.
   */
  run<T>(task: () => Promise<T> | T): Promise<T> {
    this.pending += 1;
    const result = this.tail.then(() => task());
    this.tail = result.then(
      () => this.settle(),
      () => this.settle()
    );
    return result;
  }

  /** Tasks queued or running */
  get size(): number {
    return this.pending;
  }

  /**
   * Resolves once everything queued so far has finished.
   */
  idle(): Promise<void> {
    return this.tail;
  }

  private settle(): void {
    this.pending -= 1;
  }
}
