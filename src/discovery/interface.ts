/**
 * Port Enumeration Interface
 * SOLID: Single Responsibility - only lists ports, never opens them
 * SOLID: Dependency Inversion - the resolver depends on this abstraction
 */

/**
 * One serial port as seen by the host at enumeration time.
 * May be stale by the time it is opened.
 */
export interface PortDescriptor {
  readonly path: string;
  readonly vendorId?: string;
  readonly productId?: string;
  readonly serialNumber?: string;
  readonly manufacturer?: string;
  readonly pnpId?: string;
  readonly locationId?: string;
}

export interface PortEnumerator {
  /**
   * Snapshot of the serial ports currently present
   * @throws EnumerationError when the host listing fails
   */
  listPorts(): Promise<PortDescriptor[]>;
}

/**
 * "<vid>:<pid>" key of a port, or undefined without both IDs
 */
export function vidPidOf(port: PortDescriptor): string | undefined {
  if (!port.vendorId || !port.productId) return undefined;
  return `${port.vendorId}:${port.productId}`.toLowerCase();
}

export function comparePorts(a: PortDescriptor, b: PortDescriptor): number {
  if (a.path < b.path) return -1;
  if (a.path > b.path) return 1;
  return 0;
}
