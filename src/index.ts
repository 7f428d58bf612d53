/**
 * serial-probe - Entry Point
 * Find the serial port a device is attached to and open it
 */

import type { PortDescriptor } from "./discovery/interface";
import { createEnumerator } from "./discovery";
import type { Connection, ConnectionConfig } from "./serial/transport";
import { PortResolver, type ConnectionTest, type Resolution } from "./serial/resolver";

export * from "./discovery";
export * from "./errors";
export * from "./serial/transport";
export * from "./serial/connection";
export * from "./serial/mock";
export * from "./serial/resolver";
export * from "./serial/device";
export { config, defaultConnectionConfig } from "./config";
export { setLogLevel, getLogLevel, type LogLevel } from "./utils/log";

/**
 * List the serial ports currently present on this host, sorted by path
 * @throws EnumerationError
 */
export function listPorts(): Promise<PortDescriptor[]> {
  return createEnumerator().listPorts();
}

/**
 * Open the first port (host ports unless `candidates` is given) that
 * passes `test`. The returned connection is open and owned by the caller.
 * @throws NoDeviceFoundError
 */
export function resolve<I>(
  test: ConnectionTest<I>,
  config: Partial<ConnectionConfig> = {},
  candidates?: readonly PortDescriptor[]
): Promise<Connection> {
  return new PortResolver().resolve(test, config, candidates);
}

export function resolveDevice<I>(
  test: ConnectionTest<I>,
  config: Partial<ConnectionConfig> = {},
  candidates?: readonly PortDescriptor[]
): Promise<Resolution<I>> {
  return new PortResolver().resolveDevice(test, config, candidates);
}
