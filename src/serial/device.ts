/**
 * Serial Device
 * Base class for a device reached through a serial port whose name is
 * not known in advance. Subclasses only say how to recognise the device.
 *
 * Usage:
 * ```typescript
 * class Thermometer extends SerialDevice<string> {
 *   async testConnection(conn: Connection) {
 *     const reply = await request(conn, "V\n", { until: 0x0a, timeout: 300 });
 *     const version = reply.toString().trim();
 *     return version.startsWith("THERMO")
 *       ? { ok: true as const, identity: version }
 *       : { ok: false as const, reason: `unexpected banner ${version}` };
 *   }
 * }
 *
 * const thermometer = new Thermometer();
 * await thermometer.connect({ baudRate: 9600 });
 * ```
 */

import type { PortDescriptor } from "../discovery/interface";
import type { Connection, ConnectionConfig } from "./transport";
import { PortResolver, type PortResolverOptions, type TestOutcome } from "./resolver";

export abstract class SerialDevice<I = unknown> {
  port: PortDescriptor | undefined = undefined;
  connection: Connection | undefined = undefined;
  identity: I | undefined = undefined;

  protected readonly resolver: PortResolver;

  constructor(options: PortResolverOptions = {}) {
    this.resolver = new PortResolver(options);
  }

  /**
   * Decide whether an open connection leads to this device
   */
  abstract testConnection(connection: Connection): Promise<TestOutcome<I>>;

  /**
   * Probe the candidates (all host ports by default) and keep the
   * first connection that passes testConnection()
   * @throws NoDeviceFoundError
   */
  async connect(
    config: Partial<ConnectionConfig> = {},
    candidates?: readonly PortDescriptor[]
  ): Promise<Connection> {
    await this.disconnect();

    const resolution = await this.resolver.resolveDevice<I>(
      (connection) => this.testConnection(connection),
      config,
      candidates
    );

    this.port = resolution.port;
    this.connection = resolution.connection;
    this.identity = resolution.identity;
    return resolution.connection;
  }

  isConnected(): boolean {
    return this.connection?.isOpen ?? false;
  }

  async disconnect(): Promise<void> {
    const connection = this.connection;
    this.port = undefined;
    this.connection = undefined;
    this.identity = undefined;

    if (connection) {
      await connection.close();
    }
  }
}
