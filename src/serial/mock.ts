/**
 * Mock Serial Transport for Testing
 * SOLID: Liskov Substitution - can replace the serialport transport in tests
 */

import type { PortDescriptor } from "../discovery/interface";
import type { Connection, ConnectionConfig, SerialTransport } from "./transport";
import { ReadBuffer } from "./read-buffer";
import { ConnectionClosedError } from "../errors";

export interface MockDevice {
  openError?: unknown;
  openDelay?: number;            // ms before open settles
  closeError?: unknown;
  /** Reply to each write; nothing is sent back when it returns undefined */
  respond?: (written: Buffer) => Uint8Array | string | undefined;
}

export class MockConnection implements Connection {
  private readonly buffer: ReadBuffer;
  private closed = false;
  public readonly written: Buffer[] = [];
  public closeCalls = 0;

  constructor(
    readonly port: PortDescriptor,
    readonly config: ConnectionConfig,
    private readonly device: MockDevice
  ) {
    this.buffer = new ReadBuffer(port.path);
  }

  get isOpen(): boolean {
    return !this.closed;
  }

  async write(data: Uint8Array | string): Promise<void> {
    if (this.closed) {
      throw new ConnectionClosedError(this.port.path);
    }
    const chunk = typeof data === "string" ? Buffer.from(data, "utf8") : Buffer.from(data);
    this.written.push(chunk);

    const reply = this.device.respond?.(chunk);
    if (reply !== undefined) {
      this.receive(reply);
    }
  }

  read(length: number, timeout?: number): Promise<Buffer> {
    return this.buffer.read(length, timeout);
  }

  readUntil(byte: number, timeout?: number): Promise<Buffer> {
    return this.buffer.readUntil(byte, timeout);
  }

  async close(): Promise<void> {
    this.closeCalls++;
    if (this.closed) return;
    this.closed = true;
    this.buffer.fail(new ConnectionClosedError(this.port.path));

    if (this.device.closeError !== undefined) {
      throw this.device.closeError;
    }
  }

  // Helper to simulate bytes arriving from the device
  receive(data: Uint8Array | string): void {
    this.buffer.push(typeof data === "string" ? Buffer.from(data, "utf8") : data);
  }
}

export class MockTransport implements SerialTransport {
  private devices: Record<string, MockDevice>;
  public readonly opened: MockConnection[] = [];
  public readonly openAttempts: string[] = [];

  constructor(devices: Record<string, MockDevice> = {}) {
    this.devices = devices;
  }

  async open(port: PortDescriptor, config: ConnectionConfig): Promise<Connection> {
    this.openAttempts.push(port.path);
    const device = this.devices[port.path] ?? {};

    if (device.openDelay !== undefined) {
      await new Promise((resolve) => setTimeout(resolve, device.openDelay));
    }

    if (device.openError !== undefined) {
      throw device.openError;
    }

    const connection = new MockConnection(port, config, device);
    this.opened.push(connection);
    return connection;
  }

  /**
   * Connections that have not been closed yet
   */
  openConnections(): MockConnection[] {
    return this.opened.filter((c) => c.isOpen);
  }

  // Helper to update mock state during test
  setDevice(path: string, device: MockDevice): void {
    this.devices = { ...this.devices, [path]: device };
  }

  reset(): void {
    this.opened.length = 0;
    this.openAttempts.length = 0;
  }
}
