/**
 * Serial Port Connection
 * Connection and transport backed by the serialport package
 */

import { SerialPort } from "serialport";
import type { PortDescriptor } from "../discovery/interface";
import type { Connection, ConnectionConfig, SerialTransport } from "./transport";
import { ReadBuffer } from "./read-buffer";
import { ConnectionClosedError } from "../errors";
import { createLogger } from "../utils/log";

const log = createLogger("serial");

type ErrorCallback = (err: Error | null) => void;

/**
 * The part of SerialPort this module uses
 */
export interface SerialPortLike {
  readonly isOpen: boolean;
  open(callback: ErrorCallback): void;
  close(callback: ErrorCallback): void;
  write(data: Buffer, callback: (err: Error | null | undefined) => void): boolean;
  drain(callback: ErrorCallback): void;
  on(event: "data", listener: (data: Buffer) => void): unknown;
  on(event: "error", listener: (err: Error) => void): unknown;
  on(event: "close", listener: () => void): unknown;
  removeAllListeners(): unknown;
}

export interface SerialPortSettings {
  path: string;
  baudRate: number;
  dataBits: 5 | 6 | 7 | 8;
  stopBits: 1 | 1.5 | 2;
  parity: "none" | "even" | "odd" | "mark" | "space";
  rtscts: boolean;
  autoOpen: false;
}

/**
 * Function to create a port instance (injectable for testing)
 */
export type CreatePortFn = (settings: SerialPortSettings) => SerialPortLike;

export function defaultCreatePort(settings: SerialPortSettings): SerialPortLike {
  return new SerialPort(settings);
}

export class SerialPortConnection implements Connection {
  private readonly buffer: ReadBuffer;
  private closed = false;

  constructor(
    readonly port: PortDescriptor,
    private readonly serial: SerialPortLike
  ) {
    this.buffer = new ReadBuffer(port.path);

    this.serial.on("data", (data: Buffer) => {
      this.buffer.push(data);
    });

    this.serial.on("error", (err) => {
      log.debug(`Error on ${port.path}: ${err.message}`);
      this.buffer.fail(err);
    });

    this.serial.on("close", () => {
      this.markClosed();
    });
  }

  get isOpen(): boolean {
    return !this.closed && this.serial.isOpen;
  }

  async write(data: Uint8Array | string): Promise<void> {
    if (!this.isOpen) {
      throw new ConnectionClosedError(this.port.path);
    }

    const chunk = typeof data === "string" ? Buffer.from(data, "utf8") : Buffer.from(data);
    return new Promise((resolve, reject) => {
      this.serial.write(chunk, (err) => {
        if (err) {
          reject(err);
          return;
        }
        // Drain to ensure data is sent
        this.serial.drain((drainErr) => {
          if (drainErr) {
            reject(drainErr);
          } else {
            resolve();
          }
        });
      });
    });
  }

  read(length: number, timeout?: number): Promise<Buffer> {
    return this.buffer.read(length, timeout);
  }

  readUntil(byte: number, timeout?: number): Promise<Buffer> {
    return this.buffer.readUntil(byte, timeout);
  }

  /**
   * Close the port. If the OS close fails the connection stays open
   * and a later close() tries again.
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.buffer.fail(new ConnectionClosedError(this.port.path));

    if (!this.serial.isOpen) {
      this.closed = true;
      this.serial.removeAllListeners();
      return;
    }

    return new Promise((resolve, reject) => {
      this.serial.close((err) => {
        if (err) {
          reject(err);
          return;
        }
        this.closed = true;
        this.serial.removeAllListeners();
        log.debug(`Closed ${this.port.path}`);
        resolve();
      });
    });
  }

  private markClosed(): void {
    this.closed = true;
    this.buffer.fail(new ConnectionClosedError(this.port.path));
  }
}

export interface SerialPortTransportOptions {
  createPort?: CreatePortFn;
}

export class SerialPortTransport implements SerialTransport {
  private createPort: CreatePortFn;

  constructor(options: SerialPortTransportOptions = {}) {
    this.createPort = options.createPort ?? defaultCreatePort;
  }

  open(port: PortDescriptor, config: ConnectionConfig): Promise<Connection> {
    const serial = this.createPort({
      path: port.path,
      baudRate: config.baudRate,
      dataBits: config.dataBits ?? 8,
      stopBits: config.stopBits ?? 1,
      parity: config.parity ?? "none",
      rtscts: config.rtscts ?? false,
      autoOpen: false,
    });

    return new Promise((resolve, reject) => {
      serial.open((err) => {
        if (err) {
          reject(err);
          return;
        }
        log.debug(`Opened ${port.path} at ${config.baudRate} baud`);
        resolve(new SerialPortConnection(port, serial));
      });
    });
  }
}
