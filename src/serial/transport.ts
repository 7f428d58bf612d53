/**
 * Serial Transport Interface
 * The resolver only needs open() and close(); reads and writes are
 * for the caller's connection test.
 */

import type { PortDescriptor } from "../discovery/interface";

export interface ConnectionConfig {
  baudRate: number;
  dataBits?: 5 | 6 | 7 | 8;
  stopBits?: 1 | 1.5 | 2;
  parity?: "none" | "even" | "odd" | "mark" | "space";
  rtscts?: boolean;
  openTimeout?: number;  // ms, no limit if unset
  testTimeout?: number;  // ms, no limit if unset
}

export interface Connection {
  readonly port: PortDescriptor;
  readonly isOpen: boolean;

  write(data: Uint8Array | string): Promise<void>;

  /**
   * Read exactly `length` bytes
   * @throws ReadTimeoutError when `timeout` ms pass first
   */
  read(length: number, timeout?: number): Promise<Buffer>;

  /**
   * Read up to and including the first `byte`
   */
  readUntil(byte: number, timeout?: number): Promise<Buffer>;

  /**
   * Release the port. Safe to call more than once.
   */
  close(): Promise<void>;
}

export interface SerialTransport {
  open(port: PortDescriptor, config: ConnectionConfig): Promise<Connection>;
}

export interface RequestOptions {
  until: number;
  timeout?: number;
}

/**
 * Send a payload and wait for the reply terminated by `until`
 */
export async function request(
  connection: Connection,
  payload: Uint8Array | string,
  options: RequestOptions
): Promise<Buffer> {
  await connection.write(payload);
  return connection.readUntil(options.until, options.timeout);
}
