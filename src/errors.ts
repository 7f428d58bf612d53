/**
 * Error taxonomy
 * Per-port errors are collected by the resolver; only enumeration
 * failures and NoDeviceFoundError reach the caller of resolve().
 */

import type { PortDescriptor } from "./discovery/interface";

export type SerialProbeErrorCode =
  | "ENUMERATION"
  | "PORT_OPEN"
  | "CONNECTION_TEST"
  | "NO_DEVICE_FOUND"
  | "READ_TIMEOUT"
  | "CONNECTION_CLOSED";

export class SerialProbeError extends Error {
  readonly code: SerialProbeErrorCode;

  constructor(code: SerialProbeErrorCode, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "SerialProbeError";
    this.code = code;
  }
}

/**
 * Convert anything thrown into an Error
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

/**
 * Host could not list its serial ports
 */
export class EnumerationError extends SerialProbeError {
  constructor(cause: unknown) {
    super("ENUMERATION", `Failed to list serial ports: ${toError(cause).message}`, cause);
    this.name = "EnumerationError";
  }
}

/**
 * One candidate port could not be opened (busy, denied, gone, timed out)
 */
export class PortOpenError extends SerialProbeError {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super("PORT_OPEN", `Failed to open ${path}: ${toError(cause).message}`, cause);
    this.name = "PortOpenError";
    this.path = path;
  }
}

export type ConnectionTestFailureKind = "rejected" | "threw" | "timeout";

/**
 * The connection test did not accept an opened port
 */
export class ConnectionTestError extends SerialProbeError {
  readonly path: string;
  readonly kind: ConnectionTestFailureKind;

  constructor(
    path: string,
    kind: ConnectionTestFailureKind,
    detail?: string,
    cause?: unknown
  ) {
    const suffix = detail ? `: ${detail}` : "";
    super("CONNECTION_TEST", `Connection test ${kind} on ${path}${suffix}`, cause);
    this.name = "ConnectionTestError";
    this.path = path;
    this.kind = kind;
  }
}

export interface ProbeFailure {
  port: PortDescriptor;
  error: PortOpenError | ConnectionTestError;
}

/**
 * Every candidate was tried and none passed the test
 */
export class NoDeviceFoundError extends SerialProbeError {
  readonly failures: readonly ProbeFailure[];

  constructor(failures: readonly ProbeFailure[]) {
    const count = failures.length;
    super(
      "NO_DEVICE_FOUND",
      `No device found among ${count} candidate port${count === 1 ? "" : "s"}`
    );
    this.name = "NoDeviceFoundError";
    this.failures = failures;
  }
}

export class ReadTimeoutError extends SerialProbeError {
  constructor(path: string, timeout: number) {
    super("READ_TIMEOUT", `Read from ${path} timed out after ${timeout}ms`);
    this.name = "ReadTimeoutError";
  }
}

export class ConnectionClosedError extends SerialProbeError {
  constructor(path: string) {
    super("CONNECTION_CLOSED", `Connection to ${path} is closed`);
    this.name = "ConnectionClosedError";
  }
}
