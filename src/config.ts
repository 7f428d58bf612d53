/**
 * Configuration from environment variables
 * Defaults for every probe, overridable per call
 */

import type { ConnectionConfig } from "./serial/transport";

export function getEnvNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (value === undefined) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

export function getEnvString(key: string, defaultValue: string): string {
  return process.env[key] ?? defaultValue;
}

export function getEnvList(key: string, defaultValue: string[]): string[] {
  const value = process.env[key];
  if (value === undefined) return defaultValue;
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

export const config = {
  /**
   * Serial baud rate used when probing
   * @env SERIAL_PROBE_BAUD_RATE
   * @default 115200
   */
  BAUD_RATE: getEnvNumber("SERIAL_PROBE_BAUD_RATE", 115200),

  /**
   * Time allowed for opening one port, in milliseconds
   * @env SERIAL_PROBE_OPEN_TIMEOUT
   * @default 2000
   */
  OPEN_TIMEOUT: getEnvNumber("SERIAL_PROBE_OPEN_TIMEOUT", 2000),

  /**
   * Time allowed for one connection test, in milliseconds
   * @env SERIAL_PROBE_TEST_TIMEOUT
   * @default 5000
   */
  TEST_TIMEOUT: getEnvNumber("SERIAL_PROBE_TEST_TIMEOUT", 5000),

  /**
   * Pause between two candidates, in milliseconds
   * @env SERIAL_PROBE_PROBE_DELAY
   * @default 100
   */
  PROBE_DELAY: getEnvNumber("SERIAL_PROBE_PROBE_DELAY", 100),

  /**
   * Port paths never reported by the host enumerator (comma separated)
   * @env SERIAL_PROBE_IGNORE_PORTS
   * @default "/dev/ttyAMA0" (on-board UART)
   */
  IGNORE_PORTS: getEnvList("SERIAL_PROBE_IGNORE_PORTS", ["/dev/ttyAMA0"]),

  /**
   * Log level: debug, info, warn, error, silent
   * @env SERIAL_PROBE_LOG_LEVEL
   * @default "info"
   */
  LOG_LEVEL: getEnvString("SERIAL_PROBE_LOG_LEVEL", "info"),
};

/**
 * Build a connection config from the environment defaults
 */
export function defaultConnectionConfig(
  overrides: Partial<ConnectionConfig> = {}
): ConnectionConfig {
  return {
    baudRate: config.BAUD_RATE,
    dataBits: 8,
    stopBits: 1,
    parity: "none",
    rtscts: false,
    openTimeout: config.OPEN_TIMEOUT,
    testTimeout: config.TEST_TIMEOUT,
    ...overrides,
  };
}
