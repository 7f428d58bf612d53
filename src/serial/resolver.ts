/**
 * Port Resolver
 * Probes candidate ports one at a time and hands back the first
 * connection that passes the caller's test.
 *
 * Usage:
 * ```typescript
 * const resolver = new PortResolver();
 *
 * const connection = await resolver.resolve(async (conn) => {
 *   const reply = await request(conn, "ID?\n", { until: 0x0a, timeout: 500 });
 *   return reply.toString().startsWith("ACME");
 * }, { baudRate: 9600 });
 * ```
 */

import type { PortDescriptor, PortEnumerator } from "../discovery/interface";
import { HostEnumerator } from "../discovery/host";
import type { Connection, ConnectionConfig, SerialTransport } from "./transport";
import { SerialPortTransport } from "./connection";
import {
  ConnectionTestError,
  NoDeviceFoundError,
  PortOpenError,
  toError,
  type ProbeFailure,
} from "../errors";
import { config as envConfig, defaultConnectionConfig } from "../config";
import { createLogger } from "../utils/log";

const log = createLogger("resolver");

/**
 * Result of a connection test.
 * `true` / `{ ok: true }` accepts the port, anything else rejects it.
 */
export type TestOutcome<I = unknown> =
  | boolean
  | { ok: true; identity?: I }
  | { ok: false; reason?: string };

export type ConnectionTest<I = unknown> = (
  connection: Connection
) => TestOutcome<I> | Promise<TestOutcome<I>>;

export interface Resolution<I = unknown> {
  connection: Connection;
  port: PortDescriptor;
  identity?: I;
}

export interface PortResolverOptions {
  enumerator?: PortEnumerator;
  transport?: SerialTransport;
  probeDelay?: number;           // ms between two candidates
}

type Verdict<I> =
  | { ok: true; identity?: I }
  | { ok: false; error: ConnectionTestError };

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class PortResolver {
  private enumerator: PortEnumerator;
  private transport: SerialTransport;
  private probeDelay: number;

  constructor(options: PortResolverOptions = {}) {
    this.enumerator = options.enumerator ?? new HostEnumerator();
    this.transport = options.transport ?? new SerialPortTransport();
    this.probeDelay = options.probeDelay ?? envConfig.PROBE_DELAY;
  }

  /**
   * Find the port the device is attached to and return its open connection
   * @param candidates - Ports to try, in order (enumerated when omitted)
   * @throws NoDeviceFoundError when no candidate passes the test
   * @throws EnumerationError when candidates are omitted and listing fails
   */
  async resolve<I>(
    test: ConnectionTest<I>,
    config: Partial<ConnectionConfig> = {},
    candidates?: readonly PortDescriptor[]
  ): Promise<Connection> {
    const { connection } = await this.resolveDevice(test, config, candidates);
    return connection;
  }

  /**
   * Like resolve(), also returning the matched port and the identity
   * the test reported
   */
  async resolveDevice<I>(
    test: ConnectionTest<I>,
    config: Partial<ConnectionConfig> = {},
    candidates?: readonly PortDescriptor[]
  ): Promise<Resolution<I>> {
    const settings = defaultConnectionConfig(config);
    const ports = candidates ?? (await this.enumerator.listPorts());
    const failures: ProbeFailure[] = [];
    // path -> release of a connection that opened after its timeout
    const lateOpens = new Map<string, Promise<void>>();

    for (const [index, port] of ports.entries()) {
      if (index > 0 && this.probeDelay > 0) {
        await sleep(this.probeDelay);
      }

      log.debug(`Probing ${port.path}`);

      // one connection per path: wait for an abandoned open to be released
      await lateOpens.get(port.path);

      let connection: Connection;
      try {
        connection = await this.open(port, settings, lateOpens);
      } catch (err) {
        const error =
          err instanceof PortOpenError && err.path === port.path
            ? err
            : new PortOpenError(port.path, err);
        log.debug(error.message);
        failures.push({ port, error });
        continue;
      }

      let matched = false;
      try {
        const verdict = await this.runTest(test, connection, settings.testTimeout);
        if (verdict.ok) {
          matched = true;
          await Promise.all(lateOpens.values());
          log.info(`Device found on ${port.path}`);
          return { connection, port, identity: verdict.identity };
        }
        log.debug(verdict.error.message);
        failures.push({ port, error: verdict.error });
      } finally {
        if (!matched) {
          await this.release(connection);
        }
      }
    }

    await Promise.all(lateOpens.values());
    throw new NoDeviceFoundError(failures);
  }

  /**
   * Open one port, giving up after config.openTimeout.
   * A port that opens after the timeout is closed on arrival; that
   * release is recorded in `lateOpens` under the port's path.
   */
  private open(
    port: PortDescriptor,
    config: ConnectionConfig,
    lateOpens: Map<string, Promise<void>>
  ): Promise<Connection> {
    const attempt = this.transport.open(port, config);
    const timeout = config.openTimeout;
    if (timeout === undefined) return attempt;

    return new Promise((resolve, reject) => {
      let settled = false;

      const timer = setTimeout(() => {
        settled = true;
        lateOpens.set(
          port.path,
          attempt.then(
            (late) => this.release(late),
            (err) => log.debug(`Late open of ${port.path} failed: ${toError(err).message}`)
          )
        );
        reject(new Error(`open timed out after ${timeout}ms`));
      }, timeout);

      attempt.then(
        (connection) => {
          if (settled) return;
          settled = true;
          clearTimeout(timer);
          resolve(connection);
        },
        (err) => {
          if (settled) return;
          settled = true;
          clearTimeout(timer);
          reject(err);
        }
      );
    });
  }

  /**
   * Run the caller's test; never throws
   */
  private runTest<I>(
    test: ConnectionTest<I>,
    connection: Connection,
    timeout?: number
  ): Promise<Verdict<I>> {
    const path = connection.port.path;

    const outcome = Promise.resolve()
      .then(() => test(connection))
      .then((result): Verdict<I> => {
        if (result === true) return { ok: true };
        if (result === false) {
          return { ok: false, error: new ConnectionTestError(path, "rejected") };
        }
        if (result.ok) return { ok: true, identity: result.identity };
        return {
          ok: false,
          error: new ConnectionTestError(path, "rejected", result.reason),
        };
      })
      .catch((err: unknown): Verdict<I> => ({
        ok: false,
        error: new ConnectionTestError(path, "threw", toError(err).message, err),
      }));

    if (timeout === undefined) return outcome;

    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        resolve({
          ok: false,
          error: new ConnectionTestError(path, "timeout", `no verdict after ${timeout}ms`),
        });
      }, timeout);

      void outcome.then((verdict) => {
        clearTimeout(timer);
        resolve(verdict);
      });
    });
  }

  private async release(connection: Connection): Promise<void> {
    try {
      await connection.close();
    } catch (err) {
      log.warn(`Failed to close ${connection.port.path}: ${toError(err).message}`);
    }
  }
}
