/**
 * Port Resolver Tests
 * Fake enumerator and fake connections, no hardware
 */

import { describe, it, before, after } from "node:test";
import assert from "node:assert";
import { PortResolver, type ConnectionTest } from "../../src/serial/resolver";
import { MockTransport, type MockDevice } from "../../src/serial/mock";
import type { Connection, ConnectionConfig, SerialTransport } from "../../src/serial/transport";
import { MockEnumerator } from "../../src/discovery/mock";
import type { PortDescriptor } from "../../src/discovery/interface";
import {
  ConnectionTestError,
  EnumerationError,
  NoDeviceFoundError,
  PortOpenError,
} from "../../src/errors";
import { getLogLevel, setLogLevel, type LogLevel } from "../../src/utils/log";

const A: PortDescriptor = { path: "/dev/ttyACM0" };
const B: PortDescriptor = { path: "/dev/ttyACM1" };
const C: PortDescriptor = { path: "/dev/ttyUSB0" };

function setup(devices: Record<string, MockDevice> = {}, ports: PortDescriptor[] = []) {
  const transport = new MockTransport(devices);
  const enumerator = new MockEnumerator({ ports });
  const resolver = new PortResolver({ transport, enumerator, probeDelay: 0 });
  return { transport, enumerator, resolver };
}

function acceptOnly(path: string): ConnectionTest {
  return (connection) => connection.port.path === path;
}

async function catchNoDevice(promise: Promise<unknown>): Promise<NoDeviceFoundError> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof NoDeviceFoundError) return err;
    throw err;
  }
  throw new Error("expected NoDeviceFoundError");
}

describe("PortResolver", () => {
  let level: LogLevel;

  before(() => {
    level = getLogLevel();
    setLogLevel("silent");
  });

  after(() => {
    setLogLevel(level);
  });

  describe("resolve()", () => {
    it("returns the first matching port open and stops probing", async () => {
      const { transport, resolver } = setup();

      const connection = await resolver.resolve(acceptOnly(B.path), {}, [A, B, C]);

      assert.strictEqual(connection.port.path, B.path);
      assert.strictEqual(connection.isOpen, true);
      assert.deepStrictEqual(transport.openAttempts, [A.path, B.path]);
      assert.strictEqual(transport.opened[0].isOpen, false);
      assert.deepStrictEqual(
        transport.openConnections().map((c) => c.port.path),
        [B.path]
      );
    });

    it("returns the first match when several ports pass", async () => {
      const { transport, resolver } = setup();

      const connection = await resolver.resolve(() => true, {}, [A, B, C]);

      assert.strictEqual(connection.port.path, A.path);
      assert.deepStrictEqual(transport.openAttempts, [A.path]);
    });

    it("fails with one entry per candidate when nothing matches", async () => {
      const { transport, resolver } = setup();

      const err = await catchNoDevice(resolver.resolve(() => false, {}, [A, B, C]));

      assert.deepStrictEqual(
        err.failures.map((f) => f.port.path),
        [A.path, B.path, C.path]
      );
      for (const failure of err.failures) {
        assert.ok(failure.error instanceof ConnectionTestError);
        assert.strictEqual(failure.error.kind, "rejected");
      }
      assert.strictEqual(transport.openConnections().length, 0);
    });

    it("fails immediately on an empty candidate list without enumerating", async () => {
      const { transport, enumerator, resolver } = setup({}, [A, B]);
      let testCalls = 0;

      const err = await catchNoDevice(
        resolver.resolve(() => {
          testCalls++;
          return true;
        }, {}, [])
      );

      assert.deepStrictEqual(err.failures, []);
      assert.strictEqual(err.message, "No device found among 0 candidate ports");
      assert.strictEqual(enumerator.listPortsCalls, 0);
      assert.strictEqual(transport.openAttempts.length, 0);
      assert.strictEqual(testCalls, 0);
    });

    it("records an open failure and does not run the test", async () => {
      const busy = new Error("Resource busy");
      const { resolver } = setup({ [A.path]: { openError: busy } });
      let testCalls = 0;

      const err = await catchNoDevice(
        resolver.resolve(() => {
          testCalls++;
          return true;
        }, {}, [A])
      );

      assert.strictEqual(err.failures.length, 1);
      const { port, error } = err.failures[0];
      assert.strictEqual(port, A);
      assert.ok(error instanceof PortOpenError);
      assert.strictEqual(error.path, A.path);
      assert.strictEqual(error.cause, busy);
      assert.strictEqual(error.message, "Failed to open /dev/ttyACM0: Resource busy");
      assert.strictEqual(testCalls, 0);
    });

    it("keeps a transport's own PortOpenError as is", async () => {
      const own = new PortOpenError(A.path, new Error("Permission denied"));
      const { resolver } = setup({ [A.path]: { openError: own } });

      const err = await catchNoDevice(resolver.resolve(() => true, {}, [A]));

      assert.strictEqual(err.failures[0].error, own);
      assert.strictEqual(own.message, "Failed to open /dev/ttyACM0: Permission denied");
    });

    it("continues past ports that cannot be opened", async () => {
      const { transport, resolver } = setup({
        [A.path]: { openError: new Error("No such file or directory") },
      });

      const connection = await resolver.resolve(() => true, {}, [A, B]);

      assert.strictEqual(connection.port.path, B.path);
      assert.deepStrictEqual(transport.openAttempts, [A.path, B.path]);
    });

    it("treats a throwing test like a failing one", async () => {
      const { transport, resolver } = setup();

      const connection = await resolver.resolve((conn) => {
        if (conn.port.path === A.path) throw new Error("garbled reply");
        return true;
      }, {}, [A, B]);

      assert.strictEqual(connection.port.path, B.path);
      assert.strictEqual(transport.opened[0].isOpen, false);
    });

    it("records why a throwing test failed", async () => {
      const { resolver } = setup();

      const err = await catchNoDevice(
        resolver.resolve(async () => {
          throw new Error("garbled reply");
        }, {}, [A])
      );

      const { error } = err.failures[0];
      assert.ok(error instanceof ConnectionTestError);
      assert.strictEqual(error.kind, "threw");
      assert.strictEqual(error.message, "Connection test threw on /dev/ttyACM0: garbled reply");
    });

    it("records the reason a test gives for rejecting", async () => {
      const { resolver } = setup();

      const err = await catchNoDevice(
        resolver.resolve(() => ({ ok: false, reason: "serial number 0042 expected" }), {}, [A])
      );

      assert.strictEqual(
        err.failures[0].error.message,
        "Connection test rejected on /dev/ttyACM0: serial number 0042 expected"
      );
    });

    it("enumerates host ports when no candidates are given", async () => {
      const { transport, enumerator, resolver } = setup({}, [A, B, C]);

      const connection = await resolver.resolve(acceptOnly(C.path));

      assert.strictEqual(connection.port.path, C.path);
      assert.strictEqual(enumerator.listPortsCalls, 1);
      assert.deepStrictEqual(transport.openAttempts, [A.path, B.path, C.path]);
    });

    it("propagates enumeration failures", async () => {
      const { resolver, enumerator } = setup();
      enumerator.setState({ failure: new Error("EACCES") });

      await assert.rejects(resolver.resolve(() => true), EnumerationError);
    });

    it("passes the connection config to the transport", async () => {
      const { transport, resolver } = setup();

      await resolver.resolve(() => true, { baudRate: 9600, parity: "odd" }, [A]);

      assert.strictEqual(transport.opened[0].config.baudRate, 9600);
      assert.strictEqual(transport.opened[0].config.parity, "odd");
      assert.strictEqual(transport.opened[0].config.dataBits, 8);
    });

    it("never holds two probe connections at once", async () => {
      const { transport, resolver } = setup();
      const openDuringTest: number[] = [];

      await catchNoDevice(
        resolver.resolve(() => {
          openDuringTest.push(transport.openConnections().length);
          return false;
        }, {}, [A, B, C])
      );

      assert.deepStrictEqual(openDuringTest, [1, 1, 1]);
    });

    it("gives equivalent diagnostics on repeated calls", async () => {
      const { transport, resolver } = setup({ [B.path]: { openError: new Error("Resource busy") } });
      const summarize = (err: NoDeviceFoundError) =>
        err.failures.map((f) => [f.port.path, f.error.code, f.error.message]);

      const first = await catchNoDevice(resolver.resolve(() => false, {}, [A, B, C]));
      const second = await catchNoDevice(resolver.resolve(() => false, {}, [A, B, C]));

      assert.deepStrictEqual(summarize(first), summarize(second));
      assert.deepStrictEqual(summarize(first), [
        [A.path, "CONNECTION_TEST", "Connection test rejected on /dev/ttyACM0"],
        [B.path, "PORT_OPEN", "Failed to open /dev/ttyACM1: Resource busy"],
        [C.path, "CONNECTION_TEST", "Connection test rejected on /dev/ttyUSB0"],
      ]);
      assert.strictEqual(transport.openConnections().length, 0);
    });

    it("keeps probing when closing a rejected port fails", async () => {
      const { resolver } = setup({ [A.path]: { closeError: new Error("EIO") } });

      const connection = await resolver.resolve(acceptOnly(B.path), {}, [A, B]);

      assert.strictEqual(connection.port.path, B.path);
    });
  });

  describe("timeouts", () => {
    it("gives up on a test that does not answer in time", async () => {
      const { transport, resolver } = setup();

      const err = await catchNoDevice(
        resolver.resolve(() => new Promise<boolean>(() => {}), { testTimeout: 20 }, [A])
      );

      const { error } = err.failures[0];
      assert.ok(error instanceof ConnectionTestError);
      assert.strictEqual(error.kind, "timeout");
      assert.strictEqual(error.message, "Connection test timeout on /dev/ttyACM0: no verdict after 20ms");
      assert.strictEqual(transport.opened[0].isOpen, false);
    });

    it("gives up on a slow open and closes the port when it arrives", async () => {
      const { transport, resolver } = setup({ [A.path]: { openDelay: 40 } });

      const err = await catchNoDevice(resolver.resolve(() => true, { openTimeout: 10 }, [A]));

      const { error } = err.failures[0];
      assert.ok(error instanceof PortOpenError);
      assert.strictEqual(error.message, "Failed to open /dev/ttyACM0: open timed out after 10ms");

      // the late connection is already released when resolve() settles
      assert.strictEqual(transport.opened.length, 1);
      assert.strictEqual(transport.openConnections().length, 0);
    });

    it("does not reopen a port while an abandoned open is pending", async () => {
      const inner = new MockTransport({ [A.path]: { openDelay: 40 } });
      let inFlight = 0;
      let maxInFlight = 0;
      const transport: SerialTransport = {
        async open(port: PortDescriptor, config: ConnectionConfig): Promise<Connection> {
          inFlight++;
          maxInFlight = Math.max(maxInFlight, inFlight);
          try {
            return await inner.open(port, config);
          } finally {
            inFlight--;
          }
        },
      };
      const resolver = new PortResolver({
        transport,
        enumerator: new MockEnumerator(),
        probeDelay: 0,
      });

      const err = await catchNoDevice(resolver.resolve(() => true, { openTimeout: 10 }, [A, A]));

      assert.strictEqual(maxInFlight, 1);
      assert.deepStrictEqual(
        err.failures.map((f) => f.error.code),
        ["PORT_OPEN", "PORT_OPEN"]
      );
      assert.strictEqual(inner.opened.length, 2);
      assert.strictEqual(inner.openConnections().length, 0);
    });

    it("releases a late connection before returning a match", async () => {
      const { transport, resolver } = setup({ [A.path]: { openDelay: 40 } });

      const connection = await resolver.resolve(() => true, { openTimeout: 10 }, [A, B]);

      assert.strictEqual(connection.port.path, B.path);
      assert.deepStrictEqual(
        transport.openConnections().map((c) => c.port.path),
        [B.path]
      );
    });

    it("waits between candidates", async () => {
      const transport = new MockTransport();
      const resolver = new PortResolver({
        transport,
        enumerator: new MockEnumerator(),
        probeDelay: 30,
      });

      const started = Date.now();
      await catchNoDevice(resolver.resolve(() => false, {}, [A, B]));

      assert.ok(Date.now() - started >= 25);
    });
  });

  describe("resolveDevice()", () => {
    it("returns the identity reported by the test", async () => {
      const { resolver } = setup({
        [B.path]: { respond: () => "SN:0042\n" },
      });

      const resolution = await resolver.resolveDevice<string>(async (conn) => {
        await conn.write("SN?\n");
        const reply = (await conn.readUntil(0x0a, 50)).toString().trim();
        return reply === "SN:0042" ? { ok: true, identity: reply } : { ok: false };
      }, {}, [A, B]);

      assert.strictEqual(resolution.port, B);
      assert.strictEqual(resolution.identity, "SN:0042");
      assert.strictEqual(resolution.connection.isOpen, true);
    });
  });
});
