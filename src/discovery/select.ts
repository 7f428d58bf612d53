/**
 * Port selection helpers
 * Narrow or reorder an enumerated port list before probing
 */

import type { PortDescriptor, PortEnumerator } from "./interface";
import { vidPidOf } from "./interface";
import type { ConnectionConfig, SerialTransport } from "../serial/transport";
import { toError } from "../errors";
import { createLogger } from "../utils/log";

const log = createLogger("discovery");

const VID_PID = /^[0-9a-f]+:[0-9a-f]+$/i;

export interface SelectOptions {
  /** One or more "<vid>:<pid>" pairs, e.g. "2341:0010" */
  vidPid?: string | readonly string[];
  /** Keep non-matching ports too, after the matching ones */
  includeAll?: boolean;
}

export interface AvailabilityOptions {
  onlyAvailable?: boolean;
}

export type CheckedPort = PortDescriptor & { readonly available: boolean };

export interface FindOptions extends SelectOptions {
  /** Open and close each port to see whether it can be acquired */
  checkAvailable?: {
    transport: SerialTransport;
    config: ConnectionConfig;
    onlyAvailable?: boolean;
  };
}

function normalizeVidPid(vidPid: string | readonly string[]): Set<string> {
  const list = typeof vidPid === "string" ? [vidPid] : vidPid;
  const result = new Set<string>();
  for (const entry of list) {
    if (!VID_PID.test(entry)) {
      throw new TypeError(`Invalid vendor/product ID "${entry}", expected "<vid>:<pid>"`);
    }
    result.add(entry.toLowerCase());
  }
  return result;
}

/**
 * Filter ports by USB vendor/product ID, or move matching ports first
 * when `includeAll` is set. Order within each group is kept.
 */
export function selectPorts(
  ports: readonly PortDescriptor[],
  options: SelectOptions = {}
): PortDescriptor[] {
  if (options.vidPid === undefined) return [...ports];

  const wanted = normalizeVidPid(options.vidPid);
  const isMatch = (port: PortDescriptor): boolean => {
    const key = vidPidOf(port);
    return key !== undefined && wanted.has(key);
  };

  const matching = ports.filter(isMatch);
  if (!options.includeAll) return matching;

  return [...matching, ...ports.filter((port) => !isMatch(port))];
}

/**
 * Try to open each port in turn and close it again.
 * A port held by another process reports available: false.
 */
export async function checkAvailability(
  ports: readonly PortDescriptor[],
  transport: SerialTransport,
  config: ConnectionConfig,
  options: AvailabilityOptions = {}
): Promise<CheckedPort[]> {
  const checked: CheckedPort[] = [];

  for (const port of ports) {
    let available = false;
    try {
      const connection = await transport.open(port, config);
      available = true;
      await connection.close();
    } catch (err) {
      log.debug(`${port.path} ${available ? "did not close" : "is unavailable"}: ${toError(err).message}`);
    }
    checked.push({ ...port, available });
  }

  return options.onlyAvailable ? checked.filter((p) => p.available) : checked;
}

/**
 * Enumerate, select by vendor/product ID, then optionally check availability.
 * Availability is checked only when `checkAvailable` is given, and only
 * then do the returned ports carry `available`.
 */
export async function findPorts(
  enumerator: PortEnumerator,
  options: FindOptions = {}
): Promise<Array<PortDescriptor & { readonly available?: boolean }>> {
  const selected = selectPorts(await enumerator.listPorts(), options);
  const check = options.checkAvailable;
  if (!check) return selected;

  return checkAvailability(selected, check.transport, check.config, {
    onlyAvailable: check.onlyAvailable,
  });
}
