/**
 * Host Port Enumeration
 * Lists ports through the serialport package (udev, IOKit or SetupAPI
 * depending on the platform)
 */

import { SerialPort } from "serialport";
import type { PortDescriptor, PortEnumerator } from "./interface";
import { comparePorts } from "./interface";
import { EnumerationError } from "../errors";
import { config } from "../config";
import { createLogger } from "../utils/log";

const log = createLogger("discovery");

/**
 * Raw port record as returned by SerialPort.list()
 */
export type HostPortInfo = Awaited<ReturnType<typeof SerialPort.list>>[number];

/**
 * Function to list host ports (injectable for testing)
 */
export type ListHostPortsFn = () => Promise<HostPortInfo[]>;

export interface HostEnumeratorOptions {
  listFn?: ListHostPortsFn;
  ignorePorts?: string[];
}

// FTDIBUS\VID_0403+PID_6001+A60081GEA\0000
const WINDOWS_HWID = /vid_([0-9a-f]+)\+pid_([0-9a-f]+)/i;
// USB VID:PID=16C0:0483 SNR=2145930
const GENERIC_HWID = /vid:pid=([0-9a-f]+):([0-9a-f]+)/i;

/**
 * Extract USB vendor/product IDs from a hardware ID string
 */
export function parseHardwareId(
  hwid: string
): { vendorId: string; productId: string } | undefined {
  const match = WINDOWS_HWID.exec(hwid) ?? GENERIC_HWID.exec(hwid);
  if (!match) return undefined;
  return {
    vendorId: match[1].toLowerCase(),
    productId: match[2].toLowerCase(),
  };
}

export function toPortDescriptor(info: HostPortInfo): PortDescriptor {
  let vendorId = info.vendorId?.toLowerCase();
  let productId = info.productId?.toLowerCase();

  if ((!vendorId || !productId) && info.pnpId) {
    const parsed = parseHardwareId(info.pnpId);
    if (parsed) {
      vendorId = vendorId ?? parsed.vendorId;
      productId = productId ?? parsed.productId;
    }
  }

  return Object.freeze({
    path: info.path,
    vendorId,
    productId,
    serialNumber: info.serialNumber,
    manufacturer: info.manufacturer,
    pnpId: info.pnpId,
    locationId: info.locationId,
  });
}

export class HostEnumerator implements PortEnumerator {
  private listFn: ListHostPortsFn;
  private ignorePorts: Set<string>;

  constructor(options: HostEnumeratorOptions = {}) {
    this.listFn = options.listFn ?? (() => SerialPort.list());
    this.ignorePorts = new Set(options.ignorePorts ?? config.IGNORE_PORTS);
  }

  async listPorts(): Promise<PortDescriptor[]> {
    let raw: HostPortInfo[];
    try {
      raw = await this.listFn();
    } catch (err) {
      throw new EnumerationError(err);
    }

    const ports = raw
      .filter((p) => !this.ignorePorts.has(p.path))
      .map(toPortDescriptor)
      .sort(comparePorts);

    log.debug(`Found ${ports.length} port(s): ${ports.map((p) => p.path).join(", ")}`);
    return ports;
  }
}
