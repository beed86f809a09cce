import type { Address } from "./transport.js";

/**
 * network: reachable over IP, served by the SSH backend.
 * bluetooth: a hardware address.
 * name: an advertised device name that discovery has to resolve first.
 */
export type AddressKind = "network" | "bluetooth" | "name";

const IPV4 = /^(25[0-5]|2[0-4]\d|1\d\d|[1-9]?\d)(\.(25[0-5]|2[0-4]\d|1\d\d|[1-9]?\d)){3}$/;
const MAC = /^[0-9a-f]{2}(:[0-9a-f]{2}){5}$/i;
// at least one dot, labels of letters, digits and hyphens
const HOSTNAME = /^(?=.{1,253}$)([a-z0-9]([a-z0-9-]{0,61}[a-z0-9])?)(\.[a-z0-9]([a-z0-9-]{0,61}[a-z0-9])?)+$/i;

export function classifyAddress(raw: Address): AddressKind {
  const address = raw.trim();
  if (IPV4.test(address)) return "network";
  if (MAC.test(address)) return "bluetooth";
  if (HOSTNAME.test(address) && !/^[\d.]+$/.test(address)) return "network";
  return "name";
}

export interface DeviceDiscovery {
  /** Resolve an advertised name to an address, or null when nothing answered in time. */
  find(name: string, timeoutMs: number): Promise<Address | null>;
}
