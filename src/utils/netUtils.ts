import net from "node:net";
import os from "node:os";

export const WILDCARD_ADDRESSES = new Set(["", "0.0.0.0", "::"]);

export const resolveInterfaceAddress = (
  interfaceName?: string,
  family: 4 | 6 = 4,
): string | undefined => {
  if (!interfaceName) return undefined;
  const iface = os.networkInterfaces()[interfaceName];
  if (!iface) return undefined;
  const wanted = family === 6 ? "IPv6" : "IPv4";
  const record = iface.find(
    entry => entry.family === wanted && !entry.internal && entry.address,
  );
  return record?.address;
};

/**
 * Accepts either an address literal or an interface name ("eth0") and returns
 * the address to bind to. Unknown names are returned unchanged so the bind
 * itself reports the failure.
 */
export const resolveLocalAddress = (
  value: string | undefined,
  family: 4 | 6 = 4,
): string | undefined => {
  if (value === undefined || net.isIP(value) !== 0) return value;
  return resolveInterfaceAddress(value, family) ?? value;
};

export const isWildcardAddress = (address?: string): boolean =>
  address === undefined || WILDCARD_ADDRESSES.has(address);

export const isMulticastAddress = (host: string): boolean => {
  const version = net.isIP(host);
  if (version === 4) {
    const first = Number(host.split(".")[0]);
    return first >= 224 && first <= 239;
  }
  if (version === 6) {
    return host.toLowerCase().startsWith("ff");
  }
  return false;
};
