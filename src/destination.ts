import { DEFAULT_BROADCAST_PORT, DEFAULT_COT_PORT } from "./constants";
import { CotWireError } from "./errors";
import { isMulticastAddress } from "./utils/netUtils";

export type CotScheme = "tcp" | "tls" | "udp" | "log";
export type LogTarget = "stdout" | "stderr";

export interface Destination {
  readonly raw: string;
  readonly scheme: CotScheme;
  readonly host: string;
  /** Absent for the `log` scheme. */
  readonly port?: number;
  readonly broadcast: boolean;
  readonly writeOnly: boolean;
  readonly multicast: boolean;
}

const BASE_SCHEMES = new Map<string, CotScheme>([
  ["tcp", "tcp"],
  ["tls", "tls"],
  ["ssl", "tls"],
  ["udp", "udp"],
  ["log", "log"],
]);

const UDP_MODIFIERS = new Set(["broadcast", "wo", "multicast"]);

const splitScheme = (url: string): { scheme: string; rest: string } => {
  const index = url.indexOf(":");
  if (index <= 0) {
    throw new CotWireError(
      "E_UNSUPPORTED_SCHEME",
      `Destination "${url}" has no scheme; expected e.g. tcp://host:8087`,
    );
  }
  const rest = url.slice(index + 1);
  return {
    scheme: url.slice(0, index).toLowerCase(),
    rest: rest.startsWith("//") ? rest.slice(2) : rest,
  };
};

const splitHostPort = (
  authority: string,
  url: string,
): { host: string; port?: string } => {
  const trimmed = authority.replace(/\/+$/, "");
  if (trimmed.startsWith("[")) {
    const close = trimmed.indexOf("]");
    if (close < 0) {
      throw new CotWireError("E_ADDRESS", `Unterminated IPv6 host in "${url}"`);
    }
    const host = trimmed.slice(1, close);
    const tail = trimmed.slice(close + 1);
    if (tail === "") return { host };
    if (!tail.startsWith(":")) {
      throw new CotWireError("E_ADDRESS", `Malformed destination "${url}"`);
    }
    return { host, port: tail.slice(1) };
  }
  const parts = trimmed.split(":");
  if (parts.length > 2) {
    throw new CotWireError(
      "E_ADDRESS",
      `Malformed destination "${url}"; IPv6 hosts must be bracketed`,
    );
  }
  return { host: parts[0] ?? "", port: parts[1] };
};

const parsePort = (value: string, url: string): number => {
  const port = /^\d+$/.test(value) ? Number(value) : Number.NaN;
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new CotWireError("E_ADDRESS", `Invalid port "${value}" in "${url}"`);
  }
  return port;
};

/**
 * Parses `scheme://host:port` or `scheme:host:port` into an immutable
 * destination. Recognized schemes are tcp, tls (alias ssl), udp with the
 * `+broadcast`, `+wo` and `+multicast` modifiers, and `log:stdout|stderr`.
 */
export function parseDestination(url: string): Destination {
  const raw = url.trim();
  const { scheme: schemeText, rest } = splitScheme(raw);
  const [baseName = "", ...modifiers] = schemeText.split("+");
  const scheme = BASE_SCHEMES.get(baseName);
  if (!scheme) {
    throw new CotWireError(
      "E_UNSUPPORTED_SCHEME",
      `Unsupported scheme "${schemeText}" in "${raw}"`,
    );
  }
  for (const modifier of modifiers) {
    if (scheme !== "udp" || !UDP_MODIFIERS.has(modifier)) {
      throw new CotWireError(
        "E_UNSUPPORTED_SCHEME",
        `Unsupported scheme modifier "+${modifier}" in "${raw}"`,
      );
    }
  }

  const { host, port: portText } = splitHostPort(rest, raw);

  if (scheme === "log") {
    const target = host.toLowerCase();
    if (target !== "stdout" && target !== "stderr") {
      throw new CotWireError(
        "E_ADDRESS",
        `log destinations must be stdout or stderr, got "${host}"`,
      );
    }
    return Object.freeze({
      raw,
      scheme,
      host: target,
      broadcast: false,
      writeOnly: true,
      multicast: false,
    });
  }

  if (!host) {
    throw new CotWireError("E_ADDRESS", `Missing host in "${raw}"`);
  }

  const broadcast = modifiers.includes("broadcast");
  const multicast = modifiers.includes("multicast") || isMulticastAddress(host);
  const defaultPort =
    broadcast || multicast ? DEFAULT_BROADCAST_PORT : DEFAULT_COT_PORT;

  return Object.freeze({
    raw,
    scheme,
    host,
    port: portText === undefined ? defaultPort : parsePort(portText, raw),
    broadcast,
    writeOnly: modifiers.includes("wo"),
    multicast,
  });
}

export const isLogTarget = (value: string): value is LogTarget =>
  value === "stdout" || value === "stderr";

/** Converts a TAK `host:port:proto` connect string into a destination URL. */
export function connectStringToUrl(connectString: string): string {
  const parts = connectString.trim().split(":");
  if (parts.length !== 3 || parts.some(part => part === "")) {
    throw new CotWireError(
      "E_ADDRESS",
      `Invalid connect string "${connectString}"; expected host:port:proto`,
    );
  }
  const [host, port, proto] = parts;
  return `${proto}://${host}:${port}`;
}
