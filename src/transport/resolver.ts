import dgram from "node:dgram";
import { promises as dns } from "node:dns";
import net from "node:net";
import type { Logger } from "pino";
import { DEFAULT_CONNECT_TIMEOUT_MS, DEFAULT_MULTICAST_TTL } from "../constants";
import { isLogTarget, type Destination } from "../destination";
import { CotWireError } from "../errors";
import { wrapTls } from "../tls/client";
import type { TlsIdentity } from "../tls/identity";
import { isWildcardAddress, resolveLocalAddress } from "../utils/netUtils";
import type { ChannelPair, ChannelReader, ChannelWriter } from "./channel";
import { DatagramChannel, bindDatagram, connectDatagram } from "./datagram-channel";
import { LogWriter, type LogStreams } from "./log-channel";
import { StreamChannel, connectTcp } from "./stream-channel";

export type HostLookup = (
  hostname: string,
  options: { family?: 4 | 6 },
) => Promise<{ address: string; family: number }>;

export interface TransportOptions {
  log?: Logger;
  multicastTtl?: number;
  /** Local bind address or interface name; also the multicast interface. */
  localAddress?: string;
  family?: 4 | 6;
  connectTimeoutMs?: number;
  lookup?: HostLookup;
  /** Replacement stdout/stderr for `log:` destinations. */
  streams?: LogStreams;
  /** Required for `tls` destinations. */
  tls?: TlsIdentity;
}

const defaultLookup: HostLookup = (hostname, options) =>
  dns.lookup(hostname, options.family === undefined ? {} : { family: options.family });

class ResolvedChannel implements ChannelPair {
  private closing?: Promise<void>;

  constructor(
    readonly destination: Destination,
    private readonly release: () => Promise<void> | void,
    readonly reader?: ChannelReader,
    readonly writer?: ChannelWriter,
  ) {}

  close(): Promise<void> {
    this.closing ??= Promise.resolve().then(() => this.release());
    return this.closing;
  }
}

async function lookupHost(
  destination: Destination,
  options: TransportOptions,
): Promise<{ address: string; family: 4 | 6 }> {
  const literal = net.isIP(destination.host);
  if (literal !== 0) {
    return { address: destination.host, family: literal === 6 ? 6 : 4 };
  }
  try {
    const lookup = options.lookup ?? defaultLookup;
    const result = await lookup(destination.host, { family: options.family });
    return { address: result.address, family: result.family === 6 ? 6 : 4 };
  } catch (err) {
    throw new CotWireError(
      "E_ADDRESS",
      `Cannot resolve host "${destination.host}" for ${destination.raw}`,
      { cause: err },
    );
  }
}

/** Closes the socket when a setup step fails so the handle is not leaked. */
async function closeOnFailure(socket: dgram.Socket, step: Promise<void>): Promise<void> {
  try {
    await step;
  } catch (err) {
    socket.close();
    throw err;
  }
}

/**
 * Resolves the configured local address or interface name. A value that is
 * neither an address nor a known interface cannot be bound.
 */
function localAddressFor(options: TransportOptions, family: 4 | 6): string | undefined {
  const local = resolveLocalAddress(options.localAddress, family);
  if (isWildcardAddress(local)) return undefined;
  if (local === undefined || net.isIP(local) === 0) {
    throw new CotWireError(
      "E_BIND",
      `Local address "${options.localAddress ?? ""}" is not an IPv${family} address or a known interface`,
    );
  }
  return local;
}

async function openStream(
  destination: Destination,
  port: number,
  options: TransportOptions,
): Promise<ChannelPair> {
  if (destination.scheme === "tls" && !options.tls) {
    throw new CotWireError(
      "E_CERTIFICATE",
      `${destination.raw} needs a client certificate (PYTAK_TLS_CLIENT_CERT)`,
    );
  }
  const { address, family } = await lookupHost(destination, options);
  const tcp = await connectTcp({
    host: address,
    port,
    family,
    localAddress: localAddressFor(options, family),
    timeoutMs: options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS,
  });
  options.log?.debug({ destination: destination.raw, address }, "TCP connected");

  const socket = options.tls
    ? await wrapTls(tcp, options.tls, {
        host: destination.host,
        log: options.log,
        handshakeTimeoutMs: options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS,
      })
    : tcp;
  const channel = new StreamChannel(socket);
  return new ResolvedChannel(destination, () => channel.close(), channel, channel);
}

async function openDatagram(
  destination: Destination,
  port: number,
  options: TransportOptions,
): Promise<ChannelPair> {
  const { address, family } = await lookupHost(destination, options);
  const type = family === 6 ? "udp6" : "udp4";
  const wildcard = family === 6 ? "::" : "0.0.0.0";
  const target = { address, port };
  const local = localAddressFor(options, family);
  const ttl = options.multicastTtl ?? DEFAULT_MULTICAST_TTL;

  let socket: dgram.Socket;
  let channel: DatagramChannel;

  if (destination.multicast) {
    socket = dgram.createSocket({ type, reuseAddr: true });
    await closeOnFailure(
      socket,
      bindDatagram(socket, destination.writeOnly ? { port: 0 } : { address: wildcard, port }),
    );
    try {
      socket.setMulticastTTL(ttl);
      if (local !== undefined) socket.setMulticastInterface(local);
      if (!destination.writeOnly) socket.addMembership(address, local);
    } catch (err) {
      socket.close();
      throw new CotWireError(
        "E_BIND",
        `Cannot configure multicast for ${destination.raw}: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err },
      );
    }
    channel = new DatagramChannel(socket, { target, readable: !destination.writeOnly });
  } else if (destination.broadcast) {
    socket = dgram.createSocket({ type, reuseAddr: true });
    await closeOnFailure(
      socket,
      bindDatagram(socket, destination.writeOnly ? { port: 0 } : { address: wildcard, port }),
    );
    socket.setBroadcast(true);
    channel = new DatagramChannel(socket, { target, readable: !destination.writeOnly });
  } else {
    socket = dgram.createSocket({ type });
    if (!destination.writeOnly) {
      await closeOnFailure(
        socket,
        bindDatagram(socket, { address: local, port: 0 }),
      );
    }
    await closeOnFailure(socket, connectDatagram(socket, target));
    channel = new DatagramChannel(socket, { readable: !destination.writeOnly });
  }

  options.log?.debug(
    {
      destination: destination.raw,
      address,
      multicast: destination.multicast,
      broadcast: destination.broadcast,
      writeOnly: destination.writeOnly,
    },
    "UDP socket ready",
  );
  return new ResolvedChannel(
    destination,
    () => channel.close(),
    destination.writeOnly ? undefined : channel,
    channel,
  );
}

/**
 * Opens the connection a destination describes. Fails with E_ADDRESS when
 * the peer cannot be resolved or reached and E_BIND when a local socket
 * cannot be bound; TLS destinations can also fail with E_CERTIFICATE or
 * E_HANDSHAKE.
 */
export async function resolveTransport(
  destination: Destination,
  options: TransportOptions = {},
): Promise<ChannelPair> {
  if (destination.scheme === "log") {
    if (!isLogTarget(destination.host)) {
      throw new CotWireError("E_ADDRESS", `Unknown log target "${destination.host}"`);
    }
    const writer = new LogWriter(destination.host, options.streams);
    return new ResolvedChannel(destination, () => writer.close(), undefined, writer);
  }

  const port = destination.port;
  if (port === undefined) {
    throw new CotWireError("E_ADDRESS", `Missing port in ${destination.raw}`);
  }

  switch (destination.scheme) {
    case "tcp":
    case "tls":
      return openStream(destination, port, options);
    case "udp":
      return openDatagram(destination, port, options);
    default:
      throw new CotWireError(
        "E_UNSUPPORTED_SCHEME",
        `Unsupported scheme in ${destination.raw}`,
      );
  }
}
