import { readFile } from "node:fs/promises";
import type { Logger } from "pino";
import {
  negotiateProtocolVersion,
  takProtocolVariant,
  type BinaryCodec,
  type CodecOptions,
  type InboundItem,
  type OutboundItem,
} from "./codecs";
import type { CotWireConfig } from "./config";
import { parseDestination, type Destination } from "./destination";
import { CotWireError } from "./errors";
import { Pacer, pacingFromConfig } from "./qos";
import { BoundedQueue, type EventQueue } from "./queue";
import { enrollCertificate, type EnrollmentOptions, type EnrollmentResult } from "./tls/enroll";
import { loadTlsIdentity, type TlsIdentity, type TlsIdentitySource } from "./tls/identity";
import type { PassphraseProvider } from "./tls/passphrase";
import type { ChannelPair } from "./transport/channel";
import type { LogStreams } from "./transport/log-channel";
import {
  resolveTransport,
  type HostLookup,
  type TransportOptions,
} from "./transport/resolver";
import { RxWorker, TxWorker } from "./worker";

/** Collaborators that do not come from configuration. */
export interface PipelineDeps {
  log: Logger;
  passphraseProvider?: PassphraseProvider;
  lookup?: HostLookup;
  streams?: LogStreams;
  /** Protocol-1 payload codec; without one the pipeline speaks XML. */
  codec?: BinaryCodec;
  /** Random source for DoS-avoidance pacing. */
  random?: () => number;
  /** Certificate enrollment; `enrollCertificate` by default. */
  enroll?: (options: EnrollmentOptions) => Promise<EnrollmentResult>;
}

export function tlsIdentitySourceFromConfig(
  config: CotWireConfig,
): TlsIdentitySource | undefined {
  if (!config.PYTAK_TLS_CLIENT_CERT) return undefined;
  return {
    certPath: config.PYTAK_TLS_CLIENT_CERT,
    keyPath: config.PYTAK_TLS_CLIENT_KEY,
    caPath: config.PYTAK_TLS_CLIENT_CAFILE,
    keyPassword: config.PYTAK_TLS_CLIENT_PASSWORD,
    p12Password: config.PYTAK_TLS_CLIENT_P12_PASSWORD,
    expectedHostname: config.PYTAK_TLS_SERVER_EXPECTED_HOSTNAME,
    ciphers: config.PYTAK_TLS_CLIENT_CIPHERS,
    dontVerify: config.PYTAK_TLS_DONT_VERIFY,
    dontCheckHostname: config.PYTAK_TLS_DONT_CHECK_HOSTNAME,
  };
}

export function transportOptionsFromConfig(
  config: CotWireConfig,
  deps: PipelineDeps,
  tls?: TlsIdentity,
): TransportOptions {
  return {
    log: deps.log.child({ component: "transport" }),
    multicastTtl: config.PYTAK_MULTICAST_TTL,
    localAddress: config.PYTAK_MULTICAST_LOCAL_ADDR,
    family: config.PYTAK_IP_FAMILY,
    connectTimeoutMs: config.PYTAK_CONNECT_TIMEOUT_MS,
    lookup: deps.lookup,
    streams: deps.streams,
    tls,
  };
}

/**
 * Enrolls with the destination's certificate API when enrollment credentials
 * are configured, and points the identity at the issued bundle.
 */
export async function enrollIdentitySource(
  config: CotWireConfig,
  destination: Destination,
  deps: Pick<PipelineDeps, "log" | "enroll">,
): Promise<TlsIdentitySource | undefined> {
  const username = config.PYTAK_TLS_CERT_ENROLLMENT_USERNAME;
  const password = config.PYTAK_TLS_CERT_ENROLLMENT_PASSWORD;
  if (!username || !password) return undefined;

  let ca: string | undefined;
  if (config.PYTAK_TLS_CLIENT_CAFILE) {
    try {
      ca = await readFile(config.PYTAK_TLS_CLIENT_CAFILE, "utf8");
    } catch (err) {
      throw new CotWireError(
        "E_CERTIFICATE",
        `Cannot read CA file ${config.PYTAK_TLS_CLIENT_CAFILE}`,
        { cause: err },
      );
    }
  }
  const enroll = deps.enroll ?? enrollCertificate;
  const enrolled = await enroll({
    host: destination.host,
    port: config.PYTAK_TLS_CERT_ENROLLMENT_PORT,
    username,
    password,
    passphrase: config.PYTAK_TLS_CERT_ENROLLMENT_PASSPHRASE,
    ca,
    dontVerify: config.PYTAK_TLS_DONT_VERIFY,
    log: deps.log,
  });
  return {
    certPath: enrolled.p12Path,
    caPath: config.PYTAK_TLS_CLIENT_CAFILE,
    p12Password: enrolled.passphrase,
    expectedHostname: config.PYTAK_TLS_SERVER_EXPECTED_HOSTNAME,
    ciphers: config.PYTAK_TLS_CLIENT_CIPHERS,
    dontVerify: config.PYTAK_TLS_DONT_VERIFY,
    dontCheckHostname: config.PYTAK_TLS_DONT_CHECK_HOSTNAME,
  };
}

/**
 * Parses `COT_URL`, enrolls or loads the TLS identity when needed, and
 * connects.
 */
export async function createChannelPair(
  config: CotWireConfig,
  deps: PipelineDeps,
): Promise<ChannelPair> {
  const destination = parseDestination(config.COT_URL);
  let tls: TlsIdentity | undefined;
  if (destination.scheme === "tls") {
    const source =
      (await enrollIdentitySource(config, destination, deps)) ??
      tlsIdentitySourceFromConfig(config);
    if (!source) {
      throw new CotWireError(
        "E_CERTIFICATE",
        `${destination.raw} needs PYTAK_TLS_CLIENT_CERT to be set`,
      );
    }
    tls = await loadTlsIdentity(source, {
      passphraseProvider: deps.passphraseProvider,
      log: deps.log.child({ component: "tls" }),
    });
  }
  deps.log.info({ destination: destination.raw }, "Connecting");
  return resolveTransport(destination, transportOptionsFromConfig(config, deps, tls));
}

export function codecOptionsFromConfig(
  config: CotWireConfig,
  destination: Destination,
  deps: Pick<PipelineDeps, "codec" | "log">,
): CodecOptions {
  return {
    protocolVersion: negotiateProtocolVersion(config.TAK_PROTO, deps.codec, deps.log),
    variant: takProtocolVariant(destination),
    codec: deps.codec,
  };
}

export function createQueues(
  config: CotWireConfig,
  log: Logger,
): { txQueue: BoundedQueue<OutboundItem>; rxQueue: BoundedQueue<InboundItem> } {
  return {
    txQueue: new BoundedQueue<OutboundItem>({
      capacity: config.MAX_OUT_QUEUE,
      name: "tx",
      log,
    }),
    rxQueue: new BoundedQueue<InboundItem>({
      capacity: config.MAX_IN_QUEUE,
      name: "rx",
      log,
    }),
  };
}

export function createTxWorker(
  config: CotWireConfig,
  channel: ChannelPair,
  queue: EventQueue<OutboundItem>,
  codec: CodecOptions,
  deps: Pick<PipelineDeps, "log" | "random">,
): TxWorker {
  if (!channel.writer) {
    throw new CotWireError(
      "E_CHANNEL_IO",
      `${channel.destination.raw} has no writable channel`,
    );
  }
  return new TxWorker({
    queue,
    writer: channel.writer,
    codec,
    pacer: new Pacer(pacingFromConfig(config), deps.random),
    getTimeoutMs: config.QUEUE_GET_TIMEOUT_MS,
    log: deps.log,
  });
}

/** Undefined for write-only channels. */
export function createRxWorker(
  config: CotWireConfig,
  channel: ChannelPair,
  queue: EventQueue<InboundItem>,
  codec: CodecOptions,
  deps: Pick<PipelineDeps, "log">,
): RxWorker | undefined {
  if (!channel.reader) return undefined;
  return new RxWorker({
    queue,
    reader: channel.reader,
    codec,
    pacer: new Pacer({ mode: "yield", minYieldMs: config.PYTAK_MIN_YIELD_MS }),
    maxFrameLength: config.MAX_FRAME_LENGTH,
    log: deps.log,
  });
}
