export { CotRuntime, DEFAULT_DESTINATION } from "./runtime";
export type {
  CotRuntimeOptions,
  DestinationConfig,
  DestinationPipeline,
  RuntimeTask,
} from "./runtime";
export {
  createChannelPair,
  createQueues,
  createRxWorker,
  createTxWorker,
  codecOptionsFromConfig,
  enrollIdentitySource,
  tlsIdentitySourceFromConfig,
  transportOptionsFromConfig,
} from "./factory";
export type { PipelineDeps } from "./factory";
export { Worker, TxWorker, RxWorker } from "./worker";
export type { WorkerState, TxWorkerOptions, RxWorkerOptions } from "./worker";

export { parseDestination, connectStringToUrl, isLogTarget } from "./destination";
export type { Destination, CotScheme, LogTarget } from "./destination";
export { resolveTransport } from "./transport/resolver";
export type { HostLookup, TransportOptions } from "./transport/resolver";
export { PullReader } from "./transport/channel";
export type {
  ChannelKind,
  ChannelPair,
  ChannelReader,
  ChannelWriter,
} from "./transport/channel";
export { StreamChannel, connectTcp } from "./transport/stream-channel";
export { DatagramChannel } from "./transport/datagram-channel";
export { LogWriter } from "./transport/log-channel";
export type { LogStreams } from "./transport/log-channel";

export { loadTlsIdentity, isEncryptedPem } from "./tls/identity";
export type { TlsIdentity, TlsIdentitySource } from "./tls/identity";
export { buildSecureContextOptions, wrapTls } from "./tls/client";
export { decodePkcs12, loadForge } from "./tls/pkcs12";
export {
  configPassphraseProvider,
  promptPassphraseProvider,
  chainPassphraseProviders,
} from "./tls/passphrase";
export type { PassphraseProvider, PassphraseRequest } from "./tls/passphrase";
export {
  CertificateEnrollment,
  enrollCertificate,
  normalizeCertificatePem,
  parseEnrollmentConfig,
} from "./tls/enroll";
export type { EnrollmentOptions, EnrollmentResult } from "./tls/enroll";

export {
  importPreferencePackage,
  mergePreferences,
  loadConfigWithPreferences,
  destinationsFromSections,
} from "./preferences";
export type { LoadedConfig, PreferencePackage } from "./preferences";
export { DataPackage, MANIFEST_ENTRY } from "./datapackage";
export type {
  AddDirectoryOptions,
  AddFileOptions,
  CreatePackageOptions,
  DataPackageContent,
  DataPackageOptions,
} from "./datapackage";

export {
  PING_TYPE,
  cotTime,
  timestampTriad,
  xmlElement,
  createCotEvent,
  helloEvent,
  pongEvent,
  deleteEvent,
} from "./events";
export type { CreateCotEventOptions, DeleteEventOptions } from "./events";
export { cotEventSchema, cotPointSchema } from "./schema/cot";
export type { CotEvent, CotPoint, CotXmlElement } from "./schema/cot";

export { CotFramer, TAK_MAGIC, wrapTakPayload, unwrapTakPayload } from "./framing";
export type { TakProtocolVariant } from "./framing";
export {
  encodeEvent,
  encodeOutbound,
  decodeFrame,
  eventToXml,
  xmlToEvent,
  parseXmlElements,
  takProtocolVariant,
  negotiateProtocolVersion,
  reviveQueueItem,
} from "./codecs";
export type {
  BinaryCodec,
  CodecOptions,
  InboundItem,
  OutboundItem,
  ProtocolVersion,
} from "./codecs";

export { BoundedQueue, MessagePortQueue, createMessagePortQueue } from "./queue";
export type { EventQueue } from "./queue";
export { Pacer, delay, pacingFromConfig } from "./qos";
export type { PacingMode, PacingOptions } from "./qos";

export { ConfigSchema, loadConfig, effectiveLogLevel } from "./config";
export type { ConfigSource, CotWireConfig } from "./config";
export { createLogger, createSilentLogger } from "./logger";
export type { Logger, LogLevel } from "./logger";
export { CotWireError, isCotWireError } from "./errors";
export type { CotWireErrorCode } from "./errors";
