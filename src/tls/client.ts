import net from "node:net";
import tls from "node:tls";
import type { Logger } from "pino";
import { CotWireError } from "../errors";
import type { TlsIdentity } from "./identity";

/**
 * `tls.connect` options for a client identity. The peer name checked is the
 * expected hostname when configured, otherwise the connection host.
 */
export function buildSecureContextOptions(
  identity: TlsIdentity,
  host: string,
  log?: Logger,
): tls.ConnectionOptions {
  const peerName = identity.expectedHostname ?? host;

  if (!identity.checkHostname) {
    log?.warn({ host }, "TLS server hostname verification disabled");
  }
  if (!identity.verifyPeer) {
    log?.warn({ host }, "TLS server certificate verification disabled");
  }

  const options: tls.ConnectionOptions = {
    cert: identity.certPem,
    key: identity.keyPem,
    passphrase: identity.passphrase,
    ca: identity.caPem,
    minVersion: "TLSv1.2",
    rejectUnauthorized: identity.verifyPeer,
    checkServerIdentity: identity.checkHostname
      ? (_servername, cert) => tls.checkServerIdentity(peerName, cert)
      : () => undefined,
  };
  if (net.isIP(peerName) === 0) options.servername = peerName;
  if (identity.ciphers) options.ciphers = identity.ciphers;
  return options;
}

export interface WrapTlsOptions {
  host: string;
  log?: Logger;
  handshakeTimeoutMs?: number;
}

/**
 * Runs the client handshake over an already connected TCP socket. Resolves
 * with the secure socket; any handshake failure is E_HANDSHAKE.
 */
export function wrapTls(
  socket: net.Socket,
  identity: TlsIdentity,
  options: WrapTlsOptions,
): Promise<tls.TLSSocket> {
  return new Promise<tls.TLSSocket>((resolve, reject) => {
    let secure: tls.TLSSocket;
    try {
      secure = tls.connect({
        ...buildSecureContextOptions(identity, options.host, options.log),
        socket,
      });
    } catch (err) {
      socket.destroy();
      reject(
        new CotWireError("E_CERTIFICATE", "Cannot build TLS context from client identity", {
          cause: err,
        }),
      );
      return;
    }

    let timer: NodeJS.Timeout | undefined;
    const cleanup = () => {
      if (timer) clearTimeout(timer);
      secure.off("secureConnect", onSecure);
      secure.off("error", onError);
      secure.off("close", onClose);
    };
    const fail = (message: string, cause?: unknown) => {
      cleanup();
      secure.destroy();
      reject(new CotWireError("E_HANDSHAKE", message, { cause }));
    };
    const onSecure = () => {
      cleanup();
      options.log?.debug(
        { host: options.host, protocol: secure.getProtocol(), cipher: secure.getCipher().name },
        "TLS handshake complete",
      );
      resolve(secure);
    };
    const onError = (err: Error) =>
      fail(`TLS handshake with ${options.host} failed: ${err.message}`, err);
    const onClose = () =>
      fail(`Connection to ${options.host} closed during TLS handshake`);

    secure.once("secureConnect", onSecure);
    secure.once("error", onError);
    secure.once("close", onClose);
    if (options.handshakeTimeoutMs && options.handshakeTimeoutMs > 0) {
      timer = setTimeout(
        () => fail(`TLS handshake with ${options.host} timed out`),
        options.handshakeTimeoutMs,
      );
    }
  });
}
