import { X509Certificate, createPrivateKey, type KeyObject } from "node:crypto";
import { readFile } from "node:fs/promises";
import path from "node:path";
import type { Logger } from "pino";
import { CotWireError } from "../errors";
import { configPassphraseProvider, type PassphraseProvider } from "./passphrase";
import { decodePkcs12 } from "./pkcs12";

/** Where the client identity comes from, as configured. */
export interface TlsIdentitySource {
  certPath: string;
  keyPath?: string;
  caPath?: string;
  /** Passphrase of an encrypted PEM key; also tried for PKCS#12. */
  keyPassword?: string;
  p12Password?: string;
  expectedHostname?: string;
  ciphers?: string;
  dontVerify?: boolean;
  dontCheckHostname?: boolean;
}

/** Loaded, validated material ready for `tls.connect`. */
export interface TlsIdentity {
  certPem: string;
  keyPem: string;
  passphrase?: string;
  caPem?: string;
  expectedHostname?: string;
  ciphers?: string;
  verifyPeer: boolean;
  checkHostname: boolean;
}

export interface LoadTlsIdentityOptions {
  passphraseProvider?: PassphraseProvider;
  log?: Logger;
}

const PEM_BLOCK = /-----BEGIN ([A-Z0-9 ]+)-----[\s\S]+?-----END \1-----/g;
const PKCS12_EXTENSIONS = new Set([".p12", ".pfx"]);

const pemBlocks = (text: string): Array<{ label: string; pem: string }> =>
  [...text.matchAll(PEM_BLOCK)].map(match => ({
    label: match[1] ?? "",
    pem: match[0],
  }));

export const isEncryptedPem = (pem: string): boolean =>
  pem.includes("BEGIN ENCRYPTED PRIVATE KEY") || pem.includes("Proc-Type: 4,ENCRYPTED");

const isPkcs12 = (filePath: string, content: Buffer): boolean =>
  PKCS12_EXTENSIONS.has(path.extname(filePath).toLowerCase()) ||
  !content.toString("latin1").includes("-----BEGIN ");

async function readMaterial(filePath: string, what: string): Promise<Buffer> {
  try {
    return await readFile(filePath);
  } catch (err) {
    throw new CotWireError("E_CERTIFICATE", `Cannot read ${what} ${filePath}`, {
      cause: err,
    });
  }
}

function splitPem(text: string, filePath: string): { certPems: string[]; keyPem?: string } {
  const blocks = pemBlocks(text);
  const certPems = blocks.filter(block => block.label === "CERTIFICATE").map(block => block.pem);
  const keyPem = blocks.find(block => block.label.endsWith("PRIVATE KEY"))?.pem;
  if (certPems.length === 0 && !keyPem) {
    throw new CotWireError("E_CERTIFICATE", `No PEM material found in ${filePath}`);
  }
  return keyPem ? { certPems, keyPem } : { certPems };
}

async function unlockKey(
  keyPem: string,
  label: string,
  provider: PassphraseProvider,
): Promise<{ key: KeyObject; passphrase?: string }> {
  if (!isEncryptedPem(keyPem)) {
    try {
      return { key: createPrivateKey(keyPem) };
    } catch (err) {
      throw new CotWireError("E_CERTIFICATE", `Invalid private key in ${label}`, {
        cause: err,
      });
    }
  }
  const passphrase = await provider({ label });
  if (!passphrase) {
    throw new CotWireError(
      "E_CERTIFICATE",
      `Private key ${label} is encrypted and no passphrase was supplied`,
    );
  }
  try {
    return { key: createPrivateKey({ key: keyPem, format: "pem", passphrase }), passphrase };
  } catch (err) {
    throw new CotWireError(
      "E_CERTIFICATE",
      `Passphrase does not decrypt private key ${label}`,
      { cause: err },
    );
  }
}

/**
 * Loads the client certificate, private key and optional CA bundle.
 *
 * The certificate file may be a PKCS#12 bundle (by extension, or whenever it
 * holds no PEM text), a PEM file with the key embedded, or a PEM certificate
 * paired with `keyPath`. Every failure is E_CERTIFICATE.
 */
export async function loadTlsIdentity(
  source: TlsIdentitySource,
  options: LoadTlsIdentityOptions = {},
): Promise<TlsIdentity> {
  const provider =
    options.passphraseProvider ?? configPassphraseProvider(source.keyPassword);
  const certContent = await readMaterial(source.certPath, "client certificate");

  let certPem: string | undefined;
  let keyPem: string | undefined;
  let keyLabel = source.certPath;
  const chainPems: string[] = [];

  if (isPkcs12(source.certPath, certContent)) {
    options.log?.debug({ path: source.certPath }, "Reading PKCS#12 client bundle");
    const bundle = await decodePkcs12(
      certContent,
      source.p12Password ?? source.keyPassword,
      source.certPath,
    );
    certPem = bundle.certPem;
    keyPem = bundle.keyPem;
    chainPems.push(...bundle.caPems);
  } else {
    const parsed = splitPem(certContent.toString("utf8"), source.certPath);
    certPem = parsed.certPems[0];
    chainPems.push(...parsed.certPems.slice(1));
    keyPem = parsed.keyPem;
    if (!keyPem && source.keyPath) {
      const keyContent = await readMaterial(source.keyPath, "private key");
      keyPem = splitPem(keyContent.toString("utf8"), source.keyPath).keyPem;
      keyLabel = source.keyPath;
    }
  }

  if (!certPem) {
    throw new CotWireError("E_CERTIFICATE", `No certificate found in ${source.certPath}`);
  }
  if (!keyPem) {
    throw new CotWireError(
      "E_CERTIFICATE",
      `No private key for ${source.certPath}; embed it or set a key path`,
    );
  }

  const { key, passphrase } = await unlockKey(keyPem, keyLabel, provider);
  let certificate: X509Certificate;
  try {
    certificate = new X509Certificate(certPem);
  } catch (err) {
    throw new CotWireError("E_CERTIFICATE", `Invalid certificate in ${source.certPath}`, {
      cause: err,
    });
  }
  if (!certificate.checkPrivateKey(key)) {
    throw new CotWireError(
      "E_CERTIFICATE",
      `Private key ${keyLabel} does not match certificate ${source.certPath}`,
    );
  }

  const caPem = source.caPath
    ? (await readMaterial(source.caPath, "CA bundle")).toString("utf8")
    : undefined;

  const verifyPeer = !source.dontVerify;
  return {
    certPem: [certPem, ...chainPems].join("\n"),
    keyPem,
    passphrase,
    caPem,
    expectedHostname: source.expectedHostname,
    ciphers: source.ciphers,
    verifyPeer,
    checkHostname: verifyPeer && !source.dontCheckHostname,
  };
}
