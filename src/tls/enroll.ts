/**
 * Client certificate enrollment against a TAK server's certificate API
 * (port 8446). A fresh RSA key is generated, a CSR carrying the server's
 * subject template is signed, and the issued certificate is stored with the
 * key in a PKCS#12 bundle that `loadTlsIdentity` can read.
 */

import { generateKeyPair, randomBytes, randomUUID } from "node:crypto";
import { mkdtemp, writeFile } from "node:fs/promises";
import https from "node:https";
import os from "node:os";
import path from "node:path";
import { promisify } from "node:util";
import type { Logger } from "pino";
import { z } from "zod";
import { parseXmlElements } from "../codecs";
import { DEFAULT_ENROLLMENT_PORT } from "../constants";
import { CotWireError } from "../errors";
import type { CotXmlElement } from "../schema/cot";
import { decodePkcs12, loadForge } from "./pkcs12";

export const DEFAULT_ENROLLMENT_KEY_BITS = 4096;
/** Password TAK servers put on bundles from the v1 signing endpoint. */
export const V1_BUNDLE_PASSWORD = "atakatak";

const PASSPHRASE_BYTES = 16;
const SUBJECT_FIELDS = ["O", "OU", "C", "ST", "L"] as const;

export interface EnrollmentOptions {
  host: string;
  username: string;
  password: string;
  /** Protects the written bundle; generated when omitted. */
  passphrase?: string;
  port?: number;
  clientUid?: string;
  /** Where to write the bundle; a fresh temp file by default. */
  outputPath?: string;
  keyBits?: number;
  /** Trust anchors for the enrollment endpoint. */
  ca?: string;
  dontVerify?: boolean;
  timeoutMs?: number;
  log?: Logger;
}

export interface EnrollmentResult {
  p12Path: string;
  passphrase: string;
  certPem: string;
  caPems: string[];
}

interface HttpResponse {
  status: number;
  body: Buffer;
}

const generateRsaKeyPair = promisify(generateKeyPair);

const signedResponseSchema = z
  .object({ signedCert: z.string().min(1) })
  .catchall(z.unknown());

const enrollmentError = (message: string, cause?: unknown) =>
  new CotWireError("E_CERTIFICATE", message, { cause });

function request(
  url: URL,
  options: {
    method: "GET" | "POST";
    headers: Record<string, string>;
    body?: string;
    ca?: string;
    rejectUnauthorized: boolean;
    timeoutMs: number;
  },
): Promise<HttpResponse> {
  return new Promise((resolve, reject) => {
    const req = https.request(
      url,
      {
        method: options.method,
        headers: options.headers,
        ca: options.ca,
        rejectUnauthorized: options.rejectUnauthorized,
        timeout: options.timeoutMs,
        agent: false,
      },
      res => {
        const chunks: Buffer[] = [];
        res.on("data", (chunk: Buffer) => chunks.push(chunk));
        res.on("end", () => resolve({ status: res.statusCode ?? 0, body: Buffer.concat(chunks) }));
        res.on("error", reject);
      },
    );
    req.on("timeout", () => req.destroy(new Error(`Timed out after ${options.timeoutMs}ms`)));
    req.on("error", reject);
    req.end(options.body);
  });
}

/**
 * Reads `nameEntry` elements (any namespace prefix) from the server's
 * certificate configuration, falling back to plain `entry` elements.
 */
export function parseEnrollmentConfig(xml: string | Buffer): Record<string, string> {
  const collect = (elements: CotXmlElement[], suffix: string, out: Record<string, string>) => {
    for (const element of elements) {
      const { name, value } = element.attributes;
      if (element.name.endsWith(suffix) && name && value) out[name] = value;
      collect(element.children, suffix, out);
    }
    return out;
  };
  const elements = parseXmlElements(xml);
  const named = collect(elements, "nameEntry", {});
  return Object.keys(named).length > 0 ? named : collect(elements, "entry", {});
}

/** The v2 endpoint returns bare base64 bodies; restore the PEM armor. */
export function normalizeCertificatePem(content: string): string {
  const trimmed = content.trim();
  if (trimmed.startsWith("-----BEGIN")) return `${trimmed}\n`;
  const body = trimmed.replace(/\s+/g, "");
  const lines = body.match(/.{1,64}/g) ?? [];
  return ["-----BEGIN CERTIFICATE-----", ...lines, "-----END CERTIFICATE-----", ""].join("\n");
}

export class CertificateEnrollment {
  private readonly options: EnrollmentOptions;
  private readonly base: URL;
  private readonly log?: Logger;

  constructor(options: EnrollmentOptions) {
    this.options = options;
    const host = options.host.includes(":") ? `[${options.host}]` : options.host;
    this.base = new URL(`https://${host}:${options.port ?? DEFAULT_ENROLLMENT_PORT}`);
    this.log = options.log?.child({ component: "enrollment" });
  }

  async enroll(): Promise<EnrollmentResult> {
    const { username } = this.options;
    const passphrase = this.options.passphrase ?? randomBytes(PASSPHRASE_BYTES).toString("base64url");
    const subject = await this.fetchSubjectTemplate();

    const keys = await generateRsaKeyPair("rsa", {
      modulusLength: this.options.keyBits ?? DEFAULT_ENROLLMENT_KEY_BITS,
      publicKeyEncoding: { type: "spki", format: "pem" },
      privateKeyEncoding: { type: "pkcs8", format: "pem" },
    });
    const csrPem = await this.createCsr(subject, keys);

    let issued: { certPem: string; caPems: string[] };
    try {
      issued = await this.signV2(csrPem);
    } catch (err) {
      this.log?.warn({ err }, "v2 signing failed; trying the v1 endpoint");
      issued = await this.signV1(csrPem);
    }

    const p12Path =
      this.options.outputPath ??
      path.join(await mkdtemp(path.join(os.tmpdir(), "cotwire-enroll-")), "clientCert.p12");
    await writeFile(
      p12Path,
      await this.bundle(issued.certPem, issued.caPems, keys.privateKey, passphrase),
      { mode: 0o600 },
    );
    this.log?.info(
      { host: this.options.host, username, p12Path, caCount: issued.caPems.length },
      "Enrolled client certificate",
    );
    return { p12Path, passphrase, ...issued };
  }

  private async call(
    method: "GET" | "POST",
    pathname: string,
    body?: { contentType: string; content: string },
  ): Promise<HttpResponse> {
    const url = new URL(pathname, this.base);
    const credentials = Buffer.from(`${this.options.username}:${this.options.password}`).toString(
      "base64",
    );
    const headers: Record<string, string> = { Authorization: `Basic ${credentials}` };
    if (body) headers["Content-Type"] = body.contentType;
    let response: HttpResponse;
    try {
      response = await request(url, {
        method,
        headers,
        body: body?.content,
        ca: this.options.ca,
        rejectUnauthorized: !this.options.dontVerify,
        timeoutMs: this.options.timeoutMs ?? 30_000,
      });
    } catch (err) {
      throw enrollmentError(`${method} ${url.pathname} failed`, err);
    }
    if (response.status !== 200) {
      throw enrollmentError(`${method} ${url.pathname} answered HTTP ${response.status}`);
    }
    return response;
  }

  private async fetchSubjectTemplate(): Promise<Record<string, string>> {
    const response = await this.call("GET", "/Marti/api/tls/config");
    let config: Record<string, string>;
    try {
      config = parseEnrollmentConfig(response.body);
    } catch (err) {
      throw enrollmentError("Malformed certificate configuration from server", err);
    }
    this.log?.debug({ config }, "Received certificate configuration");
    return config;
  }

  private async createCsr(
    subject: Record<string, string>,
    keys: { publicKey: string; privateKey: string },
  ): Promise<string> {
    const forge = await loadForge();
    const csr = forge.pki.createCertificationRequest();
    csr.publicKey = forge.pki.publicKeyFromPem(keys.publicKey);
    const attributes = [{ shortName: "CN", value: this.options.username }];
    for (const field of SUBJECT_FIELDS) {
      const value = subject[field];
      if (value) attributes.push({ shortName: field, value });
    }
    csr.setSubject(attributes);
    csr.sign(forge.pki.privateKeyFromPem(keys.privateKey), forge.md.sha256.create());
    return forge.pki.certificationRequestToPem(csr);
  }

  private signPath(version: "v1" | "v2"): string {
    const uid = encodeURIComponent(this.options.clientUid ?? randomUUID());
    const endpoint = version === "v2" ? "signClient/v2" : "signClient";
    return `/Marti/api/tls/${endpoint}?clientUid=${uid}`;
  }

  private async signV2(csrPem: string): Promise<{ certPem: string; caPems: string[] }> {
    const response = await this.call("POST", this.signPath("v2"), {
      contentType: "application/pkcs10",
      content: csrPem,
    });
    let parsed: unknown;
    try {
      parsed = JSON.parse(response.body.toString("utf8"));
    } catch (err) {
      throw enrollmentError("v2 signing response is not JSON", err);
    }
    const result = signedResponseSchema.safeParse(parsed);
    if (!result.success) {
      throw enrollmentError("v2 signing response has no signedCert", result.error);
    }
    const caPems: string[] = [];
    for (let index = 0; ; index += 1) {
      const ca = result.data[`ca${index}`];
      if (ca === undefined) break;
      if (typeof ca === "string" && ca.trim() !== "") caPems.push(normalizeCertificatePem(ca));
    }
    return { certPem: normalizeCertificatePem(result.data.signedCert), caPems };
  }

  private async signV1(csrPem: string): Promise<{ certPem: string; caPems: string[] }> {
    const response = await this.call("POST", this.signPath("v1"), {
      contentType: "application/pkcs10",
      content: csrPem,
    });
    const contents = await decodePkcs12(response.body, V1_BUNDLE_PASSWORD, "v1 signing response");
    if (!contents.certPem) {
      throw enrollmentError("v1 signing response carries no certificate");
    }
    return { certPem: contents.certPem, caPems: contents.caPems };
  }

  private async bundle(
    certPem: string,
    caPems: string[],
    privateKeyPem: string,
    passphrase: string,
  ): Promise<Buffer> {
    const forge = await loadForge();
    let der: string;
    try {
      const certs = [certPem, ...caPems].map(pem => forge.pki.certificateFromPem(pem));
      const asn1 = forge.pkcs12.toPkcs12Asn1(
        forge.pki.privateKeyFromPem(privateKeyPem),
        certs,
        passphrase,
        { algorithm: "3des", friendlyName: "TAK Client Cert" },
      );
      der = forge.asn1.toDer(asn1).getBytes();
    } catch (err) {
      throw enrollmentError("Server returned an unreadable certificate", err);
    }
    return Buffer.from(der, "binary");
  }
}

/** Enrolls with the server at `host` and writes the resulting bundle. */
export const enrollCertificate = (options: EnrollmentOptions): Promise<EnrollmentResult> =>
  new CertificateEnrollment(options).enroll();
