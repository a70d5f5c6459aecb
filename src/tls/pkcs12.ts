import { X509Certificate, createPrivateKey } from "node:crypto";
import { CotWireError } from "../errors";

type Forge = typeof import("node-forge");

let forgeModule: Promise<Forge> | undefined;

/**
 * node-forge is only needed for PKCS#12 bundles, so it is loaded on first
 * use. A missing install surfaces as E_DEPENDENCY_MISSING.
 */
export function loadForge(): Promise<Forge> {
  forgeModule ??= import("node-forge").then(
    (loaded: Forge & { default?: Forge }) => loaded.default ?? loaded,
    (err: unknown) => {
      forgeModule = undefined;
      throw new CotWireError(
        "E_DEPENDENCY_MISSING",
        "PKCS#12 support requires the node-forge package",
        { cause: err },
      );
    },
  );
  return forgeModule;
}

export interface Pkcs12Contents {
  /** Unencrypted PEM private key, when the bundle carries one. */
  keyPem?: string;
  /** Leaf certificate matching the key, or the first certificate. */
  certPem?: string;
  /** Remaining certificates (chain or trust anchors). */
  caPems: string[];
}

const keyMatches = (certPem: string, keyPem: string): boolean => {
  try {
    return new X509Certificate(certPem).checkPrivateKey(createPrivateKey(keyPem));
  } catch {
    return false;
  }
};

function readPfx(forge: Forge, der: Buffer, password: string, label: string) {
  try {
    const asn1 = forge.asn1.fromDer(forge.util.createBuffer(der.toString("binary")));
    return forge.pkcs12.pkcs12FromAsn1(asn1, false, password);
  } catch (err) {
    throw new CotWireError(
      "E_CERTIFICATE",
      `Cannot open PKCS#12 bundle ${label}: wrong password or corrupt file`,
      { cause: err },
    );
  }
}

/** Decodes a DER PKCS#12 bundle into PEM strings. */
export async function decodePkcs12(
  der: Buffer,
  password: string | undefined,
  label = "bundle",
): Promise<Pkcs12Contents> {
  const forge = await loadForge();
  const pfx = readPfx(forge, der, password ?? "", label);
  const { oids } = forge.pki;

  const keyBags = [
    ...(pfx.getBags({ bagType: oids.pkcs8ShroudedKeyBag })[oids.pkcs8ShroudedKeyBag] ?? []),
    ...(pfx.getBags({ bagType: oids.keyBag })[oids.keyBag] ?? []),
  ];
  const certPems = (pfx.getBags({ bagType: oids.certBag })[oids.certBag] ?? []).flatMap(
    bag => (bag.cert ? [forge.pki.certificateToPem(bag.cert)] : []),
  );

  const key = keyBags.find(bag => bag.key)?.key;
  const keyPem = key ? forge.pki.privateKeyToPem(key) : undefined;
  const certPem =
    (keyPem ? certPems.find(pem => keyMatches(pem, keyPem)) : undefined) ?? certPems[0];

  return {
    keyPem,
    certPem,
    caPems: certPems.filter(pem => pem !== certPem),
  };
}
