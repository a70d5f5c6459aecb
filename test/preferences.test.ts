import AdmZip from "adm-zip";
import { existsSync, statSync } from "node:fs";
import { mkdir, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { isCotWireError } from "../src/errors";
import {
  importPreferencePackage,
  loadConfigWithPreferences,
  mergePreferences,
} from "../src/preferences";
import { loadTlsIdentity } from "../src/tls/identity";
import { TEST_PASSWORD, createTestPki, toPkcs12, type TestPki } from "./helpers/certs";

let pki: TestPki;
let root: string;
let counter = 0;

const scratch = async () => mkdtemp(path.join(root, `case-${(counter += 1)}-`));

const writeZip = async (entries: Record<string, string | Buffer>): Promise<string> => {
  const zip = new AdmZip();
  for (const [name, content] of Object.entries(entries)) {
    zip.addFile(name, Buffer.isBuffer(content) ? content : Buffer.from(content, "utf8"));
  }
  const target = path.join(await scratch(), "package.zip");
  zip.writeZip(target);
  return target;
};

const expectPackageError = async (promise: Promise<unknown>, message: RegExp) => {
  const err = await promise.then(
    () => undefined,
    (error: unknown) => error,
  );
  expect(isCotWireError(err, "E_PACKAGE")).toBe(true);
  expect(err instanceof Error && err.message).toMatch(message);
};

const prefDocument = (entries: Record<string, string>) =>
  [
    "<?xml version='1.0' standalone='yes'?>",
    "<preferences>",
    '  <preference version="1" name="cot_streams">',
    ...Object.entries(entries).map(
      ([key, value]) => `    <entry key="${key}" class="class java.lang.String">${value}</entry>`,
    ),
    "  </preference>",
    "</preferences>",
  ].join("\n");

beforeAll(async () => {
  pki = createTestPki();
  root = await mkdtemp(path.join(os.tmpdir(), "cotwire-pref-test-"));
});

afterAll(async () => {
  await rm(root, { recursive: true, force: true });
});

describe("importPreferencePackage: settings.ini", () => {
  it("should flatten sections and resolve certificate paths", async () => {
    const archive = await writeZip({
      "settings.ini": [
        "COT_URL = tls://takserver.test:8089",
        "PYTAK_TLS_CLIENT_CERT = certs/client.pem",
        "",
        "[station]",
        "COT_HOST_ID = node-7",
        "COT_URL = udp://ignored.test:1",
      ].join("\n"),
      "certs/client.pem": pki.client.certPem,
    });
    const workDir = await scratch();

    const imported = await importPreferencePackage(archive, { workDir });

    expect(imported.workDir).toBe(path.resolve(workDir));
    expect(imported.settings).toEqual({
      COT_URL: "tls://takserver.test:8089",
      PYTAK_TLS_CLIENT_CERT: path.join(path.resolve(workDir), "certs", "client.pem"),
      COT_HOST_ID: "node-7",
    });
    expect([...imported.files].sort()).toEqual([path.join("certs", "client.pem"), "settings.ini"]);
    expect(await readFile(imported.settings.PYTAK_TLS_CLIENT_CERT ?? "", "utf8")).toBe(
      pki.client.certPem,
    );
  });

  it("should fall back to matching referenced files by name", async () => {
    const archive = await writeZip({
      "conf/settings.ini": "PYTAK_TLS_CLIENT_CAFILE = C:\\certs\\ca.pem\n",
      "trust/ca.pem": pki.ca.certPem,
    });
    const imported = await importPreferencePackage(archive, { workDir: await scratch() });
    expect(imported.settings.PYTAK_TLS_CLIENT_CAFILE).toBe(
      path.join(imported.workDir, "trust", "ca.pem"),
    );
  });

  it("should keep semicolons and hashes inside values", async () => {
    const archive = await writeZip({
      "settings.ini": [
        "; station defaults",
        "# generated",
        "PYTAK_TLS_CLIENT_PASSWORD = abc#123;x",
        "COT_HOST_ID=relay;7",
      ].join("\n"),
    });
    const imported = await importPreferencePackage(archive, { workDir: await scratch() });
    expect(imported.settings).toEqual({
      PYTAK_TLS_CLIENT_PASSWORD: "abc#123;x",
      COT_HOST_ID: "relay;7",
    });
  });

  it("should not resolve references into sibling directories", async () => {
    const workDir = await scratch();
    const sibling = `${workDir}X`;
    await mkdir(sibling);
    await writeFile(path.join(sibling, "escape.pem"), pki.ca.certPem);
    const archive = await writeZip({
      "settings.ini": `PYTAK_TLS_CLIENT_CAFILE = ../${path.basename(sibling)}/escape.pem\n`,
    });
    await expectPackageError(
      importPreferencePackage(archive, { workDir }),
      /PYTAK_TLS_CLIENT_CAFILE refers to/,
    );
  });

  it("should reject references to files outside the package", async () => {
    const archive = await writeZip({
      "settings.ini": "PYTAK_TLS_CLIENT_KEY = keys/missing.key\n",
    });
    await expectPackageError(
      importPreferencePackage(archive, { workDir: await scratch() }),
      /PYTAK_TLS_CLIENT_KEY refers to "keys\/missing.key"/,
    );
  });
});

describe("importPreferencePackage: .pref", () => {
  it("should convert the connect string and PKCS#12 bundles", async () => {
    const archive = await writeZip({
      "prefs/cot.pref": prefDocument({
        connectString0: "takserver.test:8089:ssl",
        certificateLocation: "/storage/emulated/0/atak/cert/client.p12",
        clientPassword: TEST_PASSWORD,
        caLocation: "cert/truststore.p12",
        caPassword: TEST_PASSWORD,
      }),
      "cert/client.p12": toPkcs12([pki.client.certPem], pki.client.keyPem),
      "cert/truststore.p12": toPkcs12([pki.ca.certPem], undefined),
    });

    const imported = await importPreferencePackage(archive, { workDir: await scratch() });
    const { settings, workDir } = imported;

    expect(settings.COT_URL).toBe("ssl://takserver.test:8089");
    expect(settings.PYTAK_TLS_CLIENT_CERT).toBe(path.join(workDir, "client.cert.pem"));
    expect(settings.PYTAK_TLS_CLIENT_KEY).toBe(path.join(workDir, "client.key.pem"));
    expect(settings.PYTAK_TLS_CLIENT_CAFILE).toBe(path.join(workDir, "ca.pem"));
    expect(await readFile(path.join(workDir, "ca.pem"), "utf8")).toBe(pki.ca.certPem);
    expect(statSync(path.join(workDir, "client.key.pem")).mode & 0o777).toBe(0o600);

    const identity = await loadTlsIdentity({
      certPath: path.join(workDir, "client.cert.pem"),
      keyPath: path.join(workDir, "client.key.pem"),
    });
    expect(identity.certPem).toBe(pki.client.certPem.trim());
  });

  it("should keep only the connect string when no certificate is named", async () => {
    const archive = await writeZip({
      "cot.pref": prefDocument({ connectString0: "10.0.0.5:8087:tcp" }),
    });
    const imported = await importPreferencePackage(archive, { workDir: await scratch() });
    expect(imported.settings).toEqual({ COT_URL: "tcp://10.0.0.5:8087" });
  });

  it("should report a bad bundle password as a package error", async () => {
    const archive = await writeZip({
      "cot.pref": prefDocument({
        certificateLocation: "client.p12",
        clientPassword: "wrong-secret",
      }),
      "client.p12": toPkcs12([pki.client.certPem], pki.client.keyPem),
    });
    await expectPackageError(
      importPreferencePackage(archive, { workDir: await scratch() }),
      /Cannot decode certificate bundle "client.p12"/,
    );
  });

  it("should reject malformed connect strings", async () => {
    const archive = await writeZip({
      "cot.pref": prefDocument({ connectString0: "takserver.test" }),
    });
    await expectPackageError(
      importPreferencePackage(archive, { workDir: await scratch() }),
      /Unusable connectString0/,
    );
  });
});

describe("importPreferencePackage: failures", () => {
  it("should reject a missing archive", async () => {
    await expectPackageError(
      importPreferencePackage(path.join(root, "absent.zip")),
      /does not exist/,
    );
  });

  it("should reject a file that is not a zip", async () => {
    const dir = await scratch();
    const bogus = path.join(dir, "bogus.zip");
    await writeFile(bogus, "not a zip");
    await expectPackageError(
      importPreferencePackage(bogus, { workDir: await scratch() }),
      /Cannot open preference package/,
    );
  });

  it("should reject packages without a settings document", async () => {
    const archive = await writeZip({ "readme.txt": "nothing here" });
    await expectPackageError(
      importPreferencePackage(archive, { workDir: await scratch() }),
      /has no settings.ini or .pref document/,
    );
  });
});

describe("mergePreferences / loadConfigWithPreferences", () => {
  it("should only fill unset or empty keys", () => {
    expect(
      mergePreferences(
        { COT_URL: "tcp://explicit.test:8087", COT_HOST_ID: "" },
        { settings: { COT_URL: "tcp://package.test:8087", COT_HOST_ID: "pkg", COT_STALE: "60" } },
      ),
    ).toEqual({
      COT_URL: "tcp://explicit.test:8087",
      COT_HOST_ID: "pkg",
      COT_STALE: "60",
    });
  });

  it("should skip package handling when PREF_PACKAGE is unset", async () => {
    const { config, preferences } = await loadConfigWithPreferences({ COT_URL: "log://stdout" });
    expect(config.COT_URL).toBe("log://stdout");
    expect(preferences).toBeUndefined();
  });

  it("should merge the package named by PREF_PACKAGE", async () => {
    const archive = await writeZip({
      "settings.ini": "COT_URL = tcp://package.test:8087\nCOT_STALE = 60\n",
    });
    const workDir = await scratch();
    const { config, preferences } = await loadConfigWithPreferences(
      { PREF_PACKAGE: archive, COT_STALE: "30" },
      { workDir },
    );
    expect(config.COT_URL).toBe("tcp://package.test:8087");
    expect(config.COT_STALE).toBe(30);
    expect(preferences?.workDir).toBe(path.resolve(workDir));
    expect(existsSync(path.join(path.resolve(workDir), "settings.ini"))).toBe(true);
  });

  it("should point the TLS identity at an extracted file", async () => {
    const archive = await writeZip({
      "settings.ini": "COT_URL=tls://h:1\nPYTAK_TLS_CLIENT_CERT=client.pem\n",
      "client.pem": `${pki.client.certPem}${pki.client.keyPem}`,
    });
    const { config } = await loadConfigWithPreferences(
      { PREF_PACKAGE: archive },
      { workDir: await scratch() },
    );
    expect(config.COT_URL).toBe("tls://h:1");
    expect(config.PYTAK_TLS_CLIENT_CERT).toBeDefined();
    expect(existsSync(config.PYTAK_TLS_CLIENT_CERT ?? "")).toBe(true);
  });

  it("should let overrides name the package", async () => {
    const archive = await writeZip({ "settings.ini": "COT_HOST_ID = from-package\n" });
    const { config } = await loadConfigWithPreferences(
      {},
      { overrides: { PREF_PACKAGE: archive }, workDir: await scratch() },
    );
    expect(config.COT_HOST_ID).toBe("from-package");
  });
});

describe("loadConfigWithPreferences: extra destinations", () => {
  const stations = [
    "[primary]",
    "COT_URL = tcp://primary.test:8087",
    "COT_HOST_ID = hq",
    "",
    "[relay]",
    "COT_URL = udp://relay.test:6969",
    "PYTAK_TLS_CLIENT_CAFILE = ca.pem",
    "",
    "[mesh]",
    "COT_URL = udp+wo://239.2.3.1:6969",
    "COT_STALE = 30",
  ].join("\n");

  it("should keep each settings.ini section apart", async () => {
    const archive = await writeZip({ "settings.ini": stations, "ca.pem": pki.ca.certPem });
    const imported = await importPreferencePackage(archive, { workDir: await scratch() });
    expect(Object.keys(imported.sections)).toEqual(["primary", "relay", "mesh"]);
    expect(imported.sections.relay).toEqual({
      COT_URL: "udp://relay.test:6969",
      PYTAK_TLS_CLIENT_CAFILE: path.join(imported.workDir, "ca.pem"),
    });
    expect(imported.settings.COT_URL).toBe("tcp://primary.test:8087");
  });

  it("should ignore later sections unless IMPORT_OTHER_CONFIGS is set", async () => {
    const archive = await writeZip({ "settings.ini": stations, "ca.pem": pki.ca.certPem });
    const { config, destinations } = await loadConfigWithPreferences(
      { PREF_PACKAGE: archive },
      { workDir: await scratch() },
    );
    expect(config.COT_URL).toBe("tcp://primary.test:8087");
    expect(destinations).toEqual([]);
  });

  it("should turn sections after the first into destinations", async () => {
    const archive = await writeZip({ "settings.ini": stations, "ca.pem": pki.ca.certPem });
    const { config, destinations } = await loadConfigWithPreferences(
      { PREF_PACKAGE: archive, IMPORT_OTHER_CONFIGS: "1" },
      { workDir: await scratch() },
    );
    expect(config.COT_URL).toBe("tcp://primary.test:8087");
    expect(destinations.map(destination => destination.name)).toEqual(["relay", "mesh"]);
    const [relay, mesh] = destinations;
    expect(relay?.config.COT_URL).toBe("udp://relay.test:6969");
    expect(relay?.config.COT_HOST_ID).toBe("hq");
    expect(relay?.config.PYTAK_TLS_CLIENT_CAFILE).toMatch(/ca\.pem$/);
    expect(mesh?.config.COT_URL).toBe("udp+wo://239.2.3.1:6969");
    expect(mesh?.config.COT_STALE).toBe(30);
  });

  it("should reject a destination section without COT_URL", async () => {
    const archive = await writeZip({
      "settings.ini": "[primary]\nCOT_URL = tcp://primary.test:8087\n\n[spare]\nCOT_STALE = 10\n",
    });
    const err = await loadConfigWithPreferences(
      { PREF_PACKAGE: archive, IMPORT_OTHER_CONFIGS: "yes" },
      { workDir: await scratch() },
    ).then(
      () => undefined,
      (error: unknown) => error,
    );
    expect(isCotWireError(err, "E_CONFIG")).toBe(true);
    expect(err instanceof Error && err.message).toBe("Section [spare] does not set COT_URL");
  });
});
