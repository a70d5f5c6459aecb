/**
 * Preference packages: zip archives carrying connection settings plus the
 * certificates they reference. Two settings documents are understood:
 * a flat `settings.ini` using this library's configuration keys, and the
 * `*.pref` XML that TAK servers hand out in data packages.
 */

import AdmZip from "adm-zip";
import { parse as parseIni } from "ini";
import { existsSync } from "node:fs";
import { mkdtemp, readFile, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { Logger } from "pino";
import { parseXmlElements } from "./codecs";
import { loadConfig, type ConfigSource, type CotWireConfig } from "./config";
import { connectStringToUrl } from "./destination";
import { CotWireError, isCotWireError } from "./errors";
import type { CotXmlElement } from "./schema/cot";
import type { DestinationConfig } from "./runtime";
import { decodePkcs12 } from "./tls/pkcs12";

export interface PreferencePackage {
  /** Configuration keys with file paths rewritten to extracted files. */
  settings: Record<string, string>;
  /** Each `settings.ini` section on its own, file paths rewritten likewise. */
  sections: Record<string, Record<string, string>>;
  workDir: string;
  /** Extracted files, relative to `workDir`. */
  files: string[];
}

export interface ImportPreferenceOptions {
  /** Extraction directory; a fresh temp directory by default. */
  workDir?: string;
  log?: Logger;
}

const FILE_KEYS = [
  "PYTAK_TLS_CLIENT_CERT",
  "PYTAK_TLS_CLIENT_KEY",
  "PYTAK_TLS_CLIENT_CAFILE",
] as const;

const packageError = (message: string, cause?: unknown) =>
  new CotWireError("E_PACKAGE", message, { cause });

function extractArchive(archivePath: string, workDir: string): string[] {
  let zip: AdmZip;
  try {
    zip = new AdmZip(archivePath);
  } catch (err) {
    throw packageError(`Cannot open preference package ${archivePath}`, err);
  }
  try {
    zip.extractAllTo(workDir, true);
  } catch (err) {
    throw packageError(`Cannot extract preference package ${archivePath}`, err);
  }
  return zip
    .getEntries()
    .filter(entry => !entry.isDirectory)
    .map(entry => path.normalize(entry.entryName));
}

/**
 * Maps a path named by the settings document to an extracted file: first
 * relative to the document, then by basename anywhere in the package.
 */
function locateFile(
  reference: string,
  documentDir: string,
  workDir: string,
  files: string[],
): string | undefined {
  const relative = path.resolve(documentDir, reference);
  const inside = path.relative(workDir, relative);
  if (!inside.startsWith("..") && !path.isAbsolute(inside) && existsSync(relative)) {
    return relative;
  }
  const base = path.basename(reference.replace(/\\/g, "/"));
  const match = files.find(file => path.basename(file) === base);
  return match ? path.join(workDir, match) : undefined;
}

const scalars = (values: Record<string, unknown>): Record<string, string> => {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(values)) {
    if (typeof value === "string" || typeof value === "boolean") out[key] = String(value);
  }
  return out;
};

const iniSections = (parsed: Record<string, unknown>): Record<string, Record<string, string>> => {
  const sections: Record<string, Record<string, string>> = {};
  for (const [name, value] of Object.entries(parsed)) {
    if (typeof value === "object" && value !== null && !Array.isArray(value)) {
      sections[name] = scalars(Object.fromEntries(Object.entries(value)));
    }
  }
  return sections;
};

/** Top-level keys win over section keys; earlier sections over later ones. */
const flattenIni = (
  parsed: Record<string, unknown>,
  sections: Record<string, Record<string, string>>,
): Record<string, string> => {
  const settings = scalars(parsed);
  for (const section of Object.values(sections)) {
    for (const [key, value] of Object.entries(section)) {
      if (settings[key] === undefined) settings[key] = value;
    }
  }
  return settings;
};

/**
 * `ini` cuts values at an unquoted `;` or `#`, but settings values are
 * literal, so both are escaped in every `key = value` line before parsing.
 * Whole-line comments and quoted values are left alone.
 */
const escapeInlineComments = (text: string): string =>
  text
    .split(/\r?\n/)
    .map(line => {
      const match = /^(\s*[^\s;#\[][^=]*=)(.*)$/.exec(line);
      if (!match) return line;
      const [, key = "", value = ""] = match;
      if (/^\s*(".*"|'.*')\s*$/.test(value)) return line;
      return key + value.replace(/[\\;#]/g, "\\$&");
    })
    .join("\n");

function resolveFileKeys(
  values: Record<string, string>,
  documentDir: string,
  workDir: string,
  files: string[],
): Record<string, string> {
  const resolved = { ...values };
  for (const key of FILE_KEYS) {
    const reference = resolved[key];
    if (!reference) continue;
    const located = locateFile(reference, documentDir, workDir, files);
    if (!located) {
      throw packageError(`${key} refers to "${reference}", which is not in the package`);
    }
    resolved[key] = located;
  }
  return resolved;
}

async function readSettingsIni(
  documentPath: string,
  workDir: string,
  files: string[],
): Promise<Pick<PreferencePackage, "settings" | "sections">> {
  const parsed: Record<string, unknown> = parseIni(
    escapeInlineComments(await readFile(documentPath, "utf8")),
  );
  const documentDir = path.dirname(documentPath);
  const sections: Record<string, Record<string, string>> = {};
  for (const [name, values] of Object.entries(iniSections(parsed))) {
    sections[name] = resolveFileKeys(values, documentDir, workDir, files);
  }
  return {
    settings: resolveFileKeys(flattenIni(parsed, sections), documentDir, workDir, files),
    sections,
  };
}

const collectEntries = (elements: CotXmlElement[], out: Map<string, string>) => {
  for (const element of elements) {
    if (element.name === "entry" && element.attributes.key !== undefined) {
      out.set(element.attributes.key, (element.text ?? "").trim());
    }
    collectEntries(element.children, out);
  }
  return out;
};

async function readPkcs12Entry(
  location: string,
  password: string | undefined,
  documentDir: string,
  workDir: string,
  files: string[],
) {
  const located = locateFile(location, documentDir, workDir, files);
  if (!located) {
    throw packageError(`Certificate "${location}" is not in the package`);
  }
  if (!password) {
    throw packageError(`No password for certificate bundle "${location}"`);
  }
  try {
    return await decodePkcs12(await readFile(located), password, located);
  } catch (err) {
    if (isCotWireError(err, "E_CERTIFICATE")) {
      throw packageError(`Cannot decode certificate bundle "${location}"`, err);
    }
    throw err;
  }
}

async function readPrefDocument(
  documentPath: string,
  workDir: string,
  files: string[],
  log?: Logger,
): Promise<Record<string, string>> {
  let elements: CotXmlElement[];
  try {
    elements = parseXmlElements(await readFile(documentPath));
  } catch (err) {
    throw packageError(`Malformed preference file ${documentPath}`, err);
  }
  const entries = collectEntries(elements, new Map());
  const settings: Record<string, string> = {};
  const documentDir = path.dirname(documentPath);

  const connectString = entries.get("connectString0");
  if (connectString) {
    try {
      settings.COT_URL = connectStringToUrl(connectString);
    } catch (err) {
      throw packageError(`Unusable connectString0 "${connectString}"`, err);
    }
  }

  const certificateLocation = entries.get("certificateLocation");
  if (certificateLocation) {
    const client = await readPkcs12Entry(
      certificateLocation,
      entries.get("clientPassword"),
      documentDir,
      workDir,
      files,
    );
    if (!client.certPem || !client.keyPem) {
      throw packageError(`Certificate bundle "${certificateLocation}" lacks a key or certificate`);
    }
    const certPath = path.join(workDir, "client.cert.pem");
    const keyPath = path.join(workDir, "client.key.pem");
    await writeFile(certPath, client.certPem);
    await writeFile(keyPath, client.keyPem, { mode: 0o600 });
    settings.PYTAK_TLS_CLIENT_CERT = certPath;
    settings.PYTAK_TLS_CLIENT_KEY = keyPath;

    const caPems = [...client.caPems];
    const caLocation = entries.get("caLocation");
    if (caLocation) {
      const trust = await readPkcs12Entry(
        caLocation,
        entries.get("caPassword"),
        documentDir,
        workDir,
        files,
      );
      caPems.push(...(trust.certPem ? [trust.certPem] : []), ...trust.caPems);
    }
    if (caPems.length > 0) {
      const caPath = path.join(workDir, "ca.pem");
      await writeFile(caPath, caPems.join("\n"));
      settings.PYTAK_TLS_CLIENT_CAFILE = caPath;
    }
    log?.debug({ certPath, keyPath }, "Converted package certificates to PEM");
  }
  return settings;
}

/**
 * Extracts a preference package and returns its settings as configuration
 * keys. File references point at the extracted (or converted) files.
 */
export async function importPreferencePackage(
  archivePath: string,
  options: ImportPreferenceOptions = {},
): Promise<PreferencePackage> {
  if (!existsSync(archivePath)) {
    throw packageError(`Preference package ${archivePath} does not exist`);
  }
  const workDir = path.resolve(
    options.workDir ?? (await mkdtemp(path.join(os.tmpdir(), "cotwire-pref-"))),
  );
  const files = extractArchive(archivePath, workDir);

  const iniDocument = files.find(file => path.basename(file).toLowerCase() === "settings.ini");
  const prefDocument = files.find(file => file.toLowerCase().endsWith(".pref"));

  let settings: Record<string, string>;
  let sections: Record<string, Record<string, string>> = {};
  if (iniDocument) {
    ({ settings, sections } = await readSettingsIni(
      path.join(workDir, iniDocument),
      workDir,
      files,
    ));
  } else if (prefDocument) {
    settings = await readPrefDocument(
      path.join(workDir, prefDocument),
      workDir,
      files,
      options.log,
    );
  } else {
    throw packageError(
      `Preference package ${archivePath} has no settings.ini or .pref document`,
    );
  }

  options.log?.info(
    { archive: archivePath, workDir, keys: Object.keys(settings) },
    "Imported preference package",
  );
  return { settings, sections, workDir, files };
}

/** Package values fill only keys the caller left unset or empty. */
export function mergePreferences(
  source: ConfigSource,
  preferences: Pick<PreferencePackage, "settings">,
): ConfigSource {
  const merged: ConfigSource = { ...source };
  for (const [key, value] of Object.entries(preferences.settings)) {
    const current = merged[key];
    if (current === undefined || current === "") merged[key] = value;
  }
  return merged;
}

export interface LoadConfigWithPreferencesOptions extends ImportPreferenceOptions {
  overrides?: ConfigSource;
}

export interface LoadedConfig {
  config: CotWireConfig;
  preferences?: PreferencePackage;
  /** Extra destinations, present when `IMPORT_OTHER_CONFIGS` is set. */
  destinations: DestinationConfig[];
}

/**
 * Every `settings.ini` section after the first becomes a destination of its
 * own. Section keys override `base`; each section must name its `COT_URL`.
 */
export function destinationsFromSections(
  base: ConfigSource,
  sections: PreferencePackage["sections"],
): DestinationConfig[] {
  return Object.entries(sections)
    .slice(1)
    .map(([name, values]) => {
      if (!values.COT_URL) {
        throw new CotWireError("E_CONFIG", `Section [${name}] does not set COT_URL`);
      }
      return { name, config: loadConfig(base, values) };
    });
}

/**
 * Validates configuration, first merging in the preference package named by
 * `PREF_PACKAGE` when one is set.
 */
export async function loadConfigWithPreferences(
  source: ConfigSource = process.env,
  options: LoadConfigWithPreferencesOptions = {},
): Promise<LoadedConfig> {
  const explicit: ConfigSource = { ...source };
  for (const [key, value] of Object.entries(options.overrides ?? {})) {
    if (value !== undefined && value !== "") explicit[key] = value;
  }
  const packagePath = explicit.PREF_PACKAGE;
  if (!packagePath) return { config: loadConfig(explicit), destinations: [] };

  const preferences = await importPreferencePackage(packagePath, options);
  const merged = mergePreferences(explicit, preferences);
  const config = loadConfig(merged);
  const destinations = config.IMPORT_OTHER_CONFIGS
    ? destinationsFromSections(merged, preferences.sections)
    : [];
  if (destinations.length > 0) {
    options.log?.info(
      { destinations: destinations.map(destination => destination.name) },
      "Imported extra destinations",
    );
  }
  return { config, preferences, destinations };
}
