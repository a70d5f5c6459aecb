/**
 * Data packages: the zip archives TAK clients import, with a
 * `MANIFEST/manifest.xml` listing every entry. The reading side lives in
 * `preferences.ts`; this module writes them.
 */

import AdmZip from "adm-zip";
import { XMLBuilder } from "fast-xml-parser";
import { randomUUID } from "node:crypto";
import { existsSync, readFileSync, statSync } from "node:fs";
import { readdir } from "node:fs/promises";
import path from "node:path";
import type { Logger } from "pino";
import { XML_DECLARATION } from "./constants";
import { CotWireError } from "./errors";

export const MANIFEST_ENTRY = "MANIFEST/manifest.xml";

export interface DataPackageContent {
  /** Absolute path of the source file. */
  path: string;
  /** Name inside the archive, always with forward slashes. */
  entryName: string;
  ignore: boolean;
}

export interface DataPackageOptions {
  uid?: string;
  /** Ask receivers to delete the package after importing it. */
  onReceiveDelete?: boolean;
  log?: Logger;
}

export interface AddFileOptions {
  ignore?: boolean;
  /** Defaults to the file's basename. */
  entryName?: string;
}

export interface AddDirectoryOptions {
  recursive?: boolean;
  /** Files whose relative path contains this text are skipped. */
  ignorePattern?: string;
}

export interface CreatePackageOptions {
  /** Use the `.dpk` extension instead of `.zip`. */
  dpk?: boolean;
  includeManifest?: boolean;
}

const builder = new XMLBuilder({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  suppressEmptyNode: true,
  format: true,
  indentBy: "  ",
});

const packageError = (message: string, cause?: unknown) =>
  new CotWireError("E_PACKAGE", message, { cause });

const toEntryName = (name: string) => name.split(path.sep).join("/").replace(/\\/g, "/");

export class DataPackage {
  readonly name: string;
  readonly uid: string;
  readonly onReceiveDelete: boolean;
  private readonly entries: DataPackageContent[] = [];
  private readonly log?: Logger;

  constructor(name: string, options: DataPackageOptions = {}) {
    this.name = name;
    this.uid = options.uid ?? randomUUID();
    this.onReceiveDelete = options.onReceiveDelete ?? false;
    this.log = options.log?.child({ component: "datapackage" });
  }

  get contents(): readonly DataPackageContent[] {
    return this.entries;
  }

  addFile(filePath: string, options: AddFileOptions = {}): DataPackageContent {
    const source = path.resolve(filePath);
    if (!existsSync(source) || !statSync(source).isFile()) {
      throw packageError(`File ${filePath} does not exist`);
    }
    const entryName = toEntryName(options.entryName ?? path.basename(source));
    if (entryName === MANIFEST_ENTRY || this.entries.some(entry => entry.entryName === entryName)) {
      throw packageError(`Data package already has an entry named ${entryName}`);
    }
    const content = { path: source, entryName, ignore: options.ignore ?? false };
    this.entries.push(content);
    return content;
  }

  /** Adds every file below `dir`, named by its path relative to `dir`. */
  async addDirectory(
    dir: string,
    options: AddDirectoryOptions = {},
  ): Promise<DataPackageContent[]> {
    const root = path.resolve(dir);
    if (!existsSync(root) || !statSync(root).isDirectory()) {
      throw packageError(`Directory ${dir} does not exist`);
    }
    const added: DataPackageContent[] = [];
    const walk = async (current: string): Promise<void> => {
      const children = await readdir(current, { withFileTypes: true });
      children.sort((a, b) => a.name.localeCompare(b.name));
      for (const child of children) {
        const full = path.join(current, child.name);
        if (child.isDirectory()) {
          if (options.recursive) await walk(full);
          continue;
        }
        if (!child.isFile()) continue;
        const relative = path.relative(root, full);
        if (options.ignorePattern && relative.includes(options.ignorePattern)) continue;
        added.push(this.addFile(full, { entryName: relative }));
      }
    };
    await walk(root);
    return added;
  }

  manifestXml(): string {
    const manifest = {
      MissionPackageManifest: {
        "@_version": "2",
        Configuration: {
          Parameter: [
            { "@_name": "uid", "@_value": this.uid },
            { "@_name": "name", "@_value": this.name },
            { "@_name": "onReceiveDelete", "@_value": String(this.onReceiveDelete) },
          ],
        },
        Contents: {
          Content: this.entries.map(entry => ({
            "@_ignore": String(entry.ignore),
            "@_zipEntry": entry.entryName,
          })),
        },
      },
    };
    return `${XML_DECLARATION}\n${String(builder.build(manifest))}`;
  }

  /**
   * Writes the archive and returns its path. The extension is forced to
   * `.zip` (or `.dpk`).
   */
  createPackage(outputPath: string, options: CreatePackageOptions = {}): string {
    if (this.entries.length === 0) {
      throw packageError(`Data package ${this.name} has no files`);
    }
    const extension = options.dpk ? ".dpk" : ".zip";
    const parsed = path.parse(outputPath);
    const target =
      parsed.ext.toLowerCase() === extension
        ? outputPath
        : path.join(parsed.dir, `${parsed.name}${extension}`);

    const zip = new AdmZip();
    for (const entry of this.entries) {
      zip.addFile(entry.entryName, readFileSync(entry.path));
    }
    if (options.includeManifest ?? true) {
      zip.addFile(MANIFEST_ENTRY, Buffer.from(this.manifestXml(), "utf8"));
    }
    try {
      zip.writeZip(target);
    } catch (err) {
      throw packageError(`Cannot write data package ${target}`, err);
    }
    this.log?.info(
      { target, uid: this.uid, files: this.entries.length },
      "Created data package",
    );
    return target;
  }
}
