/**
 * Release Uploader
 *
 * Stores each artifact publicly, then registers it. Files are handled one at
 * a time and the first failure stops the run.
 */

import { createHash } from "crypto";
import { readFile } from "fs/promises";
import * as path from "path";
import { ReleaseUploadError, describeCause } from "../errors";
import type { LogCallback } from "../base/base-provisioning-target";
import type { ReleaseStorage } from "./gcs-release-storage";
import { parseReleaseFilename } from "./release-file";
import type { ReleaseFile } from "./release-file";
import type { ReleaseRecord, ReleaseRegistry } from "./release-registry";

export interface ReleaseUploaderOptions {
  product: string;
  storage: ReleaseStorage;
  registry: ReleaseRegistry;
  log?: LogCallback;
}

export function sha1Hex(contents: Buffer): string {
  return createHash("sha1").update(contents).digest("hex");
}

export function toReleaseRecord(file: ReleaseFile, contents: Buffer): ReleaseRecord {
  return {
    Filename: file.fileName,
    Version: file.version,
    OS: file.os,
    Arch: file.arch,
    Checksum: sha1Hex(contents),
    Size: contents.length,
    Kind: file.kind,
  };
}

export class ReleaseUploader {
  constructor(private readonly options: ReleaseUploaderOptions) {}

  /**
   * Check every name before anything is uploaded.
   *
   * @throws ReleaseUploadError on the first unrecognized name
   */
  parseAll(filePaths: readonly string[]): ReleaseFile[] {
    return filePaths.map((filePath) =>
      parseReleaseFilename(path.basename(filePath), this.options.product)
    );
  }

  async uploadAll(filePaths: readonly string[]): Promise<ReleaseRecord[]> {
    this.parseAll(filePaths);
    const records: ReleaseRecord[] = [];
    for (const filePath of filePaths) {
      records.push(await this.upload(filePath));
    }
    return records;
  }

  async upload(filePath: string): Promise<ReleaseRecord> {
    const file = parseReleaseFilename(path.basename(filePath), this.options.product);
    this.options.log?.(`Uploading ${file.fileName}`, "stdout");

    let contents: Buffer;
    try {
      contents = await readFile(filePath);
    } catch (error) {
      throw new ReleaseUploadError(`reading ${filePath}: ${describeCause(error)}`, { cause: error });
    }

    await this.options.storage.save(file.fileName, contents);
    const record = toReleaseRecord(file, contents);
    await this.options.registry.register(record);
    return record;
  }
}
