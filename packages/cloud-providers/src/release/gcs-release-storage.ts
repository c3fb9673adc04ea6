/**
 * Cloud Storage backend for release artifacts. Objects are world-readable.
 */

import { Storage } from "@google-cloud/storage";
import type { Bucket } from "@google-cloud/storage";
import { ReleaseUploadError, describeCause } from "../errors";

export interface ReleaseStorage {
  save(objectName: string, contents: Buffer): Promise<void>;
}

export interface GcsReleaseStorageConfig {
  projectId: string;
  bucket: string;
  /** Service-account JSON key */
  keyFilename: string;
}

export class GcsReleaseStorage implements ReleaseStorage {
  constructor(private readonly bucket: Bucket) {}

  static fromConfig(config: GcsReleaseStorageConfig): GcsReleaseStorage {
    const storage = new Storage({ projectId: config.projectId, keyFilename: config.keyFilename });
    return new GcsReleaseStorage(storage.bucket(config.bucket));
  }

  async save(objectName: string, contents: Buffer): Promise<void> {
    try {
      await this.bucket.file(objectName).save(contents, {
        resumable: false,
        predefinedAcl: "publicRead",
      });
    } catch (error) {
      throw new ReleaseUploadError(
        `uploading ${objectName} to gs://${this.bucket.name}: ${describeCause(error)}`,
        { cause: error }
      );
    }
  }
}
