export { classifyRelease, parseReleaseFilename, releaseFilePattern } from "./release-file";
export type { ReleaseFile, ReleaseKind } from "./release-file";
export { HttpReleaseRegistry } from "./release-registry";
export type { HttpReleaseRegistryOptions, ReleaseRecord, ReleaseRegistry } from "./release-registry";
export { GcsReleaseStorage } from "./gcs-release-storage";
export type { GcsReleaseStorageConfig, ReleaseStorage } from "./gcs-release-storage";
export { ReleaseUploader, sha1Hex, toReleaseRecord } from "./release-uploader";
export type { ReleaseUploaderOptions } from "./release-uploader";
