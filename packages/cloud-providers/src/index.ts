// Errors
export * from "./errors";

// Constants
export * from "./constants";

// Base
export { BaseProvisioningTarget } from "./base/base-provisioning-target";
export type { LogCallback } from "./base/base-provisioning-target";
export {
  COORDINATOR_CLOUD_CONFIG_TEMPLATE,
  COORDINATOR_URL_PLACEHOLDER,
  assertMetadataWithinLimit,
  buildCoordinatorCloudConfig,
  buildSshAuthorizedKeysSection,
  metadataSizeBytes,
  renderCoordinatorCloudConfig,
} from "./base/cloud-config-builder";
export type { CoordinatorCloudConfigOptions } from "./base/cloud-config-builder";

// Credentials
export * from "./auth";

// Compute Engine coordinator target
export * from "./targets/gce";

// Release artifacts
export * from "./release";
