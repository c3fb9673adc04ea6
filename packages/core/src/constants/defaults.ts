/**
 * Default values for coordinator provisioning.
 * Every value here can be overridden through the CLI or a config file.
 */

// Compute Engine placement
export const DEFAULT_ZONE = "us-central1-f";
export const DEFAULT_MACHINE_TYPE = "n1-standard-4";
export const DEFAULT_INSTANCE_NAME = "farmer";

// Boot disk
export const DEFAULT_DISK_SIZE_GB = 50;
export const DEFAULT_REUSE_DISK = true;
export const DEFAULT_USE_SSD = true;

// Operation polling
export const DEFAULT_POLL_INTERVAL_MS = 2_000;

// Credential files live next to the invocation unless told otherwise
export const DEFAULT_CREDENTIALS_DIR = ".";

// OAuth scopes
export const SCOPE_DEVSTORAGE_FULL_CONTROL = "https://www.googleapis.com/auth/devstorage.full_control";
export const SCOPE_COMPUTE = "https://www.googleapis.com/auth/compute";
export const SCOPE_CLOUD_PLATFORM = "https://www.googleapis.com/auth/cloud-platform";
export const SCOPE_SQLSERVICE = "https://www.googleapis.com/auth/sqlservice";
export const SCOPE_SQLSERVICE_ADMIN = "https://www.googleapis.com/auth/sqlservice.admin";

/** Scopes granted to the coordinator VM's default service account. */
export const DEFAULT_SERVICE_ACCOUNT_SCOPES: readonly string[] = [
  SCOPE_DEVSTORAGE_FULL_CONTROL,
  SCOPE_COMPUTE,
  SCOPE_CLOUD_PLATFORM,
];

/** Scopes requested from the operator during the OAuth exchange. */
export const OPERATOR_OAUTH_SCOPES: readonly string[] = [
  SCOPE_DEVSTORAGE_FULL_CONTROL,
  SCOPE_COMPUTE,
  SCOPE_CLOUD_PLATFORM,
  SCOPE_SQLSERVICE,
  SCOPE_SQLSERVICE_ADMIN,
];
