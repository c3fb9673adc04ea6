/**
 * Default values for the Compute Engine coordinator target.
 */

// Compute API resource URLs
export const COMPUTE_API_BASE_URL = "https://www.googleapis.com/compute/v1/projects/";

// Boot image and disk
export const COREOS_STABLE_IMAGE_URL =
  "https://www.googleapis.com/compute/v1/projects/coreos-cloud/global/images/coreos-stable-723-3-0-v20150804";
export const BOOT_DISK_NAME_SUFFIX = "-coreos-stateless-pd";
export const SSD_DISK_TYPE = "pd-ssd";

// Networking
export const RESERVED_ADDRESS_NAME_SUFFIX = "-ip";
export const RESERVED_ADDRESS_STATUS = "RESERVED";
export const DEFAULT_NETWORK_NAME = "default";
export const NAT_ACCESS_CONFIG_TYPE = "ONE_TO_ONE_NAT";
export const NAT_ACCESS_CONFIG_NAME = "External NAT";

// Instance
export const COORDINATOR_INSTANCE_DESCRIPTION = "Build farm coordinator";
export const COORDINATOR_NETWORK_TAGS: readonly string[] = ["http-server", "https-server", "allow-ssh"];
export const DEFAULT_SERVICE_ACCOUNT_EMAIL = "default";
export const USER_DATA_METADATA_KEY = "user-data";

/** Compute Engine rejects metadata values above 32 KiB. */
export const MAX_METADATA_VALUE_BYTES = 32 << 10;
