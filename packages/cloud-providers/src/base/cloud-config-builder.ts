/**
 * Cloud-Config Builder
 *
 * Renders the CoreOS cloud-config delivered to the coordinator VM as its
 * "user-data" metadata value. The unit downloads the coordinator binary at
 * boot and restarts it forever.
 */

import { MAX_METADATA_VALUE_BYTES } from "../constants/defaults";
import { ConfigTooLargeError } from "../errors";

/** Replaced (first occurrence only) with the coordinator binary URL */
export const COORDINATOR_URL_PLACEHOLDER = "$COORDINATOR";

export const COORDINATOR_CLOUD_CONFIG_TEMPLATE = `#cloud-config
coreos:
  update:
    group: stable
    reboot-strategy: off
  units:
    - name: buildfarm-coordinator.service
      command: start
      content: |
        [Unit]
        Description=Build Farm Coordinator
        After=docker.service
        Requires=docker.service

        [Service]
        ExecStartPre=/bin/bash -c 'mkdir -p /opt/bin && curl -s -o /opt/bin/coordinator.tmp ${COORDINATOR_URL_PLACEHOLDER} && install -m 0755 /opt/bin/coordinator{.tmp,}'
        ExecStart=/opt/bin/coordinator
        RestartSec=10s
        Restart=always
        StartLimitInterval=0
        Type=simple

        [Install]
        WantedBy=multi-user.target
`;

/** Configuration options for the coordinator cloud-config */
export interface CoordinatorCloudConfigOptions {
  /** URL the VM downloads the coordinator binary from */
  coordinatorUrl: string;
  /** OpenSSH public keys to authorize for the "core" user */
  sshPublicKeys?: readonly string[];
  /** Alternate template; must contain the coordinator placeholder */
  template?: string;
}

/**
 * Builds the ssh_authorized_keys section appended after the template.
 */
export function buildSshAuthorizedKeysSection(keys: readonly string[]): string {
  const entries = keys.map((key) => `    - ${key.trim()}\n`).join("");
  return `\nssh_authorized_keys:\n${entries}`;
}

/**
 * Renders the cloud-config without enforcing the size limit.
 */
export function renderCoordinatorCloudConfig(options: CoordinatorCloudConfigOptions): string {
  const template = options.template ?? COORDINATOR_CLOUD_CONFIG_TEMPLATE;
  // Function replacement keeps "$" sequences in the URL literal.
  let cloudConfig = template.replace(COORDINATOR_URL_PLACEHOLDER, () => options.coordinatorUrl);

  const keys = options.sshPublicKeys ?? [];
  if (keys.length > 0) {
    cloudConfig += buildSshAuthorizedKeysSection(keys);
  }
  return cloudConfig;
}

export function metadataSizeBytes(value: string): number {
  return Buffer.byteLength(value, "utf8");
}

/**
 * Throws ConfigTooLargeError when a metadata value would be rejected by the API.
 */
export function assertMetadataWithinLimit(
  value: string,
  limitBytes: number = MAX_METADATA_VALUE_BYTES
): void {
  const size = metadataSizeBytes(value);
  if (size > limitBytes) {
    throw new ConfigTooLargeError(size, limitBytes);
  }
}

/**
 * Renders the cloud-config and enforces the metadata size limit.
 */
export function buildCoordinatorCloudConfig(options: CoordinatorCloudConfigOptions): string {
  const cloudConfig = renderCoordinatorCloudConfig(options);
  assertMetadataWithinLimit(cloudConfig);
  return cloudConfig;
}
