/**
 * Instance Specification Builder
 *
 * Assembles the frozen InstanceSpecification for the coordinator VM and maps
 * it onto the Compute API's Instance resource.
 */

import type { protos } from "@google-cloud/compute";
import {
  COORDINATOR_INSTANCE_DESCRIPTION,
  COORDINATOR_NETWORK_TAGS,
  DEFAULT_SERVICE_ACCOUNT_EMAIL,
  NAT_ACCESS_CONFIG_NAME,
  NAT_ACCESS_CONFIG_TYPE,
  USER_DATA_METADATA_KEY,
} from "../../constants";
import { DEFAULT_SERVICE_ACCOUNT_SCOPES } from "@buildfarm/core";
import { assertMetadataWithinLimit } from "../../base/cloud-config-builder";
import type { DiskDescriptor, InstanceSpecification, NetworkAddress } from "./types";

export interface InstanceSpecificationInput {
  name: string;
  /** Full machine type URL */
  machineType: string;
  /** Full network URL */
  network: string;
  disk: DiskDescriptor;
  address: NetworkAddress;
  /** Rendered cloud-config, delivered as the "user-data" metadata value */
  userData: string;
  serviceAccountScopes?: readonly string[];
}

/**
 * Build the instance specification.
 *
 * @throws ConfigTooLargeError when the user-data exceeds the metadata limit
 */
export function buildInstanceSpecification(
  input: InstanceSpecificationInput
): InstanceSpecification {
  assertMetadataWithinLimit(input.userData);

  return Object.freeze({
    name: input.name,
    description: COORDINATOR_INSTANCE_DESCRIPTION,
    machineType: input.machineType,
    disk: Object.freeze({ ...input.disk }),
    address: Object.freeze({ ...input.address }),
    network: input.network,
    metadata: Object.freeze([
      Object.freeze({ key: USER_DATA_METADATA_KEY, value: input.userData }),
    ]),
    tags: Object.freeze([...COORDINATOR_NETWORK_TAGS]),
    serviceAccount: Object.freeze({
      email: DEFAULT_SERVICE_ACCOUNT_EMAIL,
      scopes: Object.freeze([...(input.serviceAccountScopes ?? DEFAULT_SERVICE_ACCOUNT_SCOPES)]),
    }),
  });
}

function toAttachedDisk(
  disk: DiskDescriptor
): protos.google.cloud.compute.v1.IAttachedDisk {
  switch (disk.kind) {
    case "attach":
      return {
        boot: true,
        type: "PERSISTENT",
        mode: "READ_WRITE",
        deviceName: disk.diskName,
        source: disk.source,
        autoDelete: false,
      };
    case "create":
      return {
        boot: true,
        type: "PERSISTENT",
        autoDelete: disk.autoDelete,
        initializeParams: {
          diskName: disk.diskName,
          sourceImage: disk.sourceImage,
          diskSizeGb: String(disk.sizeGb),
          ...(disk.diskType ? { diskType: disk.diskType } : {}),
        },
      };
  }
}

/**
 * Map a specification onto the insert call's instance resource.
 */
export function toInstanceResource(
  spec: InstanceSpecification
): protos.google.cloud.compute.v1.IInstance {
  return {
    name: spec.name,
    description: spec.description,
    machineType: spec.machineType,
    disks: [toAttachedDisk(spec.disk)],
    networkInterfaces: [
      {
        network: spec.network,
        accessConfigs: [
          {
            type: NAT_ACCESS_CONFIG_TYPE,
            name: NAT_ACCESS_CONFIG_NAME,
            ...(spec.address.kind === "static" ? { natIP: spec.address.ip } : {}),
          },
        ],
      },
    ],
    metadata: {
      items: spec.metadata.map((item) => ({ key: item.key, value: item.value })),
    },
    tags: { items: [...spec.tags] },
    serviceAccounts: [
      { email: spec.serviceAccount.email, scopes: [...spec.serviceAccount.scopes] },
    ],
  };
}
