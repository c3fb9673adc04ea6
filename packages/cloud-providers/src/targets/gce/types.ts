/**
 * GCE Target Type Definitions
 *
 * Shared types for the coordinator target and its managers.
 */

import type { LogCallback } from "../../base/base-provisioning-target";
import type { OperationErrorDetail } from "../../errors";

/**
 * Boot disk for the coordinator VM. Exactly one variant is chosen per run.
 */
export type DiskDescriptor = AttachDiskDescriptor | CreateDiskDescriptor;

/** Reference to an existing persistent disk, attached read-write. */
export interface AttachDiskDescriptor {
  kind: "attach";
  diskName: string;
  /** Self link of the existing disk */
  source: string;
  autoDelete: false;
}

/** Specification for a fresh disk initialized from an image. */
export interface CreateDiskDescriptor {
  kind: "create";
  diskName: string;
  sourceImage: string;
  sizeGb: number;
  /** Disk type URL, or "" for the provider default */
  diskType: string;
  autoDelete: boolean;
}

/**
 * External NAT address for the VM.
 */
export type NetworkAddress = StaticNetworkAddress | UnassignedNetworkAddress;

export interface StaticNetworkAddress {
  kind: "static";
  ip: string;
  /** Where the IP came from: operator input or a reserved address lookup */
  origin: "explicit" | "reserved";
}

/** Let the provider allocate an ephemeral address. */
export interface UnassignedNetworkAddress {
  kind: "unassigned";
}

export const UNASSIGNED_ADDRESS: UnassignedNetworkAddress = Object.freeze({ kind: "unassigned" });

/** Metadata key/value pair on the instance. */
export interface MetadataItem {
  readonly key: string;
  readonly value: string;
}

/**
 * Full instance description submitted to the insert call. Frozen once built.
 */
export interface InstanceSpecification {
  readonly name: string;
  readonly description: string;
  /** Full machine type URL */
  readonly machineType: string;
  readonly disk: Readonly<DiskDescriptor>;
  readonly address: Readonly<NetworkAddress>;
  /** Full network URL */
  readonly network: string;
  readonly metadata: readonly MetadataItem[];
  readonly tags: readonly string[];
  readonly serviceAccount: {
    readonly email: string;
    readonly scopes: readonly string[];
  };
}

/**
 * One freshly fetched view of a zone operation.
 */
export interface OperationSnapshot {
  name: string;
  /** Raw status string as returned by the API */
  status: string;
  errors: OperationErrorDetail[];
  progress?: number;
}

/**
 * Closed classification of an operation snapshot.
 */
export type OperationState =
  | { status: "PENDING" }
  | { status: "RUNNING" }
  | { status: "DONE"; errors: OperationErrorDetail[] }
  | { status: "UNRECOGNIZED"; raw: string };

export function classifyOperation(snapshot: OperationSnapshot): OperationState {
  switch (snapshot.status) {
    case "PENDING":
      return { status: "PENDING" };
    case "RUNNING":
      return { status: "RUNNING" };
    case "DONE":
      return { status: "DONE", errors: snapshot.errors };
    default:
      return { status: "UNRECOGNIZED", raw: snapshot.status };
  }
}

/**
 * Type alias for log callback function.
 */
export type GceLogCallback = LogCallback;
