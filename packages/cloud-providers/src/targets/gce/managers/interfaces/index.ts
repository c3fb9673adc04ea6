/**
 * GCE Manager Interfaces
 *
 * Re-exports all manager interfaces for dependency injection and testing.
 */

export type { IGceOperationManager } from "./gce-operation-manager.interface";
export type { IGceDiskManager, BootDiskRequest } from "./gce-disk-manager.interface";
export type { IGceAddressManager } from "./gce-address-manager.interface";
export type { IGceInstanceManager, InstanceDescription } from "./gce-instance-manager.interface";
