/**
 * GCE Managers
 *
 * Re-exports the coordinator target's managers and their interfaces.
 */

export { GceOperationManager, systemClock, toOperationSnapshot } from "./gce-operation-manager";
export type { OperationClock, WaitOptions } from "./gce-operation-manager";
export { GceDiskManager } from "./gce-disk-manager";
export { GceAddressManager } from "./gce-address-manager";
export { GceInstanceManager, extractOperationName } from "./gce-instance-manager";

export type {
  IGceOperationManager,
  IGceDiskManager,
  BootDiskRequest,
  IGceAddressManager,
  IGceInstanceManager,
  InstanceDescription,
} from "./interfaces";
