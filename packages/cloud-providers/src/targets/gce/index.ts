export { GceCoordinatorTarget } from "./gce-coordinator-target";
export type { GceCoordinatorTargetOptions, ProvisionResult } from "./gce-coordinator-target";
export { GceManagerFactory } from "./gce-manager-factory";
export type { GceManagerFactoryConfig, GceManagers } from "./gce-manager-factory";
export { buildInstanceSpecification, toInstanceResource } from "./gce-instance-spec-builder";
export type { InstanceSpecificationInput } from "./gce-instance-spec-builder";
export { diskTypeUrl, machineTypeUrl, networkUrl, projectUrl } from "./gce-resource-urls";
export { UNASSIGNED_ADDRESS, classifyOperation } from "./types";
export type {
  AttachDiskDescriptor,
  CreateDiskDescriptor,
  DiskDescriptor,
  GceLogCallback,
  InstanceSpecification,
  MetadataItem,
  NetworkAddress,
  OperationSnapshot,
  OperationState,
  StaticNetworkAddress,
  UnassignedNetworkAddress,
} from "./types";
export * from "./managers";
