/**
 * GCE Disk Manager Interface
 *
 * Decides between reattaching the coordinator's persistent boot disk and
 * initializing a fresh one.
 */

import type { DiskDescriptor } from "../../types";

export interface BootDiskRequest {
  /** Instance name; the disk is "<instanceName>-coreos-stateless-pd" */
  instanceName: string;
  /** Look for and reattach an existing disk */
  reuse: boolean;
  /** Use a pd-ssd disk type for a fresh disk */
  ssd: boolean;
  /** Size of a fresh disk */
  sizeGb: number;
  /** Image for a fresh disk. Default: CoreOS stable */
  sourceImage?: string;
}

export interface IGceDiskManager {
  /**
   * Resolve the boot disk descriptor.
   * A listing failure while reuse is requested is fatal.
   */
  resolveBootDisk(request: BootDiskRequest): Promise<DiskDescriptor>;
}
