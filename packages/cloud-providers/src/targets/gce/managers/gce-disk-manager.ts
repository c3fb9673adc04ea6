/**
 * GCE Disk Manager
 *
 * Resolves the coordinator's boot disk: reattach the persistent disk from a
 * previous incarnation, or describe a fresh one initialized from CoreOS.
 */

import type { DisksClient } from "@google-cloud/compute";
import {
  BOOT_DISK_NAME_SUFFIX,
  COREOS_STABLE_IMAGE_URL,
  SSD_DISK_TYPE,
} from "../../../constants";
import { ResolutionError, describeCause } from "../../../errors";
import { diskTypeUrl } from "../gce-resource-urls";
import type { DiskDescriptor, GceLogCallback } from "../types";
import type { BootDiskRequest, IGceDiskManager } from "./interfaces";

export class GceDiskManager implements IGceDiskManager {
  constructor(
    private readonly disksClient: DisksClient,
    private readonly project: string,
    private readonly zone: string,
    private readonly log: GceLogCallback
  ) {}

  async resolveBootDisk(request: BootDiskRequest): Promise<DiskDescriptor> {
    const diskName = `${request.instanceName}${BOOT_DISK_NAME_SUFFIX}`;

    if (request.reuse) {
      const source = await this.findDiskSelfLink(diskName);
      if (source) {
        this.log(`Reusing existing disk ${diskName}`, "stdout");
        return { kind: "attach", diskName, source, autoDelete: false };
      }
      this.log(`No existing disk ${diskName} in ${this.zone}; creating a new one`, "stdout");
    }

    return {
      kind: "create",
      diskName,
      sourceImage: request.sourceImage ?? COREOS_STABLE_IMAGE_URL,
      sizeGb: request.sizeGb,
      diskType: request.ssd ? diskTypeUrl(this.project, this.zone, SSD_DISK_TYPE) : "",
      autoDelete: !request.reuse,
    };
  }

  /**
   * Scan the zone's disks for an exact name match.
   *
   * @returns The disk's self link, or null when no disk has that name
   */
  private async findDiskSelfLink(diskName: string): Promise<string | null> {
    try {
      for await (const disk of this.disksClient.listAsync({
        project: this.project,
        zone: this.zone,
      })) {
        if (disk.name !== diskName) continue;
        if (!disk.selfLink) {
          throw new ResolutionError(`Disk ${diskName} in ${this.zone} has no self link`);
        }
        return disk.selfLink;
      }
      return null;
    } catch (error) {
      if (error instanceof ResolutionError) throw error;
      throw new ResolutionError(
        `Error listing disks in ${this.project}/${this.zone}: ${describeCause(error)}`,
        {
          cause: error,
          suggestions: [
            "Check that the Compute Engine API is enabled for the project",
            "Pass --no-reuse-disk to skip the lookup and create a fresh disk",
          ],
        }
      );
    }
  }
}
