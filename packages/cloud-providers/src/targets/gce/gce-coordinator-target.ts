/**
 * GCE Coordinator Target
 *
 * Provisions the single long-lived VM that runs the build farm coordinator.
 *
 * Sequence (strictly one call at a time):
 *   cloud-config render → NAT address → boot disk → instance spec
 *     → insert → poll operation → fetch instance
 */

import type { ProvisionConfig } from "@buildfarm/core";
import { BaseProvisioningTarget } from "../../base/base-provisioning-target";
import { buildCoordinatorCloudConfig } from "../../base/cloud-config-builder";
import { buildInstanceSpecification } from "./gce-instance-spec-builder";
import { machineTypeUrl, networkUrl } from "./gce-resource-urls";
import type { GceManagers } from "./gce-manager-factory";
import type { InstanceDescription } from "./managers";
import type { InstanceSpecification, OperationSnapshot } from "./types";

// ── Target Options ──────────────────────────────────────────────────────

export interface GceCoordinatorTargetOptions {
  config: ProvisionConfig;
  managers: GceManagers;
  /** Alternate cloud-config template containing the coordinator placeholder */
  cloudConfigTemplate?: string;
}

export interface ProvisionResult {
  specification: InstanceSpecification;
  operation: OperationSnapshot;
  instance: InstanceDescription;
}

// ── Target Class ────────────────────────────────────────────────────────

export class GceCoordinatorTarget extends BaseProvisioningTarget {
  private readonly config: ProvisionConfig;
  private readonly managers: GceManagers;
  private readonly cloudConfigTemplate?: string;

  constructor(options: GceCoordinatorTargetOptions) {
    super();
    this.config = options.config;
    this.managers = options.managers;
    this.cloudConfigTemplate = options.cloudConfigTemplate;
  }

  /**
   * Create the coordinator instance and wait for it to come up.
   * Any failure aborts the run; nothing created so far is rolled back.
   */
  async provision(): Promise<ProvisionResult> {
    const { config, managers } = this;
    const { instanceName } = config;

    this.log(`Provisioning ${instanceName} in ${config.projectId}/${config.zone}`);

    // Must fail before any API call
    this.log(`[1/5] Rendering cloud-config for ${config.coordinatorUrl}`);
    const userData = buildCoordinatorCloudConfig({
      coordinatorUrl: config.coordinatorUrl,
      sshPublicKeys: config.sshPublicKeys,
      template: this.cloudConfigTemplate,
    });

    this.log(`[2/5] Resolving external IP`);
    const address = await managers.addressManager.resolveNatAddress(
      config.staticIp,
      instanceName
    );

    this.log(`[3/5] Resolving boot disk`);
    const disk = await managers.diskManager.resolveBootDisk({
      instanceName,
      reuse: config.reuseDisk,
      ssd: config.ssd,
      sizeGb: config.diskSizeGb,
    });

    const specification = buildInstanceSpecification({
      name: instanceName,
      machineType: machineTypeUrl(config.projectId, config.zone, config.machineType),
      network: networkUrl(config.projectId),
      disk,
      address,
      userData,
      serviceAccountScopes: config.serviceAccountScopes,
    });

    this.log(`[4/5] Creating instance ${instanceName}`);
    const operationName = await managers.instanceManager.insertInstance(specification);

    this.log(`[5/5] Waiting on operation ${operationName}`);
    const operation = await managers.operationManager.waitForOperation(operationName, {
      pollIntervalMs: config.pollIntervalMs,
      timeoutMs: config.operationTimeoutMs,
      description: `create ${instanceName}`,
    });
    this.log(`Success. ${operationName}`);

    const instance = await managers.instanceManager.getInstance(instanceName);
    this.log(`Instance: ${JSON.stringify(instance, null, 4)}`);

    return { specification, operation, instance };
  }
}
