/**
 * GCE Instance Manager
 *
 * Submits the coordinator's create request and fetches the resulting instance.
 */

import type { InstancesClient } from "@google-cloud/compute";
import { InstanceLookupError, SubmissionError, describeCause } from "../../../errors";
import { toInstanceResource } from "../gce-instance-spec-builder";
import type { GceLogCallback, InstanceSpecification } from "../types";
import type { IGceInstanceManager, InstanceDescription } from "./interfaces";

export class GceInstanceManager implements IGceInstanceManager {
  constructor(
    private readonly instancesClient: InstancesClient,
    private readonly project: string,
    private readonly zone: string,
    private readonly log: GceLogCallback
  ) {}

  async insertInstance(spec: InstanceSpecification): Promise<string> {
    this.log(`Creating instance ${spec.name} in ${this.project}/${this.zone}...`, "stdout");

    let response: unknown;
    try {
      [response] = await this.instancesClient.insert({
        project: this.project,
        zone: this.zone,
        instanceResource: toInstanceResource(spec),
      });
    } catch (error) {
      throw new SubmissionError(`Failed to create instance ${spec.name}: ${describeCause(error)}`, {
        cause: error,
        suggestions: [
          "An instance with this name may already exist; delete it or pick another --instance-name",
        ],
      });
    }

    const operationName = extractOperationName(response);
    if (!operationName) {
      throw new SubmissionError(`Create request for ${spec.name} returned no operation name`);
    }
    this.log(`Created. Waiting on operation ${operationName}`, "stdout");
    return operationName;
  }

  async getInstance(name: string): Promise<InstanceDescription> {
    try {
      const [instance] = await this.instancesClient.get({
        project: this.project,
        zone: this.zone,
        instance: name,
      });
      return instance;
    } catch (error) {
      throw new InstanceLookupError(
        `Error getting instance ${name} after creation: ${describeCause(error)}`,
        { cause: error }
      );
    }
  }
}

/**
 * Operation name from an insert response. The client returns either the
 * operation itself or an LRO wrapper exposing it as `latestResponse`.
 */
export function extractOperationName(response: unknown): string | undefined {
  if (typeof response !== "object" || response === null) return undefined;
  if ("name" in response && typeof response.name === "string" && response.name) {
    return response.name.split("/").pop();
  }
  if ("latestResponse" in response) {
    return extractOperationName(response.latestResponse);
  }
  return undefined;
}
