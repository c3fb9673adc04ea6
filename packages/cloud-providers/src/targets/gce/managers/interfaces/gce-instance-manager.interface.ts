/**
 * GCE Instance Manager Interface
 */

import type { protos } from "@google-cloud/compute";
import type { InstanceSpecification } from "../../types";

export type InstanceDescription = protos.google.cloud.compute.v1.IInstance;

export interface IGceInstanceManager {
  /** Submit the create request. Returns the zone operation name. */
  insertInstance(spec: InstanceSpecification): Promise<string>;
  /** Fetch the full instance description. */
  getInstance(name: string): Promise<InstanceDescription>;
}
