/**
 * GCE Manager Factory
 *
 * Creates and wires up the coordinator target's managers.
 */

import {
  AddressesClient,
  DisksClient,
  InstancesClient,
  ZoneOperationsClient,
} from "@google-cloud/compute";
import type { GoogleAuth } from "google-auth-library";

import {
  GceAddressManager,
  GceDiskManager,
  GceInstanceManager,
  GceOperationManager,
} from "./managers";
import type {
  IGceAddressManager,
  IGceDiskManager,
  IGceInstanceManager,
  IGceOperationManager,
  OperationClock,
} from "./managers";
import type { GceLogCallback } from "./types";

/**
 * Configuration for the GCE manager factory.
 */
export interface GceManagerFactoryConfig {
  /** GCP project ID */
  projectId: string;
  /** GCE zone (e.g., "us-central1-f") */
  zone: string;
  /** Authorization from the credential provider */
  auth: GoogleAuth;
  /** Log callback function */
  log: GceLogCallback;
  /** Time source for operation polling */
  clock?: OperationClock;
}

/**
 * Collection of all GCE managers.
 */
export interface GceManagers {
  /** Polls zone operations to completion */
  operationManager: IGceOperationManager;
  /** Boot disk reuse or creation */
  diskManager: IGceDiskManager;
  /** External NAT IP resolution */
  addressManager: IGceAddressManager;
  /** Instance create and fetch */
  instanceManager: IGceInstanceManager;
}

/**
 * Factory class for creating GCE managers with proper wiring.
 */
export class GceManagerFactory {
  /**
   * Create all GCE managers sharing one authorization.
   */
  static createManagers(config: GceManagerFactoryConfig): GceManagers {
    const { projectId, zone, auth, log, clock } = config;

    const clientOptions = { auth };

    // SDK clients
    const disksClient = new DisksClient(clientOptions);
    const addressesClient = new AddressesClient(clientOptions);
    const instancesClient = new InstancesClient(clientOptions);
    const zoneOperationsClient = new ZoneOperationsClient(clientOptions);

    return {
      operationManager: new GceOperationManager(zoneOperationsClient, projectId, zone, log, clock),
      diskManager: new GceDiskManager(disksClient, projectId, zone, log),
      addressManager: new GceAddressManager(addressesClient, projectId, log),
      instanceManager: new GceInstanceManager(instancesClient, projectId, zone, log),
    };
  }
}
