/**
 * GCE Address Manager
 *
 * Picks the external NAT IP: an explicit operator IP, else a reserved
 * address named after the instance, else none.
 */

import type { AddressesClient } from "@google-cloud/compute";
import { RESERVED_ADDRESS_NAME_SUFFIX, RESERVED_ADDRESS_STATUS } from "../../../constants";
import { ResolutionError, describeCause } from "../../../errors";
import { UNASSIGNED_ADDRESS } from "../types";
import type { GceLogCallback, NetworkAddress } from "../types";
import type { IGceAddressManager } from "./interfaces";

export class GceAddressManager implements IGceAddressManager {
  constructor(
    private readonly addressesClient: AddressesClient,
    private readonly project: string,
    private readonly log: GceLogCallback
  ) {}

  async resolveNatAddress(
    explicitIp: string | undefined,
    instanceName: string
  ): Promise<NetworkAddress> {
    if (explicitIp) {
      this.log(`Using static IP ${explicitIp}`, "stdout");
      return { kind: "static", ip: explicitIp, origin: "explicit" };
    }

    const addressName = `${instanceName}${RESERVED_ADDRESS_NAME_SUFFIX}`;
    const ip = await this.findReservedAddress(addressName);
    if (ip) {
      this.log(`Using reserved address ${addressName} (${ip})`, "stdout");
      return { kind: "static", ip, origin: "reserved" };
    }

    this.log(`No reserved address ${addressName}; using an ephemeral IP`, "stdout");
    return UNASSIGNED_ADDRESS;
  }

  /**
   * First reserved address with the given name across all regions.
   * Iteration order is whatever the API returns.
   */
  private async findReservedAddress(addressName: string): Promise<string | null> {
    try {
      for await (const [, scoped] of this.addressesClient.aggregatedListAsync({
        project: this.project,
      })) {
        for (const address of scoped.addresses ?? []) {
          if (
            address.name === addressName &&
            address.status === RESERVED_ADDRESS_STATUS &&
            address.address
          ) {
            return address.address;
          }
        }
      }
      return null;
    } catch (error) {
      throw new ResolutionError(
        `Error listing addresses in ${this.project}: ${describeCause(error)}`,
        {
          cause: error,
          suggestions: ["Pass --static-ip to skip the reserved address lookup"],
        }
      );
    }
  }
}
