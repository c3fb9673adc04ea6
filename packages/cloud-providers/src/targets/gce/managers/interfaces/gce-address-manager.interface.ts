/**
 * GCE Address Manager Interface
 *
 * Resolves the external NAT IP for the coordinator VM.
 */

import type { NetworkAddress } from "../../types";

export interface IGceAddressManager {
  /**
   * Explicit IP → reserved "<instanceName>-ip" address → unassigned.
   *
   * @param explicitIp - Operator-supplied IP, returned unchanged when non-empty
   */
  resolveNatAddress(explicitIp: string | undefined, instanceName: string): Promise<NetworkAddress>;
}
