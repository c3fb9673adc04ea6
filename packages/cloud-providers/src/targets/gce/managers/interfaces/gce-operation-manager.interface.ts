/**
 * GCE Operation Manager Interface
 *
 * Provides abstraction for waiting on zone operations.
 * Enables dependency injection for testing and modularity.
 */

import type { WaitOptions } from "../gce-operation-manager";
import type { OperationSnapshot } from "../../types";

/**
 * Interface for polling GCE zone operations to a terminal state.
 */
export interface IGceOperationManager {
  /**
   * Wait for a zone operation to finish successfully.
   *
   * @param operationName - Name returned by the submitting call
   * @returns The final DONE snapshot
   */
  waitForOperation(operationName: string, options?: WaitOptions): Promise<OperationSnapshot>;
}
