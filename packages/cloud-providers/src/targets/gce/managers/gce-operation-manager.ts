/**
 * GCE Operation Manager
 *
 * Polls a zone operation to a terminal state. Every fetch is preceded by a
 * fixed-interval sleep; there is no backoff.
 */

import type { protos, ZoneOperationsClient } from "@google-cloud/compute";
import { DEFAULT_POLL_INTERVAL_MS } from "@buildfarm/core";
import {
  OperationError,
  OperationPollError,
  OperationTimeoutError,
  UnknownOperationStateError,
  formatOperationErrorDetail,
} from "../../../errors";
import { classifyOperation } from "../types";
import type { GceLogCallback, OperationSnapshot } from "../types";
import type { IGceOperationManager } from "./interfaces";

export interface WaitOptions {
  /** Give up after this many milliseconds. Default: wait indefinitely */
  timeoutMs?: number;
  /** Polling interval in milliseconds */
  pollIntervalMs?: number;
  /** Human-readable description for logging */
  description?: string;
}

/**
 * Time source for the poller. Tests substitute one that never really sleeps.
 */
export interface OperationClock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: OperationClock = {
  now: () => Date.now(),
  sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
};

/**
 * Manages GCE zone operation polling.
 */
export class GceOperationManager implements IGceOperationManager {
  constructor(
    private readonly zoneOpsClient: ZoneOperationsClient,
    private readonly project: string,
    private readonly zone: string,
    private readonly log: GceLogCallback,
    private readonly clock: OperationClock = systemClock
  ) {}

  /**
   * Wait for a zone operation to finish.
   *
   * @throws OperationError when the operation finishes with errors
   * @throws UnknownOperationStateError on a status outside PENDING, RUNNING, DONE
   * @throws OperationPollError when a status fetch fails
   * @throws OperationTimeoutError when `timeoutMs` elapses first
   */
  async waitForOperation(
    operationName: string,
    options: WaitOptions = {}
  ): Promise<OperationSnapshot> {
    const {
      timeoutMs,
      pollIntervalMs = DEFAULT_POLL_INTERVAL_MS,
      description = operationName,
    } = options;

    let lastStatus = "";
    const start = this.clock.now();

    for (;;) {
      await this.clock.sleep(pollIntervalMs);
      const snapshot = await this.getOperation(operationName);
      const elapsedMs = this.clock.now() - start;

      if (snapshot.status !== lastStatus) {
        const progress = snapshot.progress ?? 0;
        this.log(
          `  [${description}] ${snapshot.status}${progress > 0 ? ` (${progress}%)` : ""} - ${Math.round(elapsedMs / 1000)}s elapsed`,
          "stdout"
        );
        lastStatus = snapshot.status;
      }

      const state = classifyOperation(snapshot);
      switch (state.status) {
        case "PENDING":
        case "RUNNING":
          break;
        case "DONE":
          if (state.errors.length > 0) {
            for (const detail of state.errors) {
              this.log(`  [${description}] Error: ${formatOperationErrorDetail(detail)}`, "stderr");
            }
            throw new OperationError(operationName, state.errors);
          }
          return snapshot;
        case "UNRECOGNIZED":
          this.log(`  [${description}] Unknown status ${JSON.stringify(state.raw)}`, "stderr");
          throw new UnknownOperationStateError(operationName, state.raw);
      }

      if (timeoutMs !== undefined && elapsedMs >= timeoutMs) {
        this.log(`  [${description}] TIMEOUT after ${timeoutMs / 1000}s`, "stderr");
        throw new OperationTimeoutError(operationName, timeoutMs);
      }
    }
  }

  private async getOperation(operationName: string): Promise<OperationSnapshot> {
    let result: protos.google.cloud.compute.v1.IOperation;
    try {
      [result] = await this.zoneOpsClient.get({
        project: this.project,
        zone: this.zone,
        operation: operationName,
      });
    } catch (error) {
      throw new OperationPollError(operationName, { cause: error });
    }
    return toOperationSnapshot(operationName, result);
  }
}

export function toOperationSnapshot(
  operationName: string,
  result: protos.google.cloud.compute.v1.IOperation
): OperationSnapshot {
  return {
    name: result.name ?? operationName,
    status: result.status == null ? "" : String(result.status),
    errors: (result.error?.errors ?? []).map((entry) => ({
      code: entry.code ?? undefined,
      message: entry.message ?? undefined,
      location: entry.location ?? undefined,
    })),
    progress: typeof result.progress === "number" ? result.progress : undefined,
  };
}
