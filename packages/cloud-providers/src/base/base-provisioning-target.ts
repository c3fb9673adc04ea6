/**
 * Base Provisioning Target
 *
 * Abstract base class for provisioning targets that provides log routing.
 */

export type LogCallback = (line: string, stream: "stdout" | "stderr") => void;

/**
 * Abstract base class for provisioning targets.
 */
export abstract class BaseProvisioningTarget {
  protected logCallback?: LogCallback;

  /**
   * Set a callback to receive log output during operations.
   */
  setLogCallback(cb: LogCallback): void {
    this.logCallback = cb;
  }

  /**
   * Emit a log line to the registered callback.
   */
  protected log(message: string, stream: "stdout" | "stderr" = "stdout"): void {
    if (this.logCallback) {
      this.logCallback(message, stream);
    }
  }
}
