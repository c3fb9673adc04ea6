/**
 * Provisioning error taxonomy.
 *
 * Every error here is terminal for the run: there is no partial success and no
 * local recovery. Each carries enough context (the failing call, the
 * unexpected value) to diagnose without re-running.
 */

export enum ProvisionErrorCode {
  CREDENTIAL = "CREDENTIAL",
  RESOLUTION = "RESOLUTION",
  CONFIG_TOO_LARGE = "CONFIG_TOO_LARGE",
  SUBMISSION = "SUBMISSION",
  OPERATION_FAILED = "OPERATION_FAILED",
  UNKNOWN_OPERATION_STATE = "UNKNOWN_OPERATION_STATE",
  OPERATION_POLL = "OPERATION_POLL",
  OPERATION_TIMEOUT = "OPERATION_TIMEOUT",
  INSTANCE_LOOKUP = "INSTANCE_LOOKUP",
  RELEASE_UPLOAD = "RELEASE_UPLOAD",
}

export interface ProvisionErrorOptions {
  cause?: unknown;
  suggestions?: string[];
}

/**
 * Structured error for provisioning operations
 */
export class ProvisionError extends Error {
  public readonly suggestions: string[];

  constructor(
    message: string,
    public readonly code: ProvisionErrorCode,
    options: ProvisionErrorOptions = {}
  ) {
    super(message, { cause: options.cause });
    this.name = "ProvisionError";
    this.suggestions = options.suggestions ?? [];
  }
}

/** Token discovery, exchange, or cache I/O failed. */
export class CredentialError extends ProvisionError {
  constructor(message: string, options?: ProvisionErrorOptions) {
    super(message, ProvisionErrorCode.CREDENTIAL, options);
    this.name = "CredentialError";
  }
}

/** A disk or address listing call failed. */
export class ResolutionError extends ProvisionError {
  constructor(message: string, options?: ProvisionErrorOptions) {
    super(message, ProvisionErrorCode.RESOLUTION, options);
    this.name = "ResolutionError";
  }
}

/** The rendered startup metadata exceeds the provider's value size limit. */
export class ConfigTooLargeError extends ProvisionError {
  constructor(
    public readonly sizeBytes: number,
    public readonly limitBytes: number
  ) {
    super(
      `cloud config length of ${sizeBytes} bytes is over ${limitBytes} byte limit`,
      ProvisionErrorCode.CONFIG_TOO_LARGE,
      { suggestions: ["Remove SSH keys or shorten the cloud-config template"] }
    );
    this.name = "ConfigTooLargeError";
  }
}

/** The create-instance call itself was rejected. */
export class SubmissionError extends ProvisionError {
  constructor(message: string, options?: ProvisionErrorOptions) {
    super(message, ProvisionErrorCode.SUBMISSION, options);
    this.name = "SubmissionError";
  }
}

/** One entry of an operation's error list. */
export interface OperationErrorDetail {
  code?: string;
  message?: string;
  location?: string;
}

/** The asynchronous operation completed with one or more reported errors. */
export class OperationError extends ProvisionError {
  constructor(
    public readonly operationName: string,
    public readonly errors: OperationErrorDetail[]
  ) {
    super(
      `Operation ${operationName} finished with ${errors.length} error(s): ${errors
        .map(formatOperationErrorDetail)
        .join("; ")}`,
      ProvisionErrorCode.OPERATION_FAILED
    );
    this.name = "OperationError";
  }
}

/** The operation reported a status outside PENDING, RUNNING, DONE. */
export class UnknownOperationStateError extends ProvisionError {
  constructor(
    public readonly operationName: string,
    public readonly status: string
  ) {
    super(
      `Unknown status ${JSON.stringify(status)} for operation ${operationName}`,
      ProvisionErrorCode.UNKNOWN_OPERATION_STATE
    );
    this.name = "UnknownOperationStateError";
  }
}

/** Fetching the operation's status failed. */
export class OperationPollError extends ProvisionError {
  constructor(
    public readonly operationName: string,
    options?: ProvisionErrorOptions
  ) {
    super(
      `Failed to get op ${operationName}: ${describeCause(options?.cause)}`,
      ProvisionErrorCode.OPERATION_POLL,
      options
    );
    this.name = "OperationPollError";
  }
}

/** Polling exceeded the configured timeout. */
export class OperationTimeoutError extends ProvisionError {
  constructor(
    public readonly operationName: string,
    public readonly timeoutMs: number
  ) {
    super(
      `Operation ${operationName} did not finish within ${timeoutMs / 1000}s`,
      ProvisionErrorCode.OPERATION_TIMEOUT,
      { suggestions: ["Check the operation in the Cloud Console; it may still complete"] }
    );
    this.name = "OperationTimeoutError";
  }
}

/** The created instance could not be fetched for confirmation. */
export class InstanceLookupError extends ProvisionError {
  constructor(message: string, options?: ProvisionErrorOptions) {
    super(message, ProvisionErrorCode.INSTANCE_LOOKUP, options);
    this.name = "InstanceLookupError";
  }
}

/** A release artifact could not be classified, stored, or registered. */
export class ReleaseUploadError extends ProvisionError {
  constructor(message: string, options?: ProvisionErrorOptions) {
    super(message, ProvisionErrorCode.RELEASE_UPLOAD, options);
    this.name = "ReleaseUploadError";
  }
}

export function formatOperationErrorDetail(detail: OperationErrorDetail): string {
  const parts = [
    detail.code ? `code=${detail.code}` : undefined,
    detail.location ? `location=${detail.location}` : undefined,
    detail.message ? `message=${detail.message}` : undefined,
  ].filter((part): part is string => part !== undefined);
  return parts.length > 0 ? `{${parts.join(" ")}}` : "{}";
}

// Errors raised by Node's own modules can come from another realm (Jest's
// sandbox), so these read the shape rather than testing instanceof Error.

export function describeCause(cause: unknown): string {
  if (typeof cause === "object" && cause !== null && "message" in cause && typeof cause.message === "string") {
    return cause.message;
  }
  if (cause === undefined) return "unknown error";
  return String(cause);
}

/** The `code` of a system error such as ENOENT, if it has one. */
export function systemErrorCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}
