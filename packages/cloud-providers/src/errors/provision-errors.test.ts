import {
  ProvisionError,
  ProvisionErrorCode,
  CredentialError,
  ConfigTooLargeError,
  OperationError,
  OperationPollError,
  OperationTimeoutError,
  UnknownOperationStateError,
  describeCause,
  formatOperationErrorDetail,
  systemErrorCode,
} from "./provision-errors";

describe("ProvisionError", () => {
  it("extends Error", () => {
    const error = new ProvisionError("boom", ProvisionErrorCode.SUBMISSION);
    expect(error).toBeInstanceOf(Error);
    expect(error).toBeInstanceOf(ProvisionError);
  });

  it("stores code, cause and suggestions", () => {
    const cause = new Error("root cause");
    const error = new ProvisionError("boom", ProvisionErrorCode.RESOLUTION, {
      cause,
      suggestions: ["try again"],
    });
    expect(error.code).toBe(ProvisionErrorCode.RESOLUTION);
    expect(error.cause).toBe(cause);
    expect(error.suggestions).toEqual(["try again"]);
  });

  it("defaults suggestions to an empty list", () => {
    expect(new ProvisionError("boom", ProvisionErrorCode.SUBMISSION).suggestions).toEqual([]);
  });
});

describe("CredentialError", () => {
  it("extends ProvisionError with the credential code", () => {
    const error = new CredentialError("no token");
    expect(error).toBeInstanceOf(ProvisionError);
    expect(error.name).toBe("CredentialError");
    expect(error.code).toBe(ProvisionErrorCode.CREDENTIAL);
  });
});

describe("ConfigTooLargeError", () => {
  it("reports the size and the limit", () => {
    const error = new ConfigTooLargeError(40000, 32768);
    expect(error.message).toBe("cloud config length of 40000 bytes is over 32768 byte limit");
    expect(error.sizeBytes).toBe(40000);
    expect(error.limitBytes).toBe(32768);
    expect(error.code).toBe(ProvisionErrorCode.CONFIG_TOO_LARGE);
  });
});

describe("OperationError", () => {
  it("surfaces every contained error", () => {
    const error = new OperationError("op-123", [
      { code: "QUOTA_EXCEEDED", message: "CPUS quota" },
      { code: "RESOURCE_IN_USE", location: "disk" },
    ]);
    expect(error.errors).toHaveLength(2);
    expect(error.message).toBe(
      "Operation op-123 finished with 2 error(s): {code=QUOTA_EXCEEDED message=CPUS quota}; {code=RESOURCE_IN_USE location=disk}"
    );
  });
});

describe("UnknownOperationStateError", () => {
  it("quotes the unexpected status", () => {
    const error = new UnknownOperationStateError("op-9", "ABORTING");
    expect(error.message).toBe('Unknown status "ABORTING" for operation op-9');
    expect(error.status).toBe("ABORTING");
  });
});

describe("OperationPollError", () => {
  it("names the operation and the cause", () => {
    const error = new OperationPollError("op-7", { cause: new Error("503 Service Unavailable") });
    expect(error.message).toBe("Failed to get op op-7: 503 Service Unavailable");
  });
});

describe("OperationTimeoutError", () => {
  it("reports the timeout in seconds", () => {
    expect(new OperationTimeoutError("op-1", 90_000).message).toBe(
      "Operation op-1 did not finish within 90s"
    );
  });
});

describe("formatOperationErrorDetail", () => {
  it("renders an empty detail", () => {
    expect(formatOperationErrorDetail({})).toBe("{}");
  });
});

describe("describeCause", () => {
  it("reads the message of an error-shaped object from another realm", () => {
    const foreign = { name: "Error", message: "ENOENT: no such file or directory", code: "ENOENT" };
    expect(describeCause(foreign)).toBe("ENOENT: no such file or directory");
  });

  it("stringifies values without a message", () => {
    expect(describeCause("boom")).toBe("boom");
    expect(describeCause(undefined)).toBe("unknown error");
  });
});

describe("systemErrorCode", () => {
  it("reads the code of an error-shaped object", () => {
    expect(systemErrorCode({ message: "missing", code: "ENOENT" })).toBe("ENOENT");
  });

  it("returns undefined without a string code", () => {
    expect(systemErrorCode(new Error("plain"))).toBeUndefined();
    expect(systemErrorCode({ code: 404 })).toBeUndefined();
    expect(systemErrorCode(null)).toBeUndefined();
  });
});
