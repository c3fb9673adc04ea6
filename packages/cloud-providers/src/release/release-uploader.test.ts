import { mkdtemp, rm, writeFile } from "fs/promises";
import * as os from "os";
import * as path from "path";
import { GcsReleaseStorage } from "./gcs-release-storage";
import { ReleaseUploader, sha1Hex } from "./release-uploader";
import { ReleaseUploadError } from "../errors";

jest.mock("@google-cloud/storage", () => ({
  Storage: jest.fn(),
}));

// ── Test helpers ───────────────────────────────────────────────────────

function createUploader() {
  const storage = { save: jest.fn().mockResolvedValue(undefined) };
  const registry = { register: jest.fn().mockResolvedValue(undefined) };
  const log = jest.fn();
  const uploader = new ReleaseUploader({ product: "acme", storage, registry, log });
  return { uploader, storage, registry, log };
}

// ── Tests ──────────────────────────────────────────────────────────────

describe("sha1Hex", () => {
  it("hashes the contents", () => {
    expect(sha1Hex(Buffer.from("abc"))).toBe("a9993e364706816aba3e25717850c26c9cd0d89d");
  });
});

describe("ReleaseUploader", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "release-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("stores then registers each file", async () => {
    const file = path.join(dir, "acme1.5.linux-amd64.tar.gz");
    await writeFile(file, "abc");
    const { uploader, storage, registry, log } = createUploader();

    const [record] = await uploader.uploadAll([file]);

    expect(storage.save).toHaveBeenCalledWith("acme1.5.linux-amd64.tar.gz", Buffer.from("abc"));
    expect(record).toEqual({
      Filename: "acme1.5.linux-amd64.tar.gz",
      Version: "acme1.5",
      OS: "linux",
      Arch: "amd64",
      Checksum: "a9993e364706816aba3e25717850c26c9cd0d89d",
      Size: 3,
      Kind: "archive",
    });
    expect(registry.register).toHaveBeenCalledWith(record);
    expect(log).toHaveBeenCalledWith("Uploading acme1.5.linux-amd64.tar.gz", "stdout");
  });

  it("uploads nothing when any name is unrecognized", async () => {
    const good = path.join(dir, "acme1.5.src.tar.gz");
    await writeFile(good, "src");
    const { uploader, storage } = createUploader();

    await expect(uploader.uploadAll([good, path.join(dir, "readme.txt")])).rejects.toBeInstanceOf(
      ReleaseUploadError
    );
    expect(storage.save).not.toHaveBeenCalled();
  });

  it("stops at the first failing file", async () => {
    const first = path.join(dir, "acme1.5.linux-amd64.tar.gz");
    const second = path.join(dir, "acme1.5.windows-amd64.msi");
    await writeFile(first, "one");
    await writeFile(second, "two");
    const { uploader, storage, registry } = createUploader();
    registry.register.mockRejectedValueOnce(new ReleaseUploadError("upload failed: 500"));

    await expect(uploader.uploadAll([first, second])).rejects.toThrow("upload failed: 500");
    expect(storage.save).toHaveBeenCalledTimes(1);
  });

  it("fails when the file cannot be read", async () => {
    const { uploader } = createUploader();
    const missing = path.join(dir, "acme1.5.linux-amd64.tar.gz");

    await expect(uploader.upload(missing)).rejects.toThrow(`reading ${missing}`);
  });
});

describe("GcsReleaseStorage", () => {
  it("saves a public object under the given name", async () => {
    const save = jest.fn().mockResolvedValue(undefined);
    const bucket = { name: "releases", file: jest.fn().mockReturnValue({ save }) };
    const storage = new GcsReleaseStorage(bucket as never);

    await storage.save("acme1.5.src.tar.gz", Buffer.from("src"));

    expect(bucket.file).toHaveBeenCalledWith("acme1.5.src.tar.gz");
    expect(save).toHaveBeenCalledWith(Buffer.from("src"), {
      resumable: false,
      predefinedAcl: "publicRead",
    });
  });

  it("wraps storage failures", async () => {
    const save = jest.fn().mockRejectedValue(new Error("403 Forbidden"));
    const bucket = { name: "releases", file: jest.fn().mockReturnValue({ save }) };
    const storage = new GcsReleaseStorage(bucket as never);

    await expect(storage.save("acme1.5.src.tar.gz", Buffer.from("src"))).rejects.toThrow(
      "uploading acme1.5.src.tar.gz to gs://releases: 403 Forbidden"
    );
  });
});
