import fs from "fs-extra";
import { mkdtemp } from "fs/promises";
import os from "os";
import path from "path";
import { readJsonFile, readSshPublicKeys } from "./config-file";

describe("config files", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "buildfarm-cli-"));
  });

  afterEach(async () => {
    await fs.remove(dir);
  });

  describe("readSshPublicKeys", () => {
    it("returns one key per non-blank, non-comment line", async () => {
      const file = path.join(dir, "keys.pub");
      await fs.writeFile(
        file,
        "# operators\nssh-ed25519 AAAAC3Nza operator@example\n\n  ssh-rsa AAAAB3Nza backup@example  \r\n"
      );

      await expect(readSshPublicKeys(file)).resolves.toEqual([
        "ssh-ed25519 AAAAC3Nza operator@example",
        "ssh-rsa AAAAB3Nza backup@example",
      ]);
    });

    it("names the file it could not read", async () => {
      const file = path.join(dir, "missing.pub");

      await expect(readSshPublicKeys(file)).rejects.toThrow(`Error reading ${file}`);
    });
  });

  describe("readJsonFile", () => {
    it("parses JSON", async () => {
      const file = path.join(dir, "config.json");
      await fs.writeJson(file, { zone: "europe-west1-b" });

      await expect(readJsonFile(file)).resolves.toEqual({ zone: "europe-west1-b" });
    });

    it("reports malformed JSON with the file name", async () => {
      const file = path.join(dir, "config.json");
      await fs.writeFile(file, "{");

      await expect(readJsonFile(file)).rejects.toThrow(`Error reading config file ${file}`);
    });
  });
});
