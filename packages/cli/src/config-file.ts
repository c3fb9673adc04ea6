import fs from "fs-extra";
import { describeCause } from "@buildfarm/cloud-providers";

/**
 * Read a JSON config file. Validation is left to the caller's schema.
 */
export async function readJsonFile(filePath: string): Promise<unknown> {
  try {
    const contents: unknown = await fs.readJson(filePath);
    return contents;
  } catch (error) {
    const reason = describeCause(error);
    throw new Error(`Error reading config file ${filePath}: ${reason}`, { cause: error });
  }
}

/**
 * One OpenSSH public key per line. Blank lines and "#" comments are skipped.
 */
export async function readSshPublicKeys(filePath: string): Promise<string[]> {
  let contents: string;
  try {
    contents = await fs.readFile(filePath, "utf8");
  } catch (error) {
    const reason = describeCause(error);
    throw new Error(`Error reading ${filePath}: ${reason}`, { cause: error });
  }
  return contents
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith("#"));
}
