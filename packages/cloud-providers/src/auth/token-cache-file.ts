/**
 * Token Cache File
 *
 * JSON-serialized OAuth token kept between runs, readable by the owner only.
 * Concurrent runs against the same file are not coordinated.
 */

import { chmod, readFile, writeFile } from "fs/promises";
import type { Credentials } from "google-auth-library";
import { z } from "zod";
import { CredentialError, describeCause, systemErrorCode } from "../errors";
import type { CredentialLogCallback } from "./credential";

const TOKEN_FILE_MODE = 0o600;

export const CachedTokenSchema = z.object({
  access_token: z.string().min(1),
  refresh_token: z.string().nullish(),
  expiry_date: z.number().nullish(),
  token_type: z.string().nullish(),
  id_token: z.string().nullish(),
  scope: z.string().optional(),
});

export class TokenCacheFile {
  constructor(
    readonly filePath: string,
    private readonly log: CredentialLogCallback
  ) {}

  /**
   * Load the cached token.
   *
   * @returns null when the file is missing, unreadable or malformed
   */
  async read(): Promise<Credentials | null> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, "utf8");
    } catch (error) {
      if (systemErrorCode(error) === "ENOENT") {
        this.log(`No cached token at ${this.filePath}`, "stdout");
      } else {
        this.log(`Could not read cached token ${this.filePath}: ${describeCause(error)}`, "stderr");
      }
      return null;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      this.log(`Ignoring malformed token cache ${this.filePath}: ${describeCause(error)}`, "stderr");
      return null;
    }

    const result = CachedTokenSchema.safeParse(parsed);
    if (!result.success) {
      this.log(`Ignoring token cache ${this.filePath}: missing access_token`, "stderr");
      return null;
    }
    return result.data;
  }

  /**
   * Persist a token, creating the file with mode 0600.
   *
   * @throws CredentialError when the file cannot be written
   */
  async write(token: Credentials): Promise<void> {
    try {
      await writeFile(this.filePath, JSON.stringify(token), { mode: TOKEN_FILE_MODE });
      // mode only applies on creation
      await chmod(this.filePath, TOKEN_FILE_MODE);
    } catch (error) {
      throw new CredentialError(`Failed to cache token to ${this.filePath}: ${describeCause(error)}`, {
        cause: error,
      });
    }
    this.log(`Cached token in ${this.filePath}`, "stdout");
  }
}
