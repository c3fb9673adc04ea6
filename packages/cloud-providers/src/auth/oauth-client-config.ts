/**
 * OAuth client configuration loaded from the credentials directory.
 */

import { readFile } from "fs/promises";
import * as path from "path";
import { CredentialError, describeCause } from "../errors";

export const CLIENT_ID_FILE = "client-id.dat";
export const CLIENT_SECRET_FILE = "client-secret.dat";
export const TOKEN_CACHE_FILE = "token.dat";

/** Out-of-band redirect: the operator pastes the code back into the terminal. */
export const OOB_REDIRECT_URI = "urn:ietf:wg:oauth:2.0:oob";

export interface OAuthClientConfig {
  clientId: string;
  clientSecret: string;
  redirectUri: string;
}

/**
 * Paths of the OAuth files for one environment.
 */
export function credentialFilePaths(directory: string, prefix: string) {
  return {
    clientId: path.join(directory, `${prefix}${CLIENT_ID_FILE}`),
    clientSecret: path.join(directory, `${prefix}${CLIENT_SECRET_FILE}`),
    token: path.join(directory, `${prefix}${TOKEN_CACHE_FILE}`),
  };
}

async function readTrimmed(filePath: string, label: string): Promise<string> {
  let contents: string;
  try {
    contents = await readFile(filePath, "utf8");
  } catch (error) {
    throw new CredentialError(`Error reading ${label} from ${filePath}: ${describeCause(error)}`, {
      cause: error,
      suggestions: [
        `Create ${filePath} with the OAuth ${label} of an installed-app client`,
        "Or configure Application Default Credentials (gcloud auth application-default login)",
      ],
    });
  }
  const value = contents.trim();
  if (!value) {
    throw new CredentialError(`${filePath} is empty; expected the OAuth ${label}`);
  }
  return value;
}

/**
 * Read `<prefix>client-id.dat` and `<prefix>client-secret.dat`.
 *
 * @throws CredentialError when either file is missing or empty
 */
export async function loadOAuthClientConfig(
  directory: string,
  prefix: string
): Promise<OAuthClientConfig> {
  const paths = credentialFilePaths(directory, prefix);
  const clientId = await readTrimmed(paths.clientId, "client ID");
  const clientSecret = await readTrimmed(paths.clientSecret, "client secret");
  return { clientId, clientSecret, redirectUri: OOB_REDIRECT_URI };
}
