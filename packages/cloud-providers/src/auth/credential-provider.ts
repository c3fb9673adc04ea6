/**
 * Credential Provider
 *
 * Tries each credential source in order and returns the first credential.
 */

import { OPERATOR_OAUTH_SCOPES } from "@buildfarm/core";
import type { GoogleAuth } from "google-auth-library";
import { CredentialError } from "../errors";
import type {
  AuthCodePrompt,
  Credential,
  CredentialLogCallback,
  CredentialSource,
} from "./credential";
import {
  CachedFileCredentialSource,
  EnvironmentDefaultCredentialSource,
  InteractiveExchangeCredentialSource,
} from "./credential-sources";
import type { OAuthSessionLoader } from "./credential-sources";
import { credentialFilePaths, loadOAuthClientConfig } from "./oauth-client-config";
import { GoogleOAuthSession } from "./oauth-session";
import { TokenCacheFile } from "./token-cache-file";

export class CredentialProvider {
  constructor(private readonly sources: readonly CredentialSource[]) {}

  /**
   * @throws CredentialError when no source yields a credential
   */
  async acquire(): Promise<Credential> {
    for (const source of this.sources) {
      const credential = await source.acquire();
      if (credential) return credential;
    }
    throw new CredentialError(
      `No credential available (tried ${this.sources.map((s) => s.kind).join(", ") || "no sources"})`
    );
  }
}

export interface DefaultCredentialProviderOptions {
  /** Directory holding the client ID, client secret and token files */
  credentialsDir: string;
  /** "staging-" in staging, "" in production */
  filePrefix: string;
  prompt: AuthCodePrompt;
  log: CredentialLogCallback;
  scopes?: readonly string[];
  /** Application Default Credentials lookup; built from `scopes` when omitted */
  discovery?: GoogleAuth;
  loadSession?: OAuthSessionLoader;
}

/**
 * Environment defaults, then the cached token, then an interactive exchange.
 * The OAuth client files are only read once the environment source fails.
 */
export function createDefaultCredentialProvider(
  options: DefaultCredentialProviderOptions
): CredentialProvider {
  const scopes = options.scopes ?? OPERATOR_OAUTH_SCOPES;
  const paths = credentialFilePaths(options.credentialsDir, options.filePrefix);
  const cache = new TokenCacheFile(paths.token, options.log);

  const loadSession = memoize(
    options.loadSession ??
      (async () =>
        new GoogleOAuthSession(
          await loadOAuthClientConfig(options.credentialsDir, options.filePrefix)
        ))
  );

  return new CredentialProvider([
    new EnvironmentDefaultCredentialSource(scopes, options.log, options.discovery),
    new CachedFileCredentialSource(cache, loadSession, options.log),
    new InteractiveExchangeCredentialSource(cache, loadSession, options.prompt, scopes, options.log),
  ]);
}

function memoize<T>(load: () => Promise<T>): () => Promise<T> {
  let pending: Promise<T> | undefined;
  return () => {
    if (!pending) {
      pending = load();
    }
    return pending;
  };
}
