/**
 * Credential Sources
 *
 * The three ways a run obtains an authorized client, tried in order by
 * CredentialProvider.
 */

import { GoogleAuth } from "google-auth-library";
import type { Credentials } from "google-auth-library";
import { CredentialError, describeCause } from "../errors";
import type {
  AuthCodePrompt,
  Credential,
  CredentialLogCallback,
  CredentialSource,
} from "./credential";
import type { OAuthSession } from "./oauth-session";
import type { TokenCacheFile } from "./token-cache-file";

/** Loads the OAuth session on first use. */
export type OAuthSessionLoader = () => Promise<OAuthSession>;

// ── Environment defaults ───────────────────────────────────────────────

/**
 * Application Default Credentials: GOOGLE_APPLICATION_CREDENTIALS, gcloud's
 * user credentials, or the metadata server.
 */
export class EnvironmentDefaultCredentialSource implements CredentialSource {
  readonly kind = "environment-default" as const;
  private readonly discovery: GoogleAuth;

  constructor(
    scopes: readonly string[],
    private readonly log: CredentialLogCallback,
    discovery?: GoogleAuth
  ) {
    this.discovery = discovery ?? new GoogleAuth({ scopes: [...scopes] });
  }

  async acquire(): Promise<Credential | null> {
    try {
      await this.discovery.getClient();
      this.log("Using application default credentials", "stdout");
      return { source: this.kind, auth: this.discovery };
    } catch (error) {
      this.log(`No application default credentials: ${describeCause(error)}`, "stdout");
      return null;
    }
  }
}

// ── Cached token ───────────────────────────────────────────────────────

export class CachedFileCredentialSource implements CredentialSource {
  readonly kind = "cached-token" as const;

  constructor(
    private readonly cache: TokenCacheFile,
    private readonly loadSession: OAuthSessionLoader,
    private readonly log: CredentialLogCallback
  ) {}

  async acquire(): Promise<Credential | null> {
    const token = await this.cache.read();
    if (!token) return null;

    const session = await this.loadSession();
    this.log(`Using cached token from ${this.cache.filePath}`, "stdout");
    return { source: this.kind, auth: session.authorize(token), token };
  }
}

// ── Interactive exchange ───────────────────────────────────────────────

export class InteractiveExchangeCredentialSource implements CredentialSource {
  readonly kind = "interactive-exchange" as const;

  constructor(
    private readonly cache: TokenCacheFile,
    private readonly loadSession: OAuthSessionLoader,
    private readonly prompt: AuthCodePrompt,
    private readonly scopes: readonly string[],
    private readonly log: CredentialLogCallback
  ) {}

  async acquire(): Promise<Credential> {
    const session = await this.loadSession();

    this.log("Go to the following link in your browser:", "stdout");
    this.log("", "stdout");
    this.log(`  ${session.authorizationUrl(this.scopes)}`, "stdout");
    this.log("", "stdout");

    const code = (await this.prompt()).trim();
    if (!code) {
      throw new CredentialError("No authorization code entered");
    }

    let token: Credentials;
    try {
      token = await session.exchangeCode(code);
    } catch (error) {
      throw new CredentialError(`Token exchange failed: ${describeCause(error)}`, {
        cause: error,
        suggestions: ["Authorization codes are single-use; open the link again for a new one"],
      });
    }

    await this.cache.write(token);
    return { source: this.kind, auth: session.authorize(token), token };
  }
}
