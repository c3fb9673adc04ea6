/**
 * Credential types shared by every credential source.
 */

import type { Credentials, GoogleAuth } from "google-auth-library";
import type { LogCallback } from "../base/base-provisioning-target";

export type CredentialSourceKind = "environment-default" | "cached-token" | "interactive-exchange";

/**
 * Authorization ready for API calls. One per run.
 */
export interface Credential {
  source: CredentialSourceKind;
  /** Handed to every Compute Engine client as its `auth` option */
  auth: GoogleAuth;
  /** Present for OAuth user credentials; absent for environment defaults */
  token?: Credentials;
}

/**
 * One way of obtaining a credential.
 *
 * A source resolves to null when it has nothing to offer so the next one can
 * be tried, and throws CredentialError when the run cannot continue.
 */
export interface CredentialSource {
  readonly kind: CredentialSourceKind;
  acquire(): Promise<Credential | null>;
}

/** Reads one authorization code from the operator. */
export type AuthCodePrompt = () => Promise<string>;

export type CredentialLogCallback = LogCallback;
