/**
 * OAuth Session
 *
 * Thin seam over OAuth2Client so the credential sources can be tested
 * without the token endpoint.
 */

import { GoogleAuth, OAuth2Client, UserRefreshClient } from "google-auth-library";
import type { Credentials } from "google-auth-library";
import type { OAuthClientConfig } from "./oauth-client-config";

export interface OAuthSession {
  authorizationUrl(scopes: readonly string[]): string;
  exchangeCode(code: string): Promise<Credentials>;
  /** Wraps a token so the API clients can use and refresh it */
  authorize(token: Credentials): GoogleAuth;
}

export class GoogleOAuthSession implements OAuthSession {
  private readonly client: OAuth2Client;

  constructor(private readonly config: OAuthClientConfig) {
    this.client = new OAuth2Client({
      clientId: config.clientId,
      clientSecret: config.clientSecret,
      redirectUri: config.redirectUri,
    });
  }

  authorizationUrl(scopes: readonly string[]): string {
    return this.client.generateAuthUrl({
      access_type: "offline",
      scope: [...scopes],
    });
  }

  async exchangeCode(code: string): Promise<Credentials> {
    const { tokens } = await this.client.getToken(code);
    return tokens;
  }

  authorize(token: Credentials): GoogleAuth {
    const userClient = new UserRefreshClient({
      clientId: this.config.clientId,
      clientSecret: this.config.clientSecret,
      refreshToken: token.refresh_token ?? undefined,
    });
    userClient.setCredentials(token);
    return new GoogleAuth({ authClient: userClient });
  }
}
