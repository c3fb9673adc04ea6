export type {
  AuthCodePrompt,
  Credential,
  CredentialLogCallback,
  CredentialSource,
  CredentialSourceKind,
} from "./credential";
export {
  CachedFileCredentialSource,
  EnvironmentDefaultCredentialSource,
  InteractiveExchangeCredentialSource,
} from "./credential-sources";
export type { OAuthSessionLoader } from "./credential-sources";
export { CredentialProvider, createDefaultCredentialProvider } from "./credential-provider";
export type { DefaultCredentialProviderOptions } from "./credential-provider";
export {
  CLIENT_ID_FILE,
  CLIENT_SECRET_FILE,
  OOB_REDIRECT_URI,
  TOKEN_CACHE_FILE,
  credentialFilePaths,
  loadOAuthClientConfig,
} from "./oauth-client-config";
export type { OAuthClientConfig } from "./oauth-client-config";
export { GoogleOAuthSession } from "./oauth-session";
export type { OAuthSession } from "./oauth-session";
export { CachedTokenSchema, TokenCacheFile } from "./token-cache-file";
