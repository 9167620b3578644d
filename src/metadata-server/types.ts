// ---------------------------------------------------------------------------
// Shared interfaces for the metadata server
// ---------------------------------------------------------------------------

import type { CachedCredential } from "../credentials/cache.ts";
import type { CredentialProvider } from "../credentials/provider.ts";

export type { CachedCredential, CredentialProvider };

/**
 * Dependency injection interface for metadata request handlers.
 * Allows handlers to be tested without credential files or Google APIs.
 */
export interface MetadataServerDeps {
  credentials: CredentialProvider;
  /** Default scopes, reported by the recursive service-account listing. */
  scopes: string[];
}

/** Per-request context handed to service-account handlers once the account is validated. */
export interface AccountContext {
  /** Account segment from the path: "default" or the credential's email. */
  account: string;
  credential: CachedCredential;
}

/** JSON response for token requests. */
export interface TokenResponse {
  access_token: string;
  token_type: string;
  expires_in: number;
}

/** JSON response for `service-accounts/{account}/?recursive=true`. */
export interface ServiceAccountResponse {
  scopes: string[];
  email: string;
  aliases: string[];
}
