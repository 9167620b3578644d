// ---------------------------------------------------------------------------
// Shared credential types
// ---------------------------------------------------------------------------

import { z } from "zod";

export const SERVICE_ACCOUNT_TYPE = "service_account";
export const AUTHORIZED_USER_TYPE = "authorized_user";

/** Filename gcloud writes application default credentials to. */
export const ADC_FILENAME = "application_default_credentials.json";

/**
 * The subset of a credentials JSON file we read. Unknown keys are dropped;
 * what remains is enough for google-auth-library to build a JWT or
 * UserRefreshClient.
 */
export const CredentialPayloadSchema = z.object({
  type: z.string(),
  client_email: z.string().optional(),
  client_id: z.string().optional(),
  client_secret: z.string().optional(),
  refresh_token: z.string().optional(),
  private_key: z.string().optional(),
  private_key_id: z.string().optional(),
  project_id: z.string().optional(),
  quota_project_id: z.string().optional(),
  universe_domain: z.string().optional(),
});

export type CredentialPayload = z.infer<typeof CredentialPayloadSchema>;

/**
 * Anything that can mint a bearer token on demand. google-auth-library's
 * AuthClient satisfies this structurally; tests substitute plain objects.
 */
export interface TokenSource {
  getAccessToken: () => Promise<{ token?: string | null }>;
  credentials: { expiry_date?: number | null; token_type?: string | null };
}

/** A credential found by the source chain, before it is wrapped by the cache. */
export interface Credential {
  payload: CredentialPayload;
  tokenSource: TokenSource;
  /** Project embedded in the credential file, if any. */
  projectId: string | undefined;
  /** Where the credential was loaded from (file path). */
  source: string;
}

/** An access token with its absolute expiry. */
export interface AccessToken {
  access_token: string;
  token_type: string;
  expires_at: Date;
}

/** Signature of the fetch implementation used for Google API calls. */
export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;
