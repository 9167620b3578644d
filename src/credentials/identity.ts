import { createHash } from "node:crypto";
import { z } from "zod";
import { log } from "../log.ts";
import { IdentityResolutionError, UpstreamError, errorMessage } from "./errors.ts";
import {
  AUTHORIZED_USER_TYPE,
  SERVICE_ACCOUNT_TYPE,
  type Credential,
  type CredentialPayload,
  type FetchFn,
} from "./types.ts";

export const USERINFO_ENDPOINT = "https://www.googleapis.com/oauth2/v1/userinfo";

/** Default deadline for calls to Google APIs. */
export const DEFAULT_UPSTREAM_TIMEOUT_MS = 10_000;

const UserInfoSchema = z.object({ email: z.string().min(1) });

export interface IdentityOptions {
  fetchFn?: FetchFn;
  timeoutMs?: number;
}

/**
 * Stable key identifying who a credential acts as, computed without any
 * network call. Service accounts are keyed by their email; authorized users
 * by OAuth client plus a fingerprint of the refresh token, since several
 * users commonly share gcloud's client id.
 */
export function identityKeyOf(payload: CredentialPayload): string {
  switch (payload.type) {
    case SERVICE_ACCOUNT_TYPE:
      if (!payload.client_email) {
        throw new IdentityResolutionError("Service account credentials have no client_email");
      }
      return payload.client_email;
    case AUTHORIZED_USER_TYPE: {
      const fingerprint = createHash("sha256")
        .update(payload.refresh_token ?? "")
        .digest("hex")
        .slice(0, 16);
      return `${payload.client_id ?? ""}/${fingerprint}`;
    }
    default:
      throw new IdentityResolutionError(`Unexpected type: ${payload.type}`);
  }
}

/**
 * Resolve the email address a credential acts as.
 *
 * - service_account: read from the credential itself
 * - authorized_user: the file carries no email, so mint a token and ask the
 *   userinfo endpoint
 */
export async function emailOf(credential: Credential, options: IdentityOptions = {}): Promise<string> {
  const { payload } = credential;
  switch (payload.type) {
    case SERVICE_ACCOUNT_TYPE:
      if (!payload.client_email) {
        throw new IdentityResolutionError("Service account credentials have no client_email");
      }
      return payload.client_email;
    case AUTHORIZED_USER_TYPE:
      return emailOfAuthorizedUser(credential, options);
    default:
      throw new IdentityResolutionError(`Unexpected type: ${payload.type}`);
  }
}

async function emailOfAuthorizedUser(
  credential: Credential,
  options: IdentityOptions,
): Promise<string> {
  const fetchFn = options.fetchFn ?? globalThis.fetch;

  let token: string | null | undefined;
  try {
    ({ token } = await credential.tokenSource.getAccessToken());
  } catch (err) {
    throw new IdentityResolutionError(`Failed to get token to resolve email: ${errorMessage(err)}`, {
      cause: err,
    });
  }
  if (!token) {
    throw new IdentityResolutionError("Failed to get token to resolve email: no access token returned");
  }

  const url = new URL(USERINFO_ENDPOINT);
  url.searchParams.set("access_token", token);

  let resp: Response;
  let body: string;
  try {
    resp = await fetchFn(url.toString(), {
      signal: AbortSignal.timeout(options.timeoutMs ?? DEFAULT_UPSTREAM_TIMEOUT_MS),
    });
    body = await resp.text();
  } catch (err) {
    throw new IdentityResolutionError(`Failed to access the userinfo endpoint: ${errorMessage(err)}`, {
      cause: err,
    });
  }

  if (resp.status !== 200) {
    log.debug("Unexpected response from userinfo endpoint", { status: resp.status, body });
    throw new UpstreamError(
      `Unexpected response from the userinfo endpoint: ${resp.status}`,
      USERINFO_ENDPOINT,
      resp.status,
    );
  }

  let data: unknown;
  try {
    data = JSON.parse(body);
  } catch (err) {
    log.debug("Unexpected response from userinfo endpoint", { body });
    throw new IdentityResolutionError(
      `Failed to parse response from the userinfo endpoint: ${errorMessage(err)}`,
      { cause: err },
    );
  }

  const parsed = UserInfoSchema.safeParse(data);
  if (!parsed.success) {
    log.debug("Unexpected response from userinfo endpoint", { body });
    throw new IdentityResolutionError("Failed to parse response from the userinfo endpoint: no email", {
      cause: parsed.error,
    });
  }
  return parsed.data.email;
}
