import { log } from "../log.ts";
import { emailOf, identityKeyOf, type IdentityOptions } from "./identity.ts";
import { numericProjectIdOf, type ProjectNumberOptions } from "./project-number.ts";
import type { AccessToken, Credential, TokenSource } from "./types.ts";

/** Token lifetime assumed when the client does not report an expiry (1 hour). */
const DEFAULT_LIFETIME_MS = 3600 * 1000;

/** Lookups a CachedCredential memoizes. Injectable for testing. */
export interface CredentialResolvers {
  emailOf: (credential: Credential) => Promise<string>;
  numericProjectIdOf: (tokenSource: TokenSource, projectId: string | undefined) => Promise<bigint>;
}

/** A resolved credential plus lazily computed, memoized identity data. */
export interface CachedCredential {
  readonly credential: Credential;
  /** Identity key used to detect that a newly resolved credential is the same one. */
  readonly clientId: string;
  /** The project override if configured, otherwise the credential's own project. */
  readonly projectId: string | undefined;
  getEmail: () => Promise<string>;
  getNumericProjectId: () => Promise<bigint>;
  /** Mint (or let the client refresh) an access token. Never cached. */
  getToken: () => Promise<AccessToken>;
}

export interface CredentialCache {
  /**
   * Return the cached instance when `credential` has the same client id as
   * the current one, otherwise replace the slot with a fresh instance.
   */
  getOrCreate: (credential: Credential, projectOverride?: string) => CachedCredential;
  /** Build an instance that never touches the cached slot. */
  wrap: (credential: Credential, projectOverride?: string) => CachedCredential;
}

export function createDefaultResolvers(
  options: IdentityOptions & ProjectNumberOptions = {},
): CredentialResolvers {
  return {
    emailOf: (credential) => emailOf(credential, options),
    numericProjectIdOf: (tokenSource, projectId) =>
      numericProjectIdOf(tokenSource, projectId, options),
  };
}

/**
 * Share one in-flight lookup between concurrent callers and keep the result.
 * A rejected lookup is forgotten so the next caller retries it.
 */
function memoize<T>(compute: () => Promise<T>): () => Promise<T> {
  let pending: Promise<T> | null = null;
  return () => {
    if (!pending) {
      pending = compute().catch((err: unknown) => {
        pending = null;
        throw err;
      });
    }
    return pending;
  };
}

/** Extract expiry from the client's credentials, falling back to DEFAULT_LIFETIME_MS. */
function expiryFromCredentials(tokenSource: TokenSource): Date {
  const expMs = tokenSource.credentials.expiry_date;
  if (expMs) return new Date(expMs);
  return new Date(Date.now() + DEFAULT_LIFETIME_MS);
}

export function createCachedCredential(
  credential: Credential,
  projectOverride: string | undefined,
  resolvers: CredentialResolvers,
): CachedCredential {
  const clientId = identityKeyOf(credential.payload);
  const projectId = projectOverride || credential.projectId;

  const getEmail = memoize(async () => {
    const email = await resolvers.emailOf(credential);
    // Service accounts are keyed by their email and were logged by it already.
    if (email !== clientId) {
      log.info("Resolved credentials email", { email, key: clientId });
    }
    return email;
  });
  const lookupNumericProjectId = memoize(() =>
    resolvers.numericProjectIdOf(credential.tokenSource, projectId),
  );

  async function getNumericProjectId(): Promise<bigint> {
    if (!projectId) return 0n;
    return lookupNumericProjectId();
  }

  async function getToken(): Promise<AccessToken> {
    const { token } = await credential.tokenSource.getAccessToken();
    if (!token) {
      throw new Error("Failed to get token: no access token returned");
    }
    return {
      access_token: token,
      token_type: credential.tokenSource.credentials.token_type || "Bearer",
      expires_at: expiryFromCredentials(credential.tokenSource),
    };
  }

  return { credential, clientId, projectId, getEmail, getNumericProjectId, getToken };
}

/**
 * Single-slot cache for the default-scope credential.
 *
 * getOrCreate runs synchronously, so comparing and swapping the slot cannot
 * interleave with another request.
 */
export function createCredentialCache(resolvers: CredentialResolvers): CredentialCache {
  let slot: CachedCredential | null = null;

  function wrap(credential: Credential, projectOverride?: string): CachedCredential {
    return createCachedCredential(credential, projectOverride, resolvers);
  }

  function getOrCreate(credential: Credential, projectOverride?: string): CachedCredential {
    const clientId = identityKeyOf(credential.payload);
    if (slot && slot.clientId === clientId) {
      return slot;
    }
    slot = wrap(credential, projectOverride);
    // The email of an authorized user is unknown until first requested; log its key instead.
    const email = credential.payload.client_email;
    log.info("New credentials", { email, key: email ? undefined : clientId, source: credential.source });
    return slot;
  }

  return { getOrCreate, wrap };
}
