import { log } from "../log.ts";
import type { CachedCredential, CredentialCache } from "./cache.ts";
import { CredentialResolutionError } from "./errors.ts";
import type { CredentialChain } from "./sources.ts";
import type { Credential } from "./types.ts";

const SETUP_GUIDANCE =
  "You may not have set up credentials. You can set up your credentials in one of these ways:\n" +
  "\n" +
  "  * Run `gcloud auth application-default login`. Share ~/.config/gcloud with volume mounts in docker containers.\n" +
  "  * Put the service account key file (a json file) somewhere readable, and specify its path with\n" +
  "    --google-application-credentials or the GOOGLE_APPLICATION_CREDENTIALS environment variable.\n";

/**
 * Resolves credentials for request handlers.
 * Both methods reject with the underlying error after logging it.
 */
export interface CredentialProvider {
  /** Credential for the configured default scopes, served from the cache slot. */
  defaultCredential: () => Promise<CachedCredential>;
  /** Credential for caller-supplied scopes. Bypasses the cache entirely. */
  scopedCredential: (scopes: string[]) => Promise<CachedCredential>;
}

export interface CredentialProviderConfig {
  scopes: string[];
  project?: string;
}

export function createCredentialProvider(
  chain: CredentialChain,
  cache: CredentialCache,
  config: CredentialProviderConfig,
): CredentialProvider {
  async function resolve(scopes: string[], cached: boolean): Promise<CachedCredential> {
    let credential: Credential;
    try {
      credential = await chain.resolve(scopes);
    } catch (err) {
      if (err instanceof CredentialResolutionError) {
        log.error(`Could not retrieve default credentials\n${SETUP_GUIDANCE}`, { error: err });
      } else {
        log.error("Could not retrieve default credentials", { error: err });
      }
      throw err;
    }

    try {
      return cached
        ? cache.getOrCreate(credential, config.project)
        : cache.wrap(credential, config.project);
    } catch (err) {
      log.error("Could not resolve default credentials", { error: err, file: credential.source });
      throw err;
    }
  }

  return {
    defaultCredential: () => resolve(config.scopes, true),
    scopedCredential: (scopes) => resolve(scopes, false),
  };
}
