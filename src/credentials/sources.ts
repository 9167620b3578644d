import { GoogleAuth } from "google-auth-library";
import { readFile, stat } from "node:fs/promises";
import { join } from "node:path";
import { z } from "zod";
import type { Config } from "../config.ts";
import { log } from "../log.ts";
import { CredentialResolutionError, errorMessage } from "./errors.ts";
import {
  ADC_FILENAME,
  CredentialPayloadSchema,
  type Credential,
  type CredentialPayload,
  type TokenSource,
} from "./types.ts";

/**
 * One step of the credential search. Returns null when the source has
 * nothing to offer so the chain moves on; throws only when the source is
 * authoritative and broken.
 */
export interface CredentialSource {
  readonly name: string;
  resolve: (scopes: string[]) => Promise<Credential | null>;
}

export interface CredentialChain {
  resolve: (scopes: string[]) => Promise<Credential>;
}

// ---------------------------------------------------------------------------
// Credential files
// ---------------------------------------------------------------------------

/** Validate the raw content of a credentials file against the fields we read. */
function parsePayload(raw: unknown, source: string): CredentialPayload {
  const parsed = CredentialPayloadSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid credentials JSON in ${source}: ${z.prettifyError(parsed.error)}`, {
      cause: parsed.error,
    });
  }
  return parsed.data;
}

function toCredential(payload: CredentialPayload, tokenSource: TokenSource, source: string): Credential {
  return {
    payload,
    tokenSource,
    projectId: payload.project_id ?? payload.quota_project_id,
    source,
  };
}

/** Build a credential from the text of a credentials JSON file. */
export function credentialFromJSON(text: string, scopes: string[], source: string): Credential {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new Error(`Failed to parse credentials JSON in ${source}: ${errorMessage(err)}`, {
      cause: err,
    });
  }
  const payload = parsePayload(raw, source);

  // fromJSON throws for payloads missing the fields their type needs.
  return toCredential(payload, new GoogleAuth({ scopes }).fromJSON(payload), source);
}

/** Read and parse a credentials file. */
export async function loadCredentialFile(file: string, scopes: string[]): Promise<Credential> {
  let text: string;
  try {
    text = await readFile(file, "utf-8");
  } catch (err) {
    throw new Error(`Failed to read from ${file}: ${errorMessage(err)}`, { cause: err });
  }
  return credentialFromJSON(text, scopes, file);
}

async function isRegularFile(path: string): Promise<boolean> {
  try {
    return !(await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

export interface FileCredentialSourceOptions {
  /** Human-readable name used in logs. */
  name: string;
  /** Returns the path to try, or undefined when this source is not configured. */
  locate: () => string | undefined;
  /** Warn (once) when the located file does not exist. */
  warnWhenMissing: boolean;
}

/**
 * A source backed by a credentials file on disk. Failures are reported as a
 * single warning until the source succeeds again, then the chain falls
 * through to the next source.
 */
export function createFileCredentialSource(options: FileCredentialSourceOptions): CredentialSource {
  let warned = false;

  function warnOnce(message: string, fields: Record<string, unknown>): void {
    if (warned) return;
    warned = true;
    log.warn(message, fields);
  }

  async function resolve(scopes: string[]): Promise<Credential | null> {
    const file = options.locate();
    if (!file) return null;

    if (!(await isRegularFile(file))) {
      if (options.warnWhenMissing) {
        warnOnce(`Failed to stat ${options.name}: ignored.`, { file });
      }
      return null;
    }

    try {
      const credential = await loadCredentialFile(file, scopes);
      warned = false;
      return credential;
    } catch (err) {
      warnOnce(`Failed to load ${options.name}: ignored.`, { file, error: err });
      return null;
    }
  }

  return { name: options.name, resolve };
}

// ---------------------------------------------------------------------------
// Ambient discovery
// ---------------------------------------------------------------------------

export const ENV_CREDENTIALS_SOURCE = "$GOOGLE_APPLICATION_CREDENTIALS";
export const WELL_KNOWN_CREDENTIALS_SOURCE = "gcloud well-known file";

/**
 * Application-default discovery through google-auth-library:
 * $GOOGLE_APPLICATION_CREDENTIALS, then the gcloud well-known file. The
 * metadata-server step of the library's search is never reached since this
 * process is the metadata server.
 */
export function createAmbientCredentialSource(): CredentialSource {
  async function resolve(scopes: string[]): Promise<Credential | null> {
    const auth = new GoogleAuth({ scopes });

    // Rejects when the variable is set but unreadable: it is authoritative.
    const fromEnv = await auth._tryGetApplicationCredentialsFromEnvironmentVariable();
    const client = fromEnv ?? (await auth._tryGetApplicationCredentialsFromWellKnownFile());
    if (!client) return null;

    const source = fromEnv ? ENV_CREDENTIALS_SOURCE : WELL_KNOWN_CREDENTIALS_SOURCE;
    return toCredential(parsePayload(auth.jsonContent, source), client, source);
  }

  return { name: "application default credentials", resolve };
}

// ---------------------------------------------------------------------------
// Chain
// ---------------------------------------------------------------------------

/** Try each source in order; the first credential found wins. */
export function createCredentialChain(sources: CredentialSource[]): CredentialChain {
  async function resolve(scopes: string[]): Promise<Credential> {
    for (const source of sources) {
      let credential: Credential | null;
      try {
        credential = await source.resolve(scopes);
      } catch (err) {
        throw new CredentialResolutionError(
          `Could not load ${source.name}: ${errorMessage(err)}`,
          { cause: err },
        );
      }
      if (credential) {
        log.debug("Resolved credentials", { source: source.name, file: credential.source });
        return credential;
      }
    }
    throw new CredentialResolutionError("Could not find default credentials");
  }

  return { resolve };
}

/**
 * The standard search order:
 * 1. the explicitly configured credentials file
 * 2. application_default_credentials.json in the gcloud config directory
 *    (--cloudsdk-config, falling back to $CLOUDSDK_CONFIG)
 * 3. application default credentials discovery
 */
export function createDefaultCredentialSources(
  config: Pick<Config, "google_application_credentials" | "cloudsdk_config">,
  options: { env?: NodeJS.ProcessEnv } = {},
): CredentialSource[] {
  const env = options.env ?? process.env;

  return [
    createFileCredentialSource({
      name: "specified credentials file",
      locate: () => config.google_application_credentials,
      warnWhenMissing: true,
    }),
    createFileCredentialSource({
      name: "credentials from the cloud-sdk configuration directory",
      locate: () => {
        const dir = config.cloudsdk_config ?? env.CLOUDSDK_CONFIG;
        return dir ? join(dir, ADC_FILENAME) : undefined;
      },
      warnWhenMissing: false,
    }),
    createAmbientCredentialSource(),
  ];
}
