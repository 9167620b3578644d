import { splitScopes } from "../config.ts";
import { log } from "../log.ts";
import type {
  AccountContext,
  CachedCredential,
  MetadataServerDeps,
  ServiceAccountResponse,
  TokenResponse,
} from "./types.ts";

const METADATA_FLAVOR_HEADER = "Metadata-Flavor";
const METADATA_FLAVOR_VALUE = "Google";

const METADATA_HEADERS = { [METADATA_FLAVOR_HEADER]: METADATA_FLAVOR_VALUE };

const V1 = "/computeMetadata/v1";
const PROJECT_ID_PATH = `${V1}/project/project-id`;
const NUMERIC_PROJECT_ID_PATH = `${V1}/project/numeric-project-id`;
const SERVICE_ACCOUNTS_PATH = `${V1}/instance/service-accounts`;

const DEFAULT_ACCOUNT = "default";

const ACCOUNT_LEAVES = ["", "email", "token", "identity"] as const;
type AccountLeaf = (typeof ACCOUNT_LEAVES)[number];

function isAccountLeaf(value: string): value is AccountLeaf {
  return ACCOUNT_LEAVES.some((leaf) => leaf === value);
}

function textResponse(body: string): Response {
  return new Response(body, {
    status: 200,
    headers: { "Content-Type": "application/text", ...METADATA_HEADERS },
  });
}

function jsonResponse(body: unknown): Response {
  return new Response(JSON.stringify(body), {
    status: 200,
    headers: { "Content-Type": "application/json", ...METADATA_HEADERS },
  });
}

/** Errors carry no body: clients tell failures apart by status code only. */
function emptyResponse(status: number): Response {
  return new Response(null, { status });
}

/**
 * Pure request handler for the GCE metadata server emulator.
 *
 * - Every path requires `Metadata-Flavor: Google`, otherwise 404
 * - Non-GET → 405
 * - `/computeMetadata/v1/project/{project-id,numeric-project-id}`
 * - `/computeMetadata/v1/instance/service-accounts/`
 * - `/computeMetadata/v1/instance/service-accounts/{account}/{,email,token,identity}`
 * - Anything else → 404
 */
export async function handleRequest(req: Request, deps: MetadataServerDeps): Promise<Response> {
  const url = new URL(req.url, "http://localhost");

  if (req.headers.get(METADATA_FLAVOR_HEADER) !== METADATA_FLAVOR_VALUE) {
    log.debug(`Accessed without ${METADATA_FLAVOR_HEADER}: ${METADATA_FLAVOR_VALUE}`, {
      method: req.method,
      path: url.pathname,
    });
    return emptyResponse(404);
  }

  if (req.method !== "GET") {
    return emptyResponse(405);
  }

  switch (url.pathname) {
    case PROJECT_ID_PATH:
      return handleProjectId(deps);
    case NUMERIC_PROJECT_ID_PATH:
      return handleNumericProjectId(deps);
    case SERVICE_ACCOUNTS_PATH:
    case `${SERVICE_ACCOUNTS_PATH}/`:
      return handleServiceAccounts(deps);
  }

  if (url.pathname.startsWith(`${SERVICE_ACCOUNTS_PATH}/`)) {
    const route = parseAccountRoute(url.pathname.slice(SERVICE_ACCOUNTS_PATH.length + 1));
    if (route) {
      return handleAccountRoute(route.account, route.leaf, url, deps);
    }
  }

  return notFound(req, url);
}

/**
 * Split `{account}`, `{account}/` or `{account}/{leaf}` into its parts.
 * Returns null for anything that is not a registered service-account route.
 */
export function parseAccountRoute(rest: string): { account: string; leaf: AccountLeaf } | null {
  const parts = rest.split("/");
  if (parts.length > 2) return null;

  const [rawAccount = "", leaf = ""] = parts;
  if (!rawAccount || !isAccountLeaf(leaf)) return null;

  try {
    return { account: decodeURIComponent(rawAccount), leaf };
  } catch {
    // Malformed percent-encoding: not a route we serve.
    return null;
  }
}

function notFound(req: Request, url: URL): Response {
  log.warn(
    "Unimplemented path is accessed: " +
      "your application may depend on a metadata server feature this server does not implement.",
    { method: req.method, path: `${url.pathname}${url.search}` },
  );
  return emptyResponse(404);
}

// ---------------------------------------------------------------------------
// /project
// ---------------------------------------------------------------------------

async function handleProjectId(deps: MetadataServerDeps): Promise<Response> {
  try {
    const credential = await deps.credentials.defaultCredential();
    return textResponse(credential.projectId ?? "");
  } catch {
    // Logged by the credential provider; no credentials means no project.
    return textResponse("");
  }
}

async function handleNumericProjectId(deps: MetadataServerDeps): Promise<Response> {
  let credential: CachedCredential;
  try {
    credential = await deps.credentials.defaultCredential();
  } catch {
    // Logged by the credential provider.
    return textResponse("0");
  }

  try {
    const numericId = await credential.getNumericProjectId();
    return textResponse(numericId.toString());
  } catch (err) {
    log.error("Failed to resolve numeric project id", { project: credential.projectId, error: err });
    return emptyResponse(500);
  }
}

// ---------------------------------------------------------------------------
// /instance/service-accounts
// ---------------------------------------------------------------------------

async function handleServiceAccounts(deps: MetadataServerDeps): Promise<Response> {
  let credential: CachedCredential;
  try {
    credential = await deps.credentials.defaultCredential();
  } catch {
    return emptyResponse(500);
  }

  try {
    const email = await credential.getEmail();
    return textResponse(`${DEFAULT_ACCOUNT}/\n${email}\n`);
  } catch (err) {
    log.error("Could not retrieve email of the credential", { error: err });
    return emptyResponse(500);
  }
}

/**
 * Resolve the default credential and check the account segment against it.
 *
 * `default` always matches; any other value must equal the credential's email
 * exactly. Every service-account route except identity goes through here first.
 */
export async function validateAccount(
  account: string,
  deps: MetadataServerDeps,
): Promise<AccountContext | Response> {
  let credential: CachedCredential;
  try {
    credential = await deps.credentials.defaultCredential();
  } catch {
    return emptyResponse(500);
  }

  if (account === DEFAULT_ACCOUNT) {
    return { account, credential };
  }

  let email: string;
  try {
    email = await credential.getEmail();
  } catch (err) {
    log.error("Could not retrieve email of the credential", { error: err });
    return emptyResponse(500);
  }

  if (account !== email) {
    log.warn("Unknown service account requested", { account, email });
    return emptyResponse(404);
  }
  return { account, credential };
}

async function handleAccountRoute(
  account: string,
  leaf: AccountLeaf,
  url: URL,
  deps: MetadataServerDeps,
): Promise<Response> {
  // Never served, so the credential state does not matter.
  if (leaf === "identity") return handleIdentity(account);

  const ctx = await validateAccount(account, deps);
  if (ctx instanceof Response) return ctx;

  switch (leaf) {
    case "":
      return handleServiceAccount(url, ctx, deps);
    case "email":
      return handleEmail(ctx);
    case "token":
      return handleToken(url, ctx, deps);
  }
}

/**
 * Handles GET /computeMetadata/v1/instance/service-accounts/{account}/
 *
 * Without `recursive=true`, returns a text directory listing of the
 * sub-endpoints. With it, returns the account's scopes, email and aliases
 * as JSON.
 */
async function handleServiceAccount(
  url: URL,
  ctx: AccountContext,
  deps: MetadataServerDeps,
): Promise<Response> {
  if (url.searchParams.get("recursive") !== "true") {
    return textResponse("email/\nscopes/\ntoken\n");
  }

  let email: string;
  try {
    email = await ctx.credential.getEmail();
  } catch (err) {
    log.error("Could not retrieve email of the credential", { account: ctx.account, error: err });
    return emptyResponse(500);
  }

  const body: ServiceAccountResponse = {
    scopes: deps.scopes,
    email,
    aliases: [DEFAULT_ACCOUNT],
  };
  return jsonResponse(body);
}

async function handleEmail(ctx: AccountContext): Promise<Response> {
  try {
    return textResponse(await ctx.credential.getEmail());
  } catch (err) {
    log.error("Could not retrieve email of the credential", { account: ctx.account, error: err });
    return emptyResponse(500);
  }
}

/**
 * Handles GET /computeMetadata/v1/instance/service-accounts/{account}/token
 *
 * `?scopes=a,b` mints a token for exactly those scopes from freshly resolved
 * credentials; the cached default credential is neither read nor replaced.
 */
async function handleToken(
  url: URL,
  ctx: AccountContext,
  deps: MetadataServerDeps,
): Promise<Response> {
  const requestedScopes = splitScopes(url.searchParams.get("scopes") ?? "");

  let credential = ctx.credential;
  if (requestedScopes.length > 0) {
    try {
      credential = await deps.credentials.scopedCredential(requestedScopes);
    } catch (err) {
      log.error("Could not resolve credentials for requested scopes", {
        account: ctx.account,
        scopes: requestedScopes.join(","),
        error: err,
      });
      return emptyResponse(500);
    }
  }

  try {
    const token = await credential.getToken();
    const body: TokenResponse = {
      access_token: token.access_token,
      token_type: token.token_type,
      expires_in: Math.trunc((token.expires_at.getTime() - Date.now()) / 1000),
    };
    return jsonResponse(body);
  } catch (err) {
    log.error("Could not retrieve token", { account: ctx.account, error: err });
    return emptyResponse(500);
  }
}

/** Identity tokens cannot be minted from local credentials. */
function handleIdentity(account: string): Response {
  log.warn("/identity endpoint is not supported.", { account });
  return emptyResponse(404);
}
