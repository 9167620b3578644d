import { z } from "zod";
import { log } from "../log.ts";
import { UpstreamError, errorMessage } from "./errors.ts";
import { DEFAULT_UPSTREAM_TIMEOUT_MS } from "./identity.ts";
import type { FetchFn, TokenSource } from "./types.ts";

// https://cloud.google.com/resource-manager/reference/rest/v1/projects/get
// Service account callers need the Cloud Resource Manager API enabled on
// their project; authorized users always have access.
export const PROJECTS_ENDPOINT = "https://cloudresourcemanager.googleapis.com/v1/projects";

const MAX_INT64 = 2n ** 63n - 1n;

const ProjectResponseSchema = z.object({
  projectNumber: z.string().regex(/^\d+$/),
});

export interface ProjectNumberOptions {
  fetchFn?: FetchFn;
  timeoutMs?: number;
}

/**
 * Look up the numeric project number for a project id.
 * Resolves to 0n without a network call when no project id is known.
 */
export async function numericProjectIdOf(
  tokenSource: TokenSource,
  projectId: string | undefined,
  options: ProjectNumberOptions = {},
): Promise<bigint> {
  if (!projectId) return 0n;

  const fetchFn = options.fetchFn ?? globalThis.fetch;
  const endpoint = `${PROJECTS_ENDPOINT}/${encodeURIComponent(projectId)}`;

  let resp: Response;
  let body: string;
  try {
    const { token } = await tokenSource.getAccessToken();
    if (!token) {
      throw new Error("no access token available");
    }
    resp = await fetchFn(endpoint, {
      headers: { Authorization: `Bearer ${token}` },
      signal: AbortSignal.timeout(options.timeoutMs ?? DEFAULT_UPSTREAM_TIMEOUT_MS),
    });
    body = await resp.text();
  } catch (err) {
    throw new Error(`Failed to resolve numeric project number: ${errorMessage(err)}`, {
      cause: err,
    });
  }

  if (resp.status !== 200) {
    log.debug("Unexpected response from project endpoint", { status: resp.status, body });
    throw new UpstreamError(
      `Unexpected response from project endpoint: ${resp.status}`,
      endpoint,
      resp.status,
    );
  }

  let data: unknown;
  try {
    data = JSON.parse(body);
  } catch (err) {
    log.debug("Unexpected response from project endpoint", { body });
    throw new UpstreamError(`Unexpected response from project endpoint: ${errorMessage(err)}`, endpoint, resp.status, {
      cause: err,
    });
  }

  const parsed = ProjectResponseSchema.safeParse(data);
  if (!parsed.success) {
    log.debug("Unexpected response from project endpoint", { body });
    throw new UpstreamError(
      "Unexpected response from project endpoint: missing or non-numeric projectNumber",
      endpoint,
      resp.status,
      { cause: parsed.error },
    );
  }

  const projectNumber = BigInt(parsed.data.projectNumber);
  if (projectNumber > MAX_INT64) {
    throw new UpstreamError(
      `Unexpected response from project endpoint: projectNumber ${parsed.data.projectNumber} out of range`,
      endpoint,
      resp.status,
    );
  }
  return projectNumber;
}
