import type { Credential, CredentialPayload, FetchFn, TokenSource } from "../../credentials/types.ts";

/** A token source that hands out numbered tokens and counts calls. */
export function fakeTokenSource(
  options: { token?: string | null; expiryDate?: number; tokenType?: string } = {},
): TokenSource & { calls: number } {
  const source = {
    calls: 0,
    credentials: {
      expiry_date: options.expiryDate ?? Date.now() + 3600_000,
      token_type: options.tokenType ?? "Bearer",
    },
    getAccessToken: async () => {
      source.calls++;
      return { token: options.token === undefined ? "test-access-token" : options.token };
    },
  };
  return source;
}

export function serviceAccountCredential(
  email = "svc@proj.iam.gserviceaccount.com",
  overrides: Partial<Credential> = {},
): Credential {
  const payload: CredentialPayload = {
    type: "service_account",
    client_email: email,
    private_key: "test-key",
    project_id: "proj",
  };
  return {
    payload,
    tokenSource: fakeTokenSource(),
    projectId: "proj",
    source: "/keys/sa.json",
    ...overrides,
  };
}

export function authorizedUserCredential(
  refreshToken = "test-refresh-token",
  overrides: Partial<Credential> = {},
): Credential {
  const payload: CredentialPayload = {
    type: "authorized_user",
    client_id: "test-client-id",
    client_secret: "test-secret",
    refresh_token: refreshToken,
  };
  return {
    payload,
    tokenSource: fakeTokenSource(),
    projectId: undefined,
    source: "/adc.json",
    ...overrides,
  };
}

/** A fetch stand-in that records requests and answers with a fixed status and body. */
export function fakeFetch(
  status: number,
  body: unknown,
): FetchFn & { requests: { url: string; init?: RequestInit }[] } {
  const requests: { url: string; init?: RequestInit }[] = [];
  const fetchFn = async (url: string, init?: RequestInit) => {
    requests.push({ url, init });
    const text = typeof body === "string" ? body : JSON.stringify(body);
    return new Response(text, { status, headers: { "Content-Type": "application/json" } });
  };
  return Object.assign(fetchFn, { requests });
}
