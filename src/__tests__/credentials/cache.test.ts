import { afterEach, beforeEach, describe, expect, test, vi, type MockInstance } from "vitest";
import {
  createCachedCredential,
  createCredentialCache,
  type CredentialResolvers,
} from "../../credentials/cache.ts";
import type { Credential } from "../../credentials/types.ts";
import { setLogLevel } from "../../log.ts";
import { authorizedUserCredential, fakeTokenSource, serviceAccountCredential } from "./helpers.ts";

/** Resolvers that count calls and can be told to fail. */
function countingResolvers(options: { email?: string; numericId?: bigint } = {}) {
  const counts = { email: 0, numericProjectId: 0 };
  const failures = { email: 0, numericProjectId: 0 };

  const resolvers: CredentialResolvers = {
    emailOf: async (credential: Credential) => {
      counts.email++;
      if (failures.email > 0) {
        failures.email--;
        throw new Error("userinfo unavailable");
      }
      return options.email ?? credential.payload.client_email ?? "u@example.com";
    },
    numericProjectIdOf: async () => {
      counts.numericProjectId++;
      if (failures.numericProjectId > 0) {
        failures.numericProjectId--;
        throw new Error("Unexpected response from project endpoint: 403");
      }
      return options.numericId ?? 42n;
    },
  };
  return { resolvers, counts, failures };
}

let logSpy: MockInstance<typeof console.log>;

beforeEach(() => {
  logSpy = vi.spyOn(console, "log").mockImplementation(() => {});
});

afterEach(() => {
  setLogLevel("warning");
  vi.restoreAllMocks();
});

describe("createCachedCredential", () => {
  test("uses the project override when given", () => {
    const { resolvers } = countingResolvers();
    const cached = createCachedCredential(serviceAccountCredential(), "override", resolvers);
    expect(cached.projectId).toBe("override");
  });

  test("falls back to the credential's project", () => {
    const { resolvers } = countingResolvers();
    const cached = createCachedCredential(serviceAccountCredential(), undefined, resolvers);
    expect(cached.projectId).toBe("proj");
  });

  test("computes the client id eagerly", () => {
    const { resolvers, counts } = countingResolvers();
    const cached = createCachedCredential(serviceAccountCredential("a@p.iam.gserviceaccount.com"), undefined, resolvers);
    expect(cached.clientId).toBe("a@p.iam.gserviceaccount.com");
    expect(counts.email).toBe(0);
  });

  test("looks up the email at most once", async () => {
    const { resolvers, counts } = countingResolvers({ email: "u@example.com" });
    const cached = createCachedCredential(authorizedUserCredential(), undefined, resolvers);

    const results = await Promise.all([cached.getEmail(), cached.getEmail()]);
    await cached.getEmail();

    expect(results).toEqual(["u@example.com", "u@example.com"]);
    expect(counts.email).toBe(1);
  });

  test("looks up the numeric project id at most once", async () => {
    const { resolvers, counts } = countingResolvers({ numericId: 123456789012n });
    const cached = createCachedCredential(serviceAccountCredential(), undefined, resolvers);

    expect(await cached.getNumericProjectId()).toBe(123456789012n);
    expect(await cached.getNumericProjectId()).toBe(123456789012n);
    expect(counts.numericProjectId).toBe(1);
  });

  test("does not remember a failed lookup", async () => {
    const { resolvers, counts, failures } = countingResolvers({ numericId: 7n });
    failures.numericProjectId = 1;
    const cached = createCachedCredential(serviceAccountCredential(), undefined, resolvers);

    await expect(cached.getNumericProjectId()).rejects.toThrow("403");
    await expect(cached.getNumericProjectId()).resolves.toBe(7n);
    expect(counts.numericProjectId).toBe(2);
  });

  test("resolves numeric project id 0 without lookup when no project is known", async () => {
    const { resolvers, counts } = countingResolvers();
    const cached = createCachedCredential(authorizedUserCredential(), undefined, resolvers);

    await expect(cached.getNumericProjectId()).resolves.toBe(0n);
    expect(counts.numericProjectId).toBe(0);
  });

  test("mints a fresh token on every call", async () => {
    const { resolvers } = countingResolvers();
    const tokenSource = fakeTokenSource({ token: "tok", expiryDate: 1_900_000_000_000 });
    const cached = createCachedCredential(serviceAccountCredential(undefined, { tokenSource }), undefined, resolvers);

    const token = await cached.getToken();
    await cached.getToken();

    expect(token).toEqual({
      access_token: "tok",
      token_type: "Bearer",
      expires_at: new Date(1_900_000_000_000),
    });
    expect(tokenSource.calls).toBe(2);
  });

  test("falls back to a one hour lifetime when the client reports no expiry", async () => {
    const { resolvers } = countingResolvers();
    const tokenSource = fakeTokenSource();
    tokenSource.credentials = {};
    const cached = createCachedCredential(serviceAccountCredential(undefined, { tokenSource }), undefined, resolvers);

    const before = Date.now();
    const token = await cached.getToken();

    expect(token.token_type).toBe("Bearer");
    expect(token.expires_at.getTime()).toBeGreaterThanOrEqual(before + 3600_000);
    expect(token.expires_at.getTime()).toBeLessThanOrEqual(Date.now() + 3600_000);
  });

  test("rejects when the client returns no token", async () => {
    const { resolvers } = countingResolvers();
    const tokenSource = fakeTokenSource({ token: null });
    const cached = createCachedCredential(serviceAccountCredential(undefined, { tokenSource }), undefined, resolvers);

    await expect(cached.getToken()).rejects.toThrow("no access token returned");
  });
});

describe("createCredentialCache", () => {
  test("returns the same instance for the same client id", async () => {
    const { resolvers, counts } = countingResolvers();
    const cache = createCredentialCache(resolvers);

    const first = cache.getOrCreate(serviceAccountCredential("a@p.iam.gserviceaccount.com"));
    await first.getEmail();
    const second = cache.getOrCreate(serviceAccountCredential("a@p.iam.gserviceaccount.com"));
    await second.getEmail();

    expect(second).toBe(first);
    expect(counts.email).toBe(1);
  });

  test("replaces the slot when the client id changes", async () => {
    const { resolvers, counts } = countingResolvers();
    const cache = createCredentialCache(resolvers);

    const first = cache.getOrCreate(serviceAccountCredential("a@p.iam.gserviceaccount.com"));
    await first.getNumericProjectId();
    const second = cache.getOrCreate(serviceAccountCredential("b@p.iam.gserviceaccount.com"));
    await second.getNumericProjectId();

    expect(second).not.toBe(first);
    expect(cache.getOrCreate(serviceAccountCredential("b@p.iam.gserviceaccount.com"))).toBe(second);
    expect(counts.numericProjectId).toBe(2);
  });

  test("logs new credentials once at info level", () => {
    setLogLevel("info");
    const { resolvers } = countingResolvers();
    const cache = createCredentialCache(resolvers);

    cache.getOrCreate(serviceAccountCredential("a@p.iam.gserviceaccount.com"));
    cache.getOrCreate(serviceAccountCredential("a@p.iam.gserviceaccount.com"));

    expect(logSpy).toHaveBeenCalledTimes(1);
    expect(logSpy).toHaveBeenCalledWith(
      "info: New credentials email=a@p.iam.gserviceaccount.com source=/keys/sa.json",
    );
  });

  test("logs the key of new authorized-user credentials, then the email once resolved", async () => {
    setLogLevel("info");
    const { resolvers } = countingResolvers({ email: "u@example.com" });
    const cache = createCredentialCache(resolvers);

    const cached = cache.getOrCreate(authorizedUserCredential());
    await cached.getEmail();
    await cached.getEmail();

    expect(logSpy).toHaveBeenCalledTimes(2);
    expect(logSpy.mock.calls[0]?.[0]).toBe(`info: New credentials key=${cached.clientId} source=/adc.json`);
    expect(logSpy.mock.calls[1]?.[0]).toBe(
      `info: Resolved credentials email email=u@example.com key=${cached.clientId}`,
    );
  });

  test("does not log the email of a service account twice", async () => {
    setLogLevel("info");
    const { resolvers } = countingResolvers();
    const cache = createCredentialCache(resolvers);

    await cache.getOrCreate(serviceAccountCredential("a@p.iam.gserviceaccount.com")).getEmail();

    expect(logSpy).toHaveBeenCalledTimes(1);
  });

  test("wrap never touches the slot", () => {
    const { resolvers } = countingResolvers();
    const cache = createCredentialCache(resolvers);
    const cached = cache.getOrCreate(serviceAccountCredential("a@p.iam.gserviceaccount.com"));

    const wrapped = cache.wrap(serviceAccountCredential("b@p.iam.gserviceaccount.com"));

    expect(wrapped.clientId).toBe("b@p.iam.gserviceaccount.com");
    expect(cache.getOrCreate(serviceAccountCredential("a@p.iam.gserviceaccount.com"))).toBe(cached);
  });

  test("throws for unsupported credential types and keeps the slot", () => {
    const { resolvers } = countingResolvers();
    const cache = createCredentialCache(resolvers);
    const cached = cache.getOrCreate(serviceAccountCredential());

    const unsupported = serviceAccountCredential();
    unsupported.payload = { type: "external_account" };

    expect(() => cache.getOrCreate(unsupported)).toThrow("Unexpected type: external_account");
    expect(cache.getOrCreate(serviceAccountCredential())).toBe(cached);
  });
});
