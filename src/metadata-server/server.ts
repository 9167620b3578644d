import { createServer, type IncomingMessage, type Server, type ServerResponse } from "node:http";
import type { Config } from "../config.ts";
import { createCredentialCache, createDefaultResolvers } from "../credentials/cache.ts";
import { createCredentialProvider, type CredentialProvider } from "../credentials/provider.ts";
import { createCredentialChain, createDefaultCredentialSources } from "../credentials/sources.ts";
import { log } from "../log.ts";
import { handleRequest } from "./handlers.ts";
import type { MetadataServerDeps } from "./types.ts";

export type FetchHandler = (req: Request) => Promise<Response>;

export interface MetadataServerResult {
  server: Server;
  /** The bound port (differs from config.port when it was 0). */
  port: number;
  stop: () => Promise<void>;
}

export interface StartMetadataServerOptions {
  /** If provided, use this instead of building the credential chain from config. */
  credentials?: CredentialProvider;
  /** Whether to install SIGTERM/SIGINT handlers (default: true). */
  installSignalHandlers?: boolean;
  /** Suppress the startup banner (default: false). */
  quiet?: boolean;
}

/** Log `<method> <path> <status> size=<bytes>` for every request at info level. */
export function withAccessLog(handler: FetchHandler): FetchHandler {
  return async (req) => {
    const res = await handler(req);
    const size = res.body ? (await res.clone().arrayBuffer()).byteLength : 0;
    const url = new URL(req.url);
    log.info(`${req.method} ${url.pathname}${url.search} ${res.status} size=${size}`);
    return res;
  };
}

/** Convert a Node request (headers only; metadata requests carry no body) to a Fetch API Request. */
export function toFetchRequest(req: IncomingMessage): Request {
  const headers = new Headers();
  for (const [name, value] of Object.entries(req.headers)) {
    if (value === undefined) continue;
    for (const v of Array.isArray(value) ? value : [value]) {
      headers.append(name, v);
    }
  }
  const target = req.url ?? "/";
  const url = target.startsWith("/") ? `http://localhost${target}` : target;
  return new Request(url, { method: req.method, headers });
}

async function serveNodeRequest(
  handler: FetchHandler,
  req: IncomingMessage,
  res: ServerResponse,
): Promise<void> {
  let response: Response;
  try {
    response = await handler(toFetchRequest(req));
  } catch (err) {
    log.error("Failed to handle request", { method: req.method, path: req.url, error: err });
    response = new Response(null, { status: 500 });
  }

  const body = Buffer.from(await response.arrayBuffer());
  res.writeHead(response.status, {
    ...Object.fromEntries(response.headers),
    "Content-Length": body.byteLength,
  });
  res.end(body);
}

/**
 * Start the GCE metadata server emulator.
 *
 * 1. Builds the credential chain, cache and provider from config (or uses the provided one)
 * 2. Wires the pure request handler behind an access log
 * 3. Listens on config.host:config.port
 * 4. Optionally registers SIGTERM / SIGINT handlers for graceful shutdown
 */
export async function startMetadataServer(
  config: Config,
  options: StartMetadataServerOptions = {},
): Promise<MetadataServerResult> {
  const credentials =
    options.credentials ??
    createCredentialProvider(
      createCredentialChain(createDefaultCredentialSources(config)),
      createCredentialCache(createDefaultResolvers()),
      { scopes: config.scopes, project: config.project },
    );

  const deps: MetadataServerDeps = { credentials, scopes: config.scopes };
  const handler = withAccessLog((req) => handleRequest(req, deps));

  const server = createServer((req, res) => {
    serveNodeRequest(handler, req, res).catch((err: unknown) => {
      log.error("Failed to write response", { method: req.method, path: req.url, error: err });
      res.destroy();
    });
  });

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(config.port, config.host, () => {
      server.off("error", reject);
      resolve();
    });
  });

  const address = server.address();
  const port = address !== null && typeof address === "object" ? address.port : config.port;

  const installSignalHandlers = options.installSignalHandlers ?? true;

  const onSignal = () => {
    console.log("\nmetadata-server: shutting down...");
    stop().then(
      () => process.exit(0),
      (err: unknown) => {
        log.error("Failed to stop server", { error: err });
        process.exit(1);
      },
    );
  };

  function stop(): Promise<void> {
    if (installSignalHandlers) {
      process.off("SIGTERM", onSignal);
      process.off("SIGINT", onSignal);
    }
    if (!server.listening) return Promise.resolve();
    return new Promise((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
      server.closeAllConnections();
    });
  }

  if (installSignalHandlers) {
    process.on("SIGTERM", onSignal);
    process.on("SIGINT", onSignal);
  }

  log.info(`Listening ${config.host}:${port}...`);

  const quiet = options.quiet ?? false;
  if (!quiet) {
    console.log("metadata-server: starting GCE metadata server emulator");
    console.log(`  listen:  ${config.host}:${port}`);
    console.log(`  scopes:  ${config.scopes.join(", ")}`);
    console.log(`  project: ${config.project ?? "(from credentials)"}`);
    console.log("  endpoints:");
    console.log("    GET /computeMetadata/v1/project/project-id                        → project ID");
    console.log("    GET /computeMetadata/v1/project/numeric-project-id                → numeric project ID");
    console.log("    GET /computeMetadata/v1/instance/service-accounts/                → SA listing");
    console.log("    GET /computeMetadata/v1/instance/service-accounts/{account}/      → SA info");
    console.log("    GET /computeMetadata/v1/instance/service-accounts/{account}/email → SA email");
    console.log("    GET /computeMetadata/v1/instance/service-accounts/{account}/token → access token");
  }

  return { server, port, stop };
}
