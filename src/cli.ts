import { parseArgs } from "node:util";
import { spawnSync } from "node:child_process";
import { readFileSync } from "node:fs";
import { z } from "zod";
import { loadConfig, mapCliArgs, type Config } from "./config.ts";
import { runServe } from "./commands/serve.ts";
import { EXIT_INTERNAL_ERROR, EXIT_INVALID_CONFIGURATION } from "./exit-codes.ts";
import { log } from "./log.ts";

const PackageJsonSchema = z.object({ version: z.string() });

function readVersion(): string {
  const text = readFileSync(new URL("../package.json", import.meta.url), "utf-8");
  return PackageJsonSchema.parse(JSON.parse(text)).version;
}

function getCommitSha(): string {
  if (process.env.COMMIT_SHA) {
    return process.env.COMMIT_SHA;
  }
  try {
    const result = spawnSync("git", ["rev-parse", "--short", "HEAD"], {
      timeout: 1000,
      stdio: ["ignore", "pipe", "ignore"],
    });
    if (result.status === 0 && result.stdout) {
      return Buffer.from(result.stdout).toString().trim();
    }
  } catch {
    // git not available
  }
  return "";
}

export function formatVersion(): string {
  const version = readVersion();
  const sha = getCommitSha();
  return sha ? `${version} (${sha})` : version;
}

const USAGE = `local-metadata-server — GCE metadata server emulator backed by local Google Cloud credentials

Usage:
  local-metadata-server <command> [options]

Commands:
  serve             Start the metadata server
  version           Show version

Options:
  --host <host>                            Address to bind: use 0.0.0.0 to accept remote
                                           connections, e.g. inside docker (default: localhost)
  -p, --port <port>                        Port to bind (default: 80)
  --scopes <scopes>                        Comma-separated default OAuth scopes (default: cloud-platform)
  --project <id>                           Project ID to report instead of the credential's
  --google-application-credentials <path>  Credentials file to try first
  --cloudsdk-config <dir>                  gcloud configuration directory (default: $CLOUDSDK_CONFIG)
  --log-level <level>                      debug, info, warning or error (default: warning)
  -c, --config <path>                      Path to TOML config file
  -h, --help                               Show this help message
  -v, --version                            Show version

Clients find the server through GCE_METADATA_HOST, e.g.:
  local-metadata-server serve --port 8080 &
  GCE_METADATA_HOST=localhost:8080 python some/script.py`;

const SUBCOMMANDS = ["serve", "version"] as const;
type Subcommand = (typeof SUBCOMMANDS)[number];

function isSubcommand(value: string): value is Subcommand {
  return SUBCOMMANDS.some((name) => name === value);
}

function reportZodError(err: z.ZodError): never {
  console.error("error: invalid configuration");
  for (const issue of err.issues) {
    console.error(`  ${issue.path.join(".")}: ${issue.message}`);
  }
  process.exit(EXIT_INVALID_CONFIGURATION);
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<void> {
  let parsed;
  try {
    parsed = parseArgs({
      args: argv,
      strict: true,
      allowPositionals: true,
      options: {
        host: { type: "string" },
        port: { type: "string", short: "p" },
        scopes: { type: "string" },
        project: { type: "string" },
        "google-application-credentials": { type: "string" },
        "cloudsdk-config": { type: "string" },
        "log-level": { type: "string" },
        config: { type: "string", short: "c" },
        help: { type: "boolean", short: "h" },
        version: { type: "boolean", short: "v" },
      },
    });
  } catch (err) {
    console.error(`error: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(EXIT_INVALID_CONFIGURATION);
  }
  const { values, positionals } = parsed;

  if (values.help) {
    console.log(USAGE);
    process.exit(0);
  }

  if (values.version) {
    console.log(formatVersion());
    process.exit(0);
  }

  const subcommand = positionals[0];

  if (!subcommand) {
    console.error("error: no subcommand provided\n");
    console.error(USAGE);
    process.exit(EXIT_INVALID_CONFIGURATION);
  }

  if (!isSubcommand(subcommand)) {
    console.error(`error: unknown subcommand '${subcommand}'`);
    console.error(`available commands: ${SUBCOMMANDS.join(", ")}`);
    process.exit(EXIT_INVALID_CONFIGURATION);
  }

  if (subcommand === "version") {
    console.log(formatVersion());
    process.exit(0);
  }

  let config: Config;
  try {
    config = loadConfig(mapCliArgs(values), values.config);
  } catch (err) {
    if (err instanceof z.ZodError) {
      reportZodError(err);
    }
    console.error(`error: failed to load configuration: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(EXIT_INVALID_CONFIGURATION);
  }

  try {
    await runServe(config);
  } catch (err) {
    log.error("Unexpected error", { error: err });
    process.exit(EXIT_INTERNAL_ERROR);
  }
}
