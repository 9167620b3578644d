import { z } from "zod";
import { parse as parseTOML } from "smol-toml";
import { readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

export const DEFAULT_SCOPES = ["https://www.googleapis.com/auth/cloud-platform"];

export const DEFAULT_PORT = 80;

export const LOG_LEVELS = ["debug", "info", "warning", "error"] as const;

/**
 * Expand a leading `~` or `~/` to the current user's home directory.
 * `~user` forms and tildes elsewhere in the path are left untouched.
 */
export function expandTilde(path: string): string {
  if (path === "~") return homedir();
  if (path.startsWith("~/")) return join(homedir(), path.slice(2));
  return path;
}

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

const PathSchema = z.string().min(1).transform(expandTilde);

export const ConfigSchema = z.object({
  host: z.string().min(1).default("localhost"),
  port: z.coerce.number().int().min(1).max(65535).default(DEFAULT_PORT),
  scopes: z
    .array(z.string().min(1))
    .min(1)
    .default(() => [...DEFAULT_SCOPES]),
  project: z.string().min(1).optional(),
  google_application_credentials: PathSchema.optional(),
  cloudsdk_config: PathSchema.optional(),
  log_level: z.enum(LOG_LEVELS).default("warning"),
});

export type Config = z.infer<typeof ConfigSchema>;

// ---------------------------------------------------------------------------
// CLI-arg key mapping (kebab-case → snake_case)
// ---------------------------------------------------------------------------

const cliToConfigKey: Record<string, keyof Config> = {
  host: "host",
  port: "port",
  scopes: "scopes",
  project: "project",
  "google-application-credentials": "google_application_credentials",
  "cloudsdk-config": "cloudsdk_config",
  "log-level": "log_level",
};

/** Split a comma-separated scope list, dropping empty entries. */
export function splitScopes(value: string): string[] {
  return value
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

/** Convert a CLI-arg values object (kebab-case keys) to config keys (snake_case). */
export function mapCliArgs(
  cliValues: Record<string, string | boolean | undefined>,
): Record<string, unknown> {
  const mapped: Record<string, unknown> = {};
  for (const [cliKey, value] of Object.entries(cliValues)) {
    if (value === undefined) continue;
    const configKey = cliToConfigKey[cliKey];
    if (!configKey) continue;
    mapped[configKey] = configKey === "scopes" && typeof value === "string" ? splitScopes(value) : value;
  }
  return mapped;
}

// ---------------------------------------------------------------------------
// Config loading
// ---------------------------------------------------------------------------

/** Read and parse a TOML config file. */
export function loadTOML(configPath: string): Record<string, unknown> {
  const content = readFileSync(configPath, "utf-8");
  return parseTOML(content);
}

/**
 * Load configuration by merging TOML file values with CLI arg overrides,
 * then validating through ConfigSchema.
 *
 * Precedence: CLI args > TOML file > schema defaults.
 */
export function loadConfig(cliValues: Record<string, unknown>, configPath?: string): Config {
  const fileValues = configPath ? loadTOML(expandTilde(configPath)) : {};
  const merged = { ...fileValues, ...cliValues };
  return ConfigSchema.parse(merged);
}
