import type { Config } from "../config.ts";
import { EXIT_INVALID_CONFIGURATION } from "../exit-codes.ts";
import { log, setLogLevel } from "../log.ts";
import {
  startMetadataServer,
  type MetadataServerResult,
  type StartMetadataServerOptions,
} from "../metadata-server/server.ts";

export async function runServe(
  config: Config,
  options: StartMetadataServerOptions = {},
): Promise<MetadataServerResult> {
  setLogLevel(config.log_level);

  try {
    return await startMetadataServer(config, options);
  } catch (err) {
    log.error("Failed to launch server", { host: config.host, port: config.port, error: err });
    process.exit(EXIT_INVALID_CONFIGURATION);
  }
}
