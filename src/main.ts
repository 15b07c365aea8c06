import { loadConfig, validateConfig } from "./config.js";
import type { PrinterConnector } from "./ftps-client.js";
import { list3mfFiles, type ListSummary } from "./inspector.js";
import { consoleLogger, type Logger } from "./logger.js";
import type { OperationResult } from "./types.js";

/**
 * Validate the environment config and, when it is filled in, run the 3MF
 * listing and extraction pass. Returns null when the config is rejected.
 */
export async function main(
  env: NodeJS.ProcessEnv = process.env,
  deps: { logger?: Logger; connect?: PrinterConnector } = {},
): Promise<OperationResult<ListSummary> | null> {
  const log = deps.logger ?? consoleLogger;

  const config = validateConfig(loadConfig(env));
  if (!config.success) {
    log("error", "Please configure proper printer IP and access code!");
    log("error", config.error);
    return null;
  }

  log("info", `Connecting to printer at ${config.value.host}`);
  return list3mfFiles(config.value, { logger: log, connect: deps.connect });
}
