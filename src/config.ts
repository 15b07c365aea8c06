import * as path from "path";
import { fileURLToPath } from "url";
import { fail, succeed, type OperationResult, type PrinterConfig } from "./types.js";

// ===== Defaults =====

// Sample values shipped in docs; a config still holding them was never filled in
export const PLACEHOLDER_HOST = "192.168.1.100";
export const PLACEHOLDER_ACCESS_CODE = "12345678";

export const DEFAULT_FTPS_PORT = 990;
export const DEFAULT_FTPS_USER = "bblp";

export function defaultOutputRoot(): string {
  return path.dirname(fileURLToPath(import.meta.url));
}

// ===== Construction =====

export function createSettings(
  host: string,
  accessCode: string,
  overrides: Partial<Pick<PrinterConfig, "port" | "username" | "outputRoot">> = {},
): PrinterConfig {
  return {
    host,
    accessCode,
    connectionType: "lan",
    useLocalStorage: false,
    port: overrides.port ?? DEFAULT_FTPS_PORT,
    username: overrides.username ?? DEFAULT_FTPS_USER,
    outputRoot: overrides.outputRoot ?? defaultOutputRoot(),
  };
}

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
): PrinterConfig {
  return createSettings(
    env.PRINTER_HOST || PLACEHOLDER_HOST,
    env.PRINTER_ACCESS_CODE || PLACEHOLDER_ACCESS_CODE,
    {
      port: parseInt(env.PRINTER_FTPS_PORT || String(DEFAULT_FTPS_PORT), 10),
      outputRoot: env.PRINTER_OUTPUT_DIR
        ? path.resolve(env.PRINTER_OUTPUT_DIR)
        : undefined,
    },
  );
}

// ===== Validation =====

export function validateConfig(
  config: PrinterConfig,
): OperationResult<PrinterConfig> {
  const host = config.host.trim();
  const accessCode = config.accessCode.trim();

  if (!host || host === PLACEHOLDER_HOST) {
    return fail("config", `Printer host is not configured (got "${config.host}")`);
  }
  if (!accessCode || accessCode === PLACEHOLDER_ACCESS_CODE) {
    return fail("config", "Printer access code is not configured");
  }
  if (!Number.isInteger(config.port) || config.port <= 0) {
    return fail("config", `Invalid FTPS port: ${config.port}`);
  }

  return succeed({ ...config, host, accessCode });
}
