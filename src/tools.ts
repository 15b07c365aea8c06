import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import { createSettings, loadConfig, validateConfig } from "./config.js";
import { withPrinterConnection, type PrinterConnector } from "./ftps-client.js";
import {
  examine3mfStructure,
  extractRequiredFiles,
  extractThumbnails,
  list3mfFiles,
  listPrinterFilesystem,
} from "./inspector.js";
import { consoleLogger, type Logger } from "./logger.js";
import type { FailureReason, OperationResult, PrinterConfig } from "./types.js";

export interface ToolDeps {
  env?: NodeJS.ProcessEnv;
  connect?: PrinterConnector;
  logger?: Logger;
}

export type ToolArgs = Record<string, unknown>;

// Kept a type alias: the SDK's result schema carries an index signature
export type ToolResult = {
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
};

// ===== Helpers =====

export function ok(data: unknown): ToolResult {
  return {
    content: [{ type: "text" as const, text: JSON.stringify(data, null, 2) }],
  };
}

export function err(message: string, reason?: FailureReason): ToolResult {
  return {
    content: [
      {
        type: "text" as const,
        text: JSON.stringify(
          { error: message, ...(reason ? { reason } : {}) },
          null,
          2,
        ),
      },
    ],
    isError: true,
  };
}

function fromResult<T>(
  result: OperationResult<T>,
  render: (value: T) => unknown,
): ToolResult {
  if (!result.success) return err(result.error, result.reason);
  return ok(render(result.value));
}

function flatten<T>(
  result: OperationResult<OperationResult<T>>,
): OperationResult<T> {
  return result.success ? result.value : result;
}

function optionalString(args: ToolArgs, key: string): string | undefined {
  const value = args[key];
  if (value === undefined) return undefined;
  if (typeof value !== "string") {
    throw new Error(`Argument "${key}" must be a string`);
  }
  return value;
}

function requireString(args: ToolArgs, key: string): string {
  const value = optionalString(args, key);
  if (!value) throw new Error(`Missing required argument "${key}"`);
  return value;
}

/**
 * Environment config with `host` / `access_code` arguments taking precedence.
 */
function resolveConfig(
  args: ToolArgs,
  env: NodeJS.ProcessEnv,
): OperationResult<PrinterConfig> {
  const base = loadConfig(env);
  return validateConfig(
    createSettings(
      optionalString(args, "host") ?? base.host,
      optionalString(args, "access_code") ?? base.accessCode,
      { port: base.port, username: base.username, outputRoot: base.outputRoot },
    ),
  );
}

// ===== Tool Definitions =====

const connectionProperties = {
  host: {
    type: "string",
    description: "Printer IP address (defaults to PRINTER_HOST)",
  },
  access_code: {
    type: "string",
    description: "Printer LAN access code (defaults to PRINTER_ACCESS_CODE)",
  },
};

const remotePathProperty = {
  remote_path: {
    type: "string",
    description: 'Path of the 3MF on the printer SD card, e.g. "/benchy.3mf"',
  },
};

export function getTools(): Tool[] {
  return [
    {
      name: "list_3mf_files",
      description:
        "List every .3mf in the printer SD card root and extract plate_1.png, top_1.png and model_settings.config of each into a directory named after the archive.",
      inputSchema: {
        type: "object",
        properties: { ...connectionProperties },
        required: [],
      },
    },
    {
      name: "extract_required_files",
      description:
        "Download one 3MF and extract its plate preview, top preview and model settings.",
      inputSchema: {
        type: "object",
        properties: { ...connectionProperties, ...remotePathProperty },
        required: ["remote_path"],
      },
    },
    {
      name: "examine_3mf_structure",
      description:
        "Download one 3MF, list every entry with its size and save the PNGs under Metadata/ into the thumbnails directory.",
      inputSchema: {
        type: "object",
        properties: { ...connectionProperties, ...remotePathProperty },
        required: ["remote_path"],
      },
    },
    {
      name: "list_printer_filesystem",
      description:
        "Walk the printer SD card and return it as an indented tree with sizes and modification dates.",
      inputSchema: {
        type: "object",
        properties: { ...connectionProperties },
        required: [],
      },
    },
    {
      name: "extract_thumbnails",
      description:
        "Download one 3MF and decode its thumbnail images. Returns format, dimensions and base64 data for each.",
      inputSchema: {
        type: "object",
        properties: { ...connectionProperties, ...remotePathProperty },
        required: ["remote_path"],
      },
    },
  ];
}

// ===== Dispatch =====

export async function dispatch(
  name: string,
  args: ToolArgs,
  deps: ToolDeps = {},
): Promise<ToolResult> {
  if (!getTools().some((tool) => tool.name === name)) {
    return err(`Unknown tool: ${name}`);
  }

  const logger = deps.logger ?? consoleLogger;
  const config = resolveConfig(args, deps.env ?? process.env);
  if (!config.success) return err(config.error, config.reason);
  const { outputRoot } = config.value;

  if (name === "list_3mf_files") {
    const result = await list3mfFiles(config.value, {
      logger,
      connect: deps.connect,
    });
    return fromResult(result, (summary) => summary);
  }

  if (name === "extract_required_files") {
    const remotePath = requireString(args, "remote_path");
    const result = await withPrinterConnection(
      config.value,
      (ftp) => extractRequiredFiles(ftp, remotePath, { outputRoot, logger }),
      deps.connect,
    );
    return fromResult(flatten(result), (summary) => summary);
  }

  if (name === "examine_3mf_structure") {
    const remotePath = requireString(args, "remote_path");
    const lines: string[] = [];
    const result = await withPrinterConnection(
      config.value,
      (ftp) =>
        examine3mfStructure(ftp, remotePath, {
          outputRoot,
          logger,
          print: (line) => lines.push(line),
        }),
      deps.connect,
    );
    return fromResult(flatten(result), (report) => ({ ...report, output: lines }));
  }

  if (name === "list_printer_filesystem") {
    const lines: string[] = [];
    const result = await listPrinterFilesystem(config.value, {
      connect: deps.connect,
      logger,
      print: (line) => lines.push(line),
    });
    return fromResult(result, () => ({ tree: lines }));
  }

  if (name === "extract_thumbnails") {
    const remotePath = requireString(args, "remote_path");
    const result = await withPrinterConnection(
      config.value,
      (ftp) => extractThumbnails(ftp, remotePath, { logger }),
      deps.connect,
    );
    return fromResult(flatten(result), (images) => ({
      thumbnails: images.map((image) => ({
        name: image.name,
        format: image.format,
        width: image.width,
        height: image.height,
        bytes: image.data.length,
        data_base64: Buffer.from(image.data).toString("base64"),
      })),
    }));
  }

  return err(`Tool ${name} has no handler`);
}
