#!/usr/bin/env node
/**
 * 3MF Inspector MCP Server
 *
 * Exposes the SD card diagnostics of a LAN-mode 3D printer as MCP tools:
 * - List 3MF archives and extract their previews and model settings
 * - Dump the entry list of one archive and save its Metadata/ PNGs
 * - Decode archive thumbnails
 * - Print the SD card as a directory tree
 *
 * Printer access is FTPS on port 990; see ftps-client.ts.
 */

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import { loadConfig } from "./config.js";
import { errorMessage } from "./types.js";
import { dispatch, err, getTools } from "./tools.js";

const SERVER_NAME = "printer-3mf-inspector";
const SERVER_VERSION = "1.0.0";

// ===== MCP Server =====

class InspectorMCP {
  private server: Server;

  constructor() {
    this.server = new Server(
      { name: SERVER_NAME, version: SERVER_VERSION },
      { capabilities: { tools: {} } },
    );

    this.setupHandlers();
  }

  private setupHandlers() {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => ({
      tools: getTools(),
    }));

    this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
      const { name, arguments: args } = request.params;
      try {
        return await dispatch(name, args ?? {});
      } catch (error) {
        const message = errorMessage(error);
        console.error(`[${SERVER_NAME}] Tool ${name} failed:`, message);
        return err(message);
      }
    });
  }

  // ===== Server Lifecycle =====

  async run() {
    const transport = new StdioServerTransport();
    await this.server.connect(transport);

    const config = loadConfig();
    console.error("=".repeat(50));
    console.error(`3MF Inspector MCP Server v${SERVER_VERSION}`);
    console.error("=".repeat(50));
    console.error("Printer:", `${config.host}:${config.port}`);
    console.error("Output:", config.outputRoot);
    console.error("=".repeat(50));
  }
}

const mcp = new InspectorMCP();
mcp.run().catch(console.error);
