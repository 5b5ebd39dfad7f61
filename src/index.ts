#!/usr/bin/env node
import 'dotenv/config'; // Load .env file
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { readFileSync } from "node:fs";
import path from "node:path";
import { z } from "zod";
import { CONFIG, Config } from "./shared/config";
import { createDefaultRegistry } from "./shared/scheme-registry";

// Import tool registration functions
import { registerDecodeTools } from "./tools/decode-tools";
import { registerEncodeTools } from "./tools/encode-tools";
import { registerDataResources } from "./resources/data-resources";

const PackageJsonSchema = z.object({ version: z.string() });

function readVersion(): string {
  const packageJson = readFileSync(path.join(__dirname, "..", "package.json"), "utf8");
  return PackageJsonSchema.parse(JSON.parse(packageJson)).version;
}

/**
 * Create the MCP server and register tools based on mode
 */
export function createServer(config: Config = CONFIG): McpServer {
  const instructions = [
    `This server encodes and decodes RFC 2397 data: URIs (data:[<mediatype>][;base64],<data>).`,
    `A data: URI without a media type is text/plain;charset=US-ASCII.`,
    `Charsets are resolved by name or alias (e.g. UTF-8, ISO-8859-1, windows-1252, Shift_JIS); unknown names are reported as UNSUPPORTED_CHARSET.`,
  ].join('\n');

  const server = new McpServer({
    name: "Data URI MCP",
    version: readVersion(),
  }, {
    instructions
  });

  const registry = createDefaultRegistry();
  registerDecodeTools(server, config);
  registerDataResources(server, registry);
  if (config.mode === 'write') {
    registerEncodeTools(server, config);
  }

  return server;
}

async function initializeServer() {
  console.error(`Starting Data URI MCP in ${CONFIG.mode} mode`);
  return createServer(CONFIG);
}

// Initialize server and export
const serverPromise = initializeServer();

// Export the server promise for CLI and main usage
export { serverPromise };

// Only connect to the transport if this file is being run directly (not imported)
if (require.main === module) {
  // Start receiving messages on stdin and sending messages on stdout after initialization
  serverPromise
    .then((server) => server.connect(new StdioServerTransport()))
    .catch((error: unknown) => {
      console.error("Failed to start Data URI MCP:", error);
      process.exit(1);
    });
}
