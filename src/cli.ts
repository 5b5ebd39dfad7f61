#!/usr/bin/env node
import 'dotenv/config'; // Load .env file
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { serverPromise } from "./index";

/**
 * Turn `key=value` arguments into tool parameters, reading JSON-looking values as JSON
 */
export function parseToolArgs(args: string[]): Record<string, unknown> {
  const params: Record<string, unknown> = {};
  for (const arg of args) {
    const match = arg.match(/^([^=]+)=(.*)$/s);
    if (!match) {
      continue;
    }
    const [, key, value] = match;
    if (value.startsWith('{') || value.startsWith('[') ||
        value === 'true' || value === 'false' ||
        (value.startsWith('"') && value.endsWith('"'))) {
      try {
        params[key] = JSON.parse(value);
      } catch {
        params[key] = value;
      }
    } else {
      params[key] = value;
    }
  }
  return params;
}

async function main(): Promise<number> {
  // Wait for server initialization to complete
  const server = await serverPromise;
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  const client = new Client({ name: "data-uri-cli", version: "1.0.0" });
  await Promise.all([server.connect(serverTransport), client.connect(clientTransport)]);

  try {
    const args = process.argv.slice(2);

    // Special command to show instructions
    if (args.length === 1 && args[0] === 'instructions') {
      console.log("Server Instructions:");
      console.log(client.getInstructions() || "No instructions configured");
      return 0;
    }

    // Special command to list resource templates
    if (args.length === 1 && args[0] === 'resources') {
      const { resourceTemplates } = await client.listResourceTemplates();
      for (const template of resourceTemplates) {
        console.log(`Resource template: ${template.name}`);
        console.log(`  URI Template: ${template.uriTemplate}`);
      }
      return 0;
    }

    // Special command to read a specific resource
    if (args.length === 2 && args[0] === 'resource') {
      console.log(`Reading resource: ${args[1]}`);
      const result = await client.readResource({ uri: args[1] });
      console.dir(result.contents, { depth: null });
      return 0;
    }

    if (args.length < 1) {
      console.error("Usage: npm run cli <tool-name> [param1=value1 param2=value2 ...]");
      console.error("       npm run cli instructions");
      console.error("       npm run cli resources");
      console.error("       npm run cli resource <uri>");
      console.error("\nAvailable tools:");

      const { tools } = await client.listTools();
      for (const tool of tools) {
        console.error(`  - ${tool.name}: ${tool.description ?? ""}`);
        const properties = Object.entries(tool.inputSchema.properties ?? {});
        if (properties.length > 0) {
          console.error("    Parameters:");
          for (const [paramName, schema] of properties) {
            const description = typeof schema === "object" && schema !== null && "description" in schema
              ? String(schema.description)
              : "No description";
            console.error(`      - ${paramName}: ${description}`);
          }
        } else {
          console.error("    Parameters: None");
        }
        console.error("");
      }
      return 1;
    }

    const [toolName, ...toolArgs] = args;
    const result = await client.callTool({ name: toolName, arguments: parseToolArgs(toolArgs) });
    console.dir(result.content, { depth: null });
    return result.isError ? 1 : 0;
  } finally {
    await client.close();
  }
}

if (require.main === module) {
  main()
    .then((code) => process.exit(code))
    .catch((error: unknown) => {
      console.error("Error:", error instanceof Error ? error.message : 'Unknown error occurred');
      process.exit(1);
    });
}
