#!/usr/bin/env -S npx tsx
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { SERVER_NAME, SERVER_VERSION, createGatekeeperServer } from "./server.js";

async function main(): Promise<void> {
  const server = createGatekeeperServer();
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error(`[${SERVER_NAME}] MCP server running on stdio (v${SERVER_VERSION})`);
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
