#!/usr/bin/env node

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { CallToolRequestSchema, ListToolsRequestSchema } from "@modelcontextprotocol/sdk/types.js";
import { loadConfig } from './src/config.js';
import { createLogger } from './src/logging.js';
import { handleToolCall, TOOLS } from './src/tools.js';

const config = loadConfig();
const logger = createLogger(config.logLevel);

const server = new Server(
  {
    name: "glyphscript",
    version: "0.1.0",
  },
  {
    capabilities: {
      tools: {},
    },
  },
);

server.setRequestHandler(ListToolsRequestSchema, async () => ({
  tools: TOOLS,
}));

server.setRequestHandler(CallToolRequestSchema, async (request) => {
  const { name, arguments: args } = request.params;
  logger.debug(`Tool call: ${name}`);
  const result = handleToolCall(name, args ?? {}, config.maxSourceLength);
  if (result.isError) {
    logger.info(`Tool ${name} failed`);
  }
  return result;
});

async function runServer() {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info("glyphscript MCP server running on stdio");
  logger.debug(`Max source length: ${config.maxSourceLength}`);
}

runServer().catch((error) => {
  logger.error("Fatal error running server:", error);
  process.exit(1);
});
