#!/usr/bin/env node
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { getProjectPath, loadConfig } from "./config";
import { createLabelManager } from "./labels";
import { createServer } from "./server";

// Initialize services
const config = loadConfig();
const manager = createLabelManager(config, getProjectPath());
const server = createServer(manager, config);

// Start server
const transport = new StdioServerTransport();
await server.connect(transport);

console.error("[destinations] MCP server started");
