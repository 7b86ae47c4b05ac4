#!/usr/bin/env node
/**
 * must-gather plan MCP server
 * Main entry point for the Model Context Protocol server
 */

import { MCPServer } from './server/MCPServer.js';
import { MustGatherToolsPlugin } from './plugins/MustGatherToolsPlugin.js';

export { VERSION } from './version.js';
export { MCPServer, SERVER_NAME, createLogger } from './server/MCPServer.js';
export type { MCPPlugin, MCPServerOptions, ToolCallExtra, ToolHandler } from './server/MCPServer.js';
export { BaseToolsPlugin } from './plugins/BaseToolsPlugin.js';
export { MustGatherToolsPlugin } from './plugins/MustGatherToolsPlugin.js';
export type { MustGatherToolsPluginOptions } from './plugins/MustGatherToolsPlugin.js';
export * from './tools/mustgather/index.js';
export * from './mustgather/index.js';
export * from './kubernetes/index.js';
export { loadServerConfig } from './utils/ServerConfig.js';
export type { AuthMode, ServerConfig } from './utils/ServerConfig.js';

export async function main(): Promise<void> {
  console.error('must-gather plan MCP server - Starting...');

  try {
    const server = new MCPServer();
    await server.loadPlugin(new MustGatherToolsPlugin());
    await server.start();
    console.error('must-gather plan MCP server is running. Waiting for connections...');
  } catch (error) {
    console.error('Failed to start MCP server:', error);
    process.exit(1);
  }
}
