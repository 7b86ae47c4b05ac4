import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type CallToolResult,
  type Tool,
} from '@modelcontextprotocol/sdk/types.js';
import type { EventEmitter } from 'events';
import winston from 'winston';
import { VERSION } from '../version.js';
import { loadServerConfig, type ServerConfig } from '../utils/ServerConfig.js';
import { toMcpToolResult } from '../utils/McpToolResult.js';

export const SERVER_NAME = 'mustgather-plan-mcp';

/**
 * Plugin interface for extending MCP server functionality
 */
export interface MCPPlugin {
  name: string;
  initialize(server: MCPServer): Promise<void>;
  shutdown?(): Promise<void>;
  /**
   * Optional hook invoked when a new conversation starts.
   * Clients list tools at the beginning of a session, so the ListTools handler calls it.
   */
  onNewConversation?(): Promise<void>;
}

/**
 * Request-scoped data the SDK hands to a tool call
 */
export interface ToolCallExtra {
  /** Aborts when the client cancels the request */
  signal?: AbortSignal;
}

export type ToolHandler = (params: unknown, extra: ToolCallExtra) => Promise<unknown>;

interface ToolEntry {
  tool: Tool;
  handler: ToolHandler;
}

export interface MCPServerOptions {
  /** Settings to use instead of reading them from the environment */
  config?: ServerConfig;
  skipTransportErrorHandling?: boolean;
  skipGracefulShutdown?: boolean;
}

type Listener = (...args: unknown[]) => void;

export function createLogger(config: ServerConfig): winston.Logger {
  // stdout carries the MCP protocol, so every level goes to stderr
  const transports: winston.transport[] = [
    new winston.transports.Console({
      stderrLevels: ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'],
      format: winston.format.combine(winston.format.colorize(), winston.format.simple()),
    }),
  ];

  if (config.logToFile) {
    transports.push(
      new winston.transports.File({
        filename: config.logFile,
        format: winston.format.json(),
      }),
    );
  }

  return winston.createLogger({
    level: config.logLevel,
    format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
    transports,
  });
}

/**
 * MCP server hosting the must-gather planning tools over stdio
 */
export class MCPServer {
  private server: Server;
  private transport: StdioServerTransport;
  private logger: winston.Logger;
  private config: ServerConfig;
  private tools: Map<string, ToolEntry> = new Map();
  private plugins: Map<string, MCPPlugin> = new Map();
  private isShuttingDown = false;
  private options: MCPServerOptions;
  private eventListeners: Array<{
    target: EventEmitter;
    event: string;
    handler: Listener;
  }> = [];

  constructor(options: MCPServerOptions = {}) {
    this.options = options;
    this.config = options.config ?? loadServerConfig();
    this.logger = createLogger(this.config);

    this.server = new Server(
      {
        name: SERVER_NAME,
        version: VERSION,
      },
      {
        capabilities: {
          tools: {},
        },
      },
    );

    this.transport = new StdioServerTransport();

    if (!options.skipTransportErrorHandling) {
      this.setupTransportErrorHandling();
    }

    this.setupHandlers();

    // Tests skip this to avoid leaving process listeners behind
    if (!this.options.skipGracefulShutdown) {
      this.setupGracefulShutdown();
    }

    this.logger.info('MCPServer initialized');
  }

  private addTrackedListener(target: EventEmitter, event: string, handler: Listener): void {
    target.on(event, handler);
    this.eventListeners.push({ target, event, handler });
  }

  private removeAllListeners(): void {
    for (const { target, event, handler } of this.eventListeners) {
      target.removeListener(event, handler);
    }
    this.eventListeners = [];
  }

  private setupTransportErrorHandling(): void {
    this.addTrackedListener(process.stdin, 'error', (error) => {
      this.logger.error('Transport stdin error:', error);
    });

    this.addTrackedListener(process.stdout, 'error', (error) => {
      this.logger.error('Transport stdout error:', error);
    });

    // The client went away; nothing more can be served over stdio
    this.addTrackedListener(process.stdin, 'close', () => {
      this.logger.warn('Transport stdin closed');
      this.stop().catch((error: unknown) => {
        this.logger.error('Failed to stop after stdin closed', error);
      });
    });
  }

  private setupHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => {
      for (const plugin of this.plugins.values()) {
        if (typeof plugin.onNewConversation === 'function') {
          try {
            await plugin.onNewConversation();
          } catch (err) {
            this.logger.warn('Plugin onNewConversation hook failed', {
              plugin: plugin.name,
              error: err,
            });
          }
        }
      }
      const tools = this.getTools();
      this.logger.debug(`Listing ${tools.length} tools`);
      return { tools };
    });

    this.server.setRequestHandler(CallToolRequestSchema, async (request, extra) => {
      const { name, arguments: args } = request.params;
      this.logger.info(`Executing tool: ${name}`, { arguments: args });
      try {
        return await this.executeTool(name, args, { signal: extra.signal });
      } catch (error) {
        this.logger.error(`Tool execution failed: ${name}`, error);
        throw error;
      }
    });
  }

  /**
   * Register a tool with the MCP server. A later registration under the same name wins.
   */
  public registerTool(tool: Tool, handler: ToolHandler): void {
    if (this.tools.has(tool.name)) {
      this.logger.warn(`Tool already registered: ${tool.name}, overwriting`);
    }

    this.tools.set(tool.name, { tool, handler });
    this.logger.info(`Registered tool: ${tool.name}`);
  }

  public getTools(): Tool[] {
    return Array.from(this.tools.values()).map((entry) => entry.tool);
  }

  /**
   * Run a registered tool and shape its return value as an MCP tool result
   */
  public async executeTool(
    toolName: string,
    params: unknown,
    extra: ToolCallExtra = {},
  ): Promise<CallToolResult> {
    const toolEntry = this.tools.get(toolName);
    if (!toolEntry) {
      const error = `Tool not found: ${toolName}`;
      this.logger.error(error);
      throw new Error(error);
    }
    return toMcpToolResult(await toolEntry.handler(params, extra));
  }

  /**
   * Load and initialize a plugin
   */
  public async loadPlugin(plugin: MCPPlugin): Promise<void> {
    if (this.plugins.has(plugin.name)) {
      throw new Error(`Plugin already loaded: ${plugin.name}`);
    }

    this.logger.info(`Loading plugin: ${plugin.name}`);

    try {
      await plugin.initialize(this);
      this.plugins.set(plugin.name, plugin);
      this.logger.info(`Plugin loaded successfully: ${plugin.name}`);
    } catch (error) {
      this.logger.error(`Failed to load plugin: ${plugin.name}`, error);
      throw error;
    }
  }

  public async start(): Promise<void> {
    this.logger.info('Starting MCP server...');

    try {
      await this.server.connect(this.transport);
      this.logger.info('MCP server started successfully');
    } catch (error) {
      this.logger.error('Failed to start MCP server', error);
      throw error;
    }
  }

  public async stop(): Promise<void> {
    if (this.isShuttingDown) {
      return;
    }

    this.isShuttingDown = true;
    this.logger.info('Stopping MCP server...');

    this.removeAllListeners();

    for (const [name, plugin] of this.plugins) {
      if (plugin.shutdown) {
        try {
          await plugin.shutdown();
          this.logger.info(`Plugin shutdown complete: ${name}`);
        } catch (error) {
          this.logger.error(`Plugin shutdown failed: ${name}`, error);
        }
      }
    }

    await this.server.close();
    this.logger.info('MCP server stopped');
  }

  private setupGracefulShutdown(): void {
    const shutdown = (signal: string): void => {
      this.logger.info(`Received ${signal}, initiating graceful shutdown...`);
      this.stop()
        .catch((error: unknown) => {
          this.logger.error('Graceful shutdown failed', error);
        })
        .finally(() => process.exit(0));
    };

    this.addTrackedListener(process, 'SIGINT', () => shutdown('SIGINT'));
    this.addTrackedListener(process, 'SIGTERM', () => shutdown('SIGTERM'));

    this.addTrackedListener(process, 'uncaughtException', (error) => {
      this.logger.error('Uncaught exception:', error);
      shutdown('uncaughtException');
    });

    this.addTrackedListener(process, 'unhandledRejection', (reason) => {
      this.logger.error('Unhandled rejection:', reason);
      shutdown('unhandledRejection');
    });
  }

  public getLogger(): winston.Logger {
    return this.logger;
  }

  public getConfig(): ServerConfig {
    return this.config;
  }

  public getServer(): Server {
    return this.server;
  }

  /**
   * Remove process listeners (useful for tests)
   */
  public cleanup(): void {
    this.removeAllListeners();
  }
}
