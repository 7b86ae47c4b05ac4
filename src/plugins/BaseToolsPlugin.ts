import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { Logger } from 'winston';
import type { InvocationContext } from '../mustgather/types.js';
import type { MCPPlugin, MCPServer, ToolCallExtra, ToolHandler } from '../server/MCPServer.js';
import type { ServerConfig } from '../utils/ServerConfig.js';

export interface ToolLike {
  tool: Tool;
}

/**
 * Generic base plugin to reduce duplication across tool plugins.
 * Subclasses create the tool instances and adapt each one to a server handler.
 */
export abstract class BaseToolsPlugin<TTool extends ToolLike> implements MCPPlugin {
  abstract name: string;
  abstract version: string;

  protected commands: TTool[] = [];
  protected logger?: Logger;
  protected commandMap: Map<string, TTool> = new Map();
  /** Host-wide deadline for a single call, from TIMEOUT */
  protected timeoutMs?: number;

  /** Create tool instances for this plugin */
  protected abstract createToolInstances(): TTool[];

  /** Adapt one tool to the server's handler signature */
  protected abstract getHandlerForTool(tool: TTool): ToolHandler;

  /** Optional: validate external dependencies before registration */
  protected async validate(): Promise<void> {}

  /** Optional: allow disabling a plugin through configuration */
  protected isDisabled(_config: ServerConfig): boolean {
    return false;
  }

  protected buildCommandMap(): void {
    this.commandMap.clear();
    for (const command of this.commands) {
      this.commandMap.set(command.tool.name, command);
    }
  }

  /** Execute a command by name using the plugin's instances */
  protected async runCommandByName(
    commandName: string,
    params: unknown,
    extra: ToolCallExtra = {},
  ): Promise<unknown> {
    const command = this.commandMap.get(commandName);
    if (!command) {
      throw new Error(`Unknown tool: ${commandName}`);
    }
    return this.getHandlerForTool(command)(params, extra);
  }

  async initialize(server: MCPServer): Promise<void> {
    this.logger = server.getLogger();
    const config = server.getConfig();
    this.timeoutMs = config.toolTimeoutMs;

    try {
      if (this.isDisabled(config)) {
        this.logger.info(`${this.name} is disabled via environment variable`);
        this.commands = [];
        this.commandMap.clear();
        return;
      }

      await this.validate();

      this.commands = this.createToolInstances();
      this.buildCommandMap();

      for (const command of this.commands) {
        server.registerTool(command.tool, this.getHandlerForTool(command));
      }

      this.logger.info(`${this.constructor.name} initialized with ${this.commands.length} tools.`);
    } catch (error) {
      this.logger.error(`Failed to initialize ${this.constructor.name}`, error);
      throw error;
    }
  }

  getToolFunction(toolName: string): ToolHandler | undefined {
    const command = this.commandMap.get(toolName);
    return command ? this.getHandlerForTool(command) : undefined;
  }

  async shutdown(): Promise<void> {}

  /**
   * Per-call context: the caller's abort signal combined with the host deadline, if any
   */
  protected createInvocationContext(extra: ToolCallExtra): InvocationContext {
    const signals: AbortSignal[] = [];
    if (extra.signal) {
      signals.push(extra.signal);
    }
    if (this.timeoutMs !== undefined) {
      signals.push(AbortSignal.timeout(this.timeoutMs));
    }

    let signal: AbortSignal | undefined;
    if (signals.length === 1) {
      signal = signals[0];
    } else if (signals.length > 1) {
      signal = AbortSignal.any(signals);
    }

    return { signal, logger: this.logger };
  }
}
