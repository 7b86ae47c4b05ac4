import { KubernetesClient, type KubernetesClientConfig } from '../kubernetes/KubernetesClient.js';
import type { MCPServer, ToolHandler } from '../server/MCPServer.js';
import {
  type BaseTool,
  PlanMustGatherTool,
  type PlanMustGatherToolOptions,
} from '../tools/mustgather/index.js';
import type { ServerConfig } from '../utils/ServerConfig.js';
import { VERSION } from '../version.js';
import { BaseToolsPlugin } from './BaseToolsPlugin.js';

export interface MustGatherToolsPluginOptions {
  /** Client settings that take precedence over the environment */
  client?: KubernetesClientConfig;
  tools?: PlanMustGatherToolOptions;
  /** How long a client is reused for the same kubeconfig context */
  clientTtlMs?: number;
  createClient?: (config: KubernetesClientConfig) => KubernetesClient;
}

/**
 * Plugin that registers the must-gather planning tools with the MCP server
 */
export class MustGatherToolsPlugin extends BaseToolsPlugin<BaseTool> {
  name = 'mustgather-tools';
  version = VERSION;

  private clientCacheByContext: Map<string, KubernetesClient> = new Map();
  private lastUsedAtByContext: Map<string, number> = new Map();
  private clientTtlMs: number;
  private clientConfig: KubernetesClientConfig = {};
  private createClient: (config: KubernetesClientConfig) => KubernetesClient;

  constructor(private options: MustGatherToolsPluginOptions = {}) {
    super();
    this.clientTtlMs = options.clientTtlMs ?? 60_000;
    this.createClient = options.createClient ?? ((config) => new KubernetesClient(config));
  }

  protected createToolInstances(): BaseTool[] {
    return [new PlanMustGatherTool(this.options.tools)];
  }

  static getCommandNames(): string[] {
    return new MustGatherToolsPlugin().createToolInstances().map((tool) => tool.tool.name);
  }

  protected isDisabled(config: ServerConfig): boolean {
    return config.mustGatherPluginDisabled;
  }

  async initialize(server: MCPServer): Promise<void> {
    this.clientConfig = {
      ...this.buildClientConfig(server.getConfig()),
      logger: server.getLogger(),
      ...(this.options.client ?? {}),
    };
    await super.initialize(server);
    if (this.commands.length > 0) {
      this.logger?.info('Kubernetes client will connect on first use.');
    }
  }

  protected getHandlerForTool(tool: BaseTool): ToolHandler {
    return async (params, extra) =>
      tool.execute(params, () => this.createOrReuseClient(), this.createInvocationContext(extra));
  }

  private buildClientConfig(config: ServerConfig): KubernetesClientConfig {
    const cfg: KubernetesClientConfig = {};
    if (config.authMode === 'in-cluster') {
      cfg.inCluster = true;
    }
    if (config.authMode === 'token') {
      cfg.bearerToken = config.bearerToken;
      cfg.apiServerUrl = config.apiServerUrl;
    }
    if (config.kubeContext) {
      cfg.context = config.kubeContext;
    }
    if (config.skipTlsVerify) {
      cfg.skipTlsVerify = true;
    }
    return cfg;
  }

  /**
   * Reuse the client for the current kubeconfig context while it is fresh.
   * No request is made to the cluster here.
   */
  private async createOrReuseClient(): Promise<KubernetesClient> {
    try {
      const candidate = this.createClient(this.clientConfig);
      await candidate.refreshCurrentContext();
      const contextName = candidate.getCurrentContext();

      const now = Date.now();
      const lastUsed = this.lastUsedAtByContext.get(contextName) ?? 0;
      const cached = this.clientCacheByContext.get(contextName);
      if (cached && now - lastUsed < this.clientTtlMs) {
        this.lastUsedAtByContext.set(contextName, now);
        return cached;
      }

      this.logger?.info(`Kubernetes client ready for context '${contextName}'`);
      this.clientCacheByContext.set(contextName, candidate);
      this.lastUsedAtByContext.set(contextName, now);
      return candidate;
    } catch (error) {
      this.logger?.error('Failed to create new Kubernetes client', error);
      throw error;
    }
  }

  /**
   * Drop cached clients so the next call picks up the current kubeconfig context
   */
  async onNewConversation(): Promise<void> {
    this.logger?.info('New conversation detected: clearing Kubernetes client cache');
    this.clientCacheByContext.clear();
    this.lastUsedAtByContext.clear();
  }

  async shutdown(): Promise<void> {
    this.clientCacheByContext.clear();
    this.lastUsedAtByContext.clear();
  }
}
