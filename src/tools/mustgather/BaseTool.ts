import type { CallToolResult, Tool } from '@modelcontextprotocol/sdk/types.js';
import type { InvocationContext, NamespaceLister } from '../../mustgather/types.js';

/**
 * The slice of the Kubernetes client the must-gather tools read through.
 * KubernetesClient satisfies it.
 */
export interface MustGatherClient {
  resources: {
    namespace: NamespaceLister;
  };
}

/**
 * Opens the cluster client on demand. Tools call it only once their arguments are valid.
 */
export type ClientConnector = () => Promise<MustGatherClient>;

/**
 * Base interface for must-gather MCP tools
 */
export interface BaseTool {
  /**
   * The tool definition for MCP registration
   */
  tool: Tool;

  /**
   * Execute the tool with the raw arguments from the MCP request
   */
  execute(
    params: unknown,
    connect: ClientConnector,
    context?: InvocationContext,
  ): Promise<CallToolResult>;
}
