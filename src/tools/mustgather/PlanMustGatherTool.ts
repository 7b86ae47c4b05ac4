import type { CallToolResult, Tool } from '@modelcontextprotocol/sdk/types.js';
import { convertApiError, ValidationError } from '../../kubernetes/ErrorHandling.js';
import {
  DEFAULT_GATHER_COMMAND,
  DEFAULT_MUST_GATHER_IMAGE,
  DEFAULT_SOURCE_DIR,
  DEFAULT_TIMEOUT,
} from '../../mustgather/constants.js';
import { NamespaceListError } from '../../mustgather/errors.js';
import { namespaceExists } from '../../mustgather/NamespaceCollisionChecker.js';
import { resolvePlanConfig } from '../../mustgather/ParameterResolver.js';
import { buildResourcePlan, withoutNamespace } from '../../mustgather/PlanBuilder.js';
import { renderPlan } from '../../mustgather/PlanRenderer.js';
import type {
  InvocationContext,
  PlanConfig,
  RandomIntSource,
  YamlSerializer,
} from '../../mustgather/types.js';
import { errorResult, textResult } from '../../utils/McpToolResult.js';
import type { BaseTool, ClientConnector, MustGatherClient } from './BaseTool.js';

export interface PlanMustGatherToolOptions {
  /** Random source for generated namespace names */
  random?: RandomIntSource;
  /** Replaces the js-yaml serializer when rendering the manifest */
  serializer?: YamlSerializer;
}

/**
 * Plan the resources for a must-gather run without creating anything in the cluster
 */
export class PlanMustGatherTool implements BaseTool {
  tool: Tool = {
    name: 'plan_mustgather',
    title: 'MustGather: Plan',
    description:
      'Plan for collecting a must-gather archive from an OpenShift cluster. must-gather collects cluster data for debugging and troubleshooting such as logs and Kubernetes resources. ' +
      'Returns instructions and a YAML manifest to create with kubectl; nothing is created by this tool.',
    inputSchema: {
      type: 'object',
      properties: {
        node_name: {
          type: 'string',
          description:
            'Optional node to run the must-gather pod on. If not provided, the scheduler picks a node',
        },
        node_selector: {
          type: 'string',
          description:
            'Optional node label selector (e.g. "key1=value1,key2=value2"), only relevant when a command and image need to capture data on a set of cluster nodes',
        },
        host_network: {
          type: 'boolean',
          description:
            'Optionally run the must-gather pod in the host network of the node. Only relevant if a gather image needs host-level data',
        },
        gather_command: {
          type: 'string',
          description:
            'Optionally specify a custom gather command to run a specialized script, e.g. /usr/bin/gather_audit_logs',
          default: DEFAULT_GATHER_COMMAND,
        },
        all_component_images: {
          type: 'boolean',
          description:
            'Optional. When enabled, gather with every operator and component image annotated with a must-gather image',
        },
        images: {
          type: 'array',
          items: { type: 'string' },
          description: `Optional list of images used to gather information about specific operators or cluster components. Defaults to ${DEFAULT_MUST_GATHER_IMAGE}`,
        },
        source_dir: {
          type: 'string',
          description: 'Optional directory the gather containers write their output to',
          default: DEFAULT_SOURCE_DIR,
        },
        timeout: {
          type: 'string',
          description: 'Timeout of the gather process, e.g. 30s, 6m20s or 2h10m30s',
          default: DEFAULT_TIMEOUT,
        },
        namespace: {
          type: 'string',
          description:
            'Optional existing privileged namespace where the must-gather pod should run. If not provided, a temporary namespace is planned',
        },
        keep_namespace: {
          type: 'boolean',
          description: 'Optionally leave out the cleanup instructions for the temporary resources',
        },
        since: {
          type: 'string',
          description:
            'Optional. Only collect logs newer than a relative duration like 5s, 2m5s or 3h6m10s. If unspecified, all logs are collected',
        },
        image_stream: {
          type: 'string',
          description: 'Not supported, use images instead',
          deprecated: true,
        },
      },
    },
    annotations: {
      title: 'MustGather: Plan',
      readOnlyHint: true,
      destructiveHint: false,
      idempotentHint: false,
      openWorldHint: true,
    },
  };

  constructor(private readonly options: PlanMustGatherToolOptions = {}) {}

  async execute(
    params: unknown,
    connect: ClientConnector,
    context: InvocationContext = {},
  ): Promise<CallToolResult> {
    const logger = context.logger;

    let config: PlanConfig;
    try {
      config = resolvePlanConfig(params, { random: this.options.random, logger });
    } catch (error) {
      if (error instanceof ValidationError) {
        logger?.warn(`plan_mustgather rejected arguments: ${error.message}`);
        return errorResult(error.message);
      }
      throw error;
    }

    const plan = buildResourcePlan(config);

    let exists: boolean;
    try {
      const client = await this.openClient(connect, logger);
      exists = await namespaceExists(client.resources.namespace, config.namespace, context);
    } catch (error) {
      if (error instanceof NamespaceListError) {
        return errorResult(error.message);
      }
      throw error;
    }

    const text = renderPlan(exists ? withoutNamespace(plan) : plan, {
      keepNamespace: config.keepNamespace,
      sourceDir: config.sourceDir,
      serializer: this.options.serializer,
    });

    logger?.info(
      `Planned must-gather in namespace ${config.namespace} with ${plan.names.gatherContainers.length} gather container(s)${exists ? ' (namespace already exists)' : ''}`,
    );
    return textResult(text);
  }

  private async openClient(
    connect: ClientConnector,
    logger: InvocationContext['logger'],
  ): Promise<MustGatherClient> {
    try {
      return await connect();
    } catch (error) {
      const listError = new NamespaceListError(convertApiError(error));
      logger?.warn(listError.message);
      throw listError;
    }
  }
}
