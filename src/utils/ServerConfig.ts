import { z } from 'zod';

const envFlag = z
  .string()
  .optional()
  .transform((value) => value === 'true' || value === '1');

const optionalTrimmed = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  });

const optionalUrl = optionalTrimmed.pipe(z.string().url().optional());

export const ServerConfigSchema = z
  .object({
    MCP_LOG_LEVEL: z
      .enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'])
      .default('info'),
    MCP_LOG_ENABLE: envFlag,
    MCP_LOG_FILE: z.string().min(1).default('mustgather-plan-mcp.log'),
    MCP_KUBE_CONTEXT: optionalTrimmed,
    MCP_K8S_SKIP_TLS_VERIFY: envFlag,
    MCP_K8S_IN_CLUSTER: envFlag,
    MCP_K8S_API_SERVER: optionalUrl,
    MCP_K8S_TOKEN: optionalTrimmed,
    // Set by the kubelet in every pod
    KUBERNETES_SERVICE_HOST: optionalTrimmed,
    KUBECONFIG: optionalTrimmed,
    // Host-wide deadline for a single tool call, in milliseconds
    TIMEOUT: z.coerce.number().int().positive().optional(),
    MCP_DISABLE_MUSTGATHER_PLUGIN: envFlag,
  })
  .superRefine((env, ctx) => {
    if (Boolean(env.MCP_K8S_API_SERVER) !== Boolean(env.MCP_K8S_TOKEN)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [env.MCP_K8S_API_SERVER ? 'MCP_K8S_TOKEN' : 'MCP_K8S_API_SERVER'],
        message: 'MCP_K8S_API_SERVER and MCP_K8S_TOKEN must be set together',
      });
    }
  });

export type AuthMode = 'kubeconfig' | 'in-cluster' | 'token';

export interface ServerConfig {
  logLevel: string;
  logToFile: boolean;
  logFile: string;
  kubeContext?: string;
  skipTlsVerify: boolean;
  /** Which credentials the Kubernetes client loads */
  authMode: AuthMode;
  apiServerUrl?: string;
  bearerToken?: string;
  toolTimeoutMs?: number;
  mustGatherPluginDisabled: boolean;
}

/**
 * Read the server settings from environment variables.
 * Invalid values fail fast so a misconfigured server never starts half-way.
 *
 * Credentials come from, in order: `MCP_K8S_API_SERVER` with `MCP_K8S_TOKEN`, the pod's service
 * account when `MCP_K8S_IN_CLUSTER` is on or the process runs in a pod without `KUBECONFIG`,
 * and otherwise the kubeconfig file.
 */
export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const result = ServerConfigSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid server configuration: ${issues}`);
  }

  const parsed = result.data;
  const authMode: AuthMode =
    parsed.MCP_K8S_API_SERVER && parsed.MCP_K8S_TOKEN
      ? 'token'
      : parsed.MCP_K8S_IN_CLUSTER || (parsed.KUBERNETES_SERVICE_HOST && !parsed.KUBECONFIG)
        ? 'in-cluster'
        : 'kubeconfig';

  return {
    logLevel: parsed.MCP_LOG_LEVEL,
    logToFile: parsed.MCP_LOG_ENABLE,
    logFile: parsed.MCP_LOG_FILE,
    kubeContext: parsed.MCP_KUBE_CONTEXT,
    skipTlsVerify: parsed.MCP_K8S_SKIP_TLS_VERIFY,
    authMode,
    apiServerUrl: authMode === 'token' ? parsed.MCP_K8S_API_SERVER : undefined,
    bearerToken: authMode === 'token' ? parsed.MCP_K8S_TOKEN : undefined,
    toolTimeoutMs: parsed.TIMEOUT,
    mustGatherPluginDisabled: parsed.MCP_DISABLE_MUSTGATHER_PLUGIN,
  };
}
